export type ErrorKind =
  | 'DownloadExhausted'
  | 'SignatureInvalid'
  | 'KeyImportFailed'
  | 'ListingUnavailable'
  | 'UnknownTarget'
  | 'ArtifactMissing'
  | 'NothingToPublish'
  | 'PublishFailed'
  | 'BuildFailed'
  | 'Cancelled'
  | 'ConfigInvalid'

/**
 * Base class for every failure the orchestrator records on a job, a version or a run.
 * `kind` is the discriminant used by summaries and exit-code decisions.
 */
export class GettextBuildError<K extends ErrorKind = ErrorKind> extends Error {
  readonly kind: K

  constructor(kind: K, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = `${kind}Error`
    this.kind = kind
  }
}

export interface MirrorAttempt {
  mirror: string
  url: string
  attempts: number
  error: string
}

export class DownloadExhaustedError extends GettextBuildError<'DownloadExhausted'> {
  constructor(readonly file: string, readonly mirrors: MirrorAttempt[]) {
    super('DownloadExhausted', `Failed to download ${file} from all mirrors (tried: ${mirrors.map(m => m.mirror).join(', ') || 'none'})`)
  }
}

export class SignatureInvalidError extends GettextBuildError<'SignatureInvalid'> {
  constructor(readonly file: string, readonly detail: string) {
    super('SignatureInvalid', `Signature verification failed for ${file}: ${detail}`)
  }
}

export interface KeyserverFailure {
  keyserver: string
  error: string
}

export class KeyImportFailedError extends GettextBuildError<'KeyImportFailed'> {
  constructor(readonly keys: string[], readonly failures: KeyserverFailure[]) {
    super('KeyImportFailed', `Could not import keys ${keys.join(', ')} from any keyserver (tried: ${failures.map(f => f.keyserver).join(', ') || 'none configured'})`)
  }
}

export class ListingUnavailableError extends GettextBuildError<'ListingUnavailable'> {
  constructor(readonly source: 'upstream' | 'releases', readonly failures: string[]) {
    super('ListingUnavailable', `Unable to list ${source === 'upstream' ? 'upstream versions' : 'published releases'}${failures.length > 0 ? `: ${failures.join('; ')}` : ''}`)
  }
}

export class UnknownTargetError extends GettextBuildError<'UnknownTarget'> {
  constructor(readonly target: string, readonly known: string[]) {
    super('UnknownTarget', `Unknown target "${target}". Supported targets: ${known.join(', ')}`)
  }
}

export class ArtifactMissingError extends GettextBuildError<'ArtifactMissing'> {
  constructor(readonly version: string, readonly target: string, readonly missing: string[]) {
    super('ArtifactMissing', `Build of ${version} for ${target} reported success but produced no ${missing.join(', ')}`)
  }
}

export class NothingToPublishError extends GettextBuildError<'NothingToPublish'> {
  constructor(readonly version: string) {
    super('NothingToPublish', `No successful target builds for ${version}, refusing to publish`)
  }
}

export class PublishFailedError extends GettextBuildError<'PublishFailed'> {
  constructor(readonly version: string, cause: unknown) {
    super('PublishFailed', `Publishing ${version} failed: ${errorMessage(cause)}`, { cause })
  }
}

export class BuildFailedError extends GettextBuildError<'BuildFailed'> {
  constructor(readonly version: string, readonly target: string, readonly exitCode: number, readonly output: string) {
    super('BuildFailed', `Build of ${version} for ${target} exited with code ${exitCode}`)
  }
}

export class CancelledError extends GettextBuildError<'Cancelled'> {
  constructor(readonly stage: string) {
    super('Cancelled', `Cancelled during ${stage}`)
  }
}

export class ConfigInvalidError extends GettextBuildError<'ConfigInvalid'> {
  constructor(readonly problems: string[]) {
    super('ConfigInvalid', `Invalid configuration: ${problems.join('; ')}`)
  }
}

export function isGettextBuildError<K extends ErrorKind>(error: unknown, kind?: K): error is GettextBuildError<K> {
  if (!(error instanceof GettextBuildError))
    return false
  return kind === undefined || error.kind === kind
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Keeps typed errors as they are and wraps anything else with `fallback`.
 */
export function asBuildError(error: unknown, fallback: (message: string) => GettextBuildError): GettextBuildError {
  if (error instanceof GettextBuildError)
    return error
  const wrapped = fallback(errorMessage(error))
  if (error instanceof Error && wrapped.cause === undefined)
    wrapped.cause = error
  return wrapped
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted)
    throw new CancelledError(stage)
}
