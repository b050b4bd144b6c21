import type { GettextBuildError, KeyImportFailedError, SignatureInvalidError, DownloadExhaustedError } from './errors'

export type VerifyMode = 'strict' | 'allow-insecure' | 'skip'

/**
 * What to do when a release already carries an asset with the same name.
 * `skip` leaves the remote asset untouched, `overwrite` deletes and re-uploads it.
 */
export type AssetPolicy = 'skip' | 'overwrite'

export interface RetryOptions {
  /** Attempts per mirror, including the first one */
  attempts: number
  timeoutMs: number
  retryDelayMs: number
}

export interface BuildsConfig {
  /** `owner/name` of the repository that hosts the releases */
  repository: string
  token: string
  tagPrefix: string
  targets: string[]
  /** Primary mirror, tried before the fallback list */
  mirror: string
  mirrors: string[]
  indexUrls: string[]
  keyservers: string[]
  trustedKeys: string[]
  verify: VerifyMode
  /** Versions processed at the same time */
  concurrency: number
  /** Build jobs (sandboxes) alive at the same time, across all versions */
  jobs: number
  dryRun: boolean
  localOnly: boolean
  outputDir: string
  workDir: string
  image: string
  assetPolicy: AssetPolicy
  draft: boolean
  prerelease: boolean
  download: RetryOptions
  verbose: boolean
  quiet: boolean
  /** Environment values that name no known mode, kept for `validateConfig` to report */
  invalidEnv?: { verify?: string, assetPolicy?: string }
}

export interface Toolchain {
  target: string
  description: string
  /** `--host` triple, omitted for native builds */
  host?: string
  /** `--build` triple, omitted for native builds */
  build?: string
  cc?: string
  cxx?: string
  configureFlags: string[]
}

export interface DownloadedFile {
  path: string
  url: string
  mirror: string
  bytes: number
  sha256: string
}

export interface DownloadedSource extends DownloadedFile {
  version: string
}

export type VerificationResult =
  | { status: 'verified', keyserver: string }
  | { status: 'unverified-allowed', reason: SignatureInvalidError | KeyImportFailedError | DownloadExhaustedError }
  | { status: 'skipped' }

export type BuildJobState = 'pending' | 'fetching' | 'verifying' | 'building' | 'packaging' | 'succeeded' | 'failed'

export interface StateTransition {
  from: BuildJobState
  to: BuildJobState
  at: Date
}

export interface Artifact {
  /** Asset name, e.g. `0.22.5-linux-amd64.tar.gz` */
  name: string
  path: string
  version: string
  /** Target identifier, or `src` for the source repackaging */
  target: string
  size: number
}

export interface BuildJobResult {
  version: string
  target: string
  status: 'succeeded' | 'failed'
  /** Last state reached before the terminal one */
  failedAt?: BuildJobState
  error?: GettextBuildError
  artifacts: Artifact[]
  transitions: StateTransition[]
  durationMs: number
}

export type VersionStatus = 'planned' | 'built' | 'published' | 'failed' | 'publish-failed' | 'cancelled'

export interface PublishReport {
  tag: string
  releaseId: number
  created: boolean
  uploaded: string[]
  skipped: string[]
  replaced: string[]
}

export interface VersionOutcome {
  version: string
  status: VersionStatus
  verification?: VerificationResult
  jobs: BuildJobResult[]
  publish?: PublishReport
  error?: GettextBuildError
}

export interface RunSummary {
  versions: VersionOutcome[]
  dryRun: boolean
  localOnly: boolean
  exitCode: number
}

export interface RemoteRelease {
  id: number
  tag: string
  name: string
  draft: boolean
  url: string
}

export interface RemoteAsset {
  id: number
  name: string
  size: number
}

export interface CreateReleaseInput {
  tag: string
  name: string
  body: string
  draft: boolean
  prerelease: boolean
}

/**
 * The release-hosting collaborator. `GitHubReleaseHost` talks to the GitHub REST API;
 * tests use an in-memory implementation.
 */
export interface ReleaseHost {
  listReleaseTags: () => Promise<string[]>
  findRelease: (tag: string) => Promise<RemoteRelease | null>
  createRelease: (input: CreateReleaseInput) => Promise<RemoteRelease>
  listAssets: (releaseId: number) => Promise<RemoteAsset[]>
  uploadAsset: (releaseId: number, name: string, data: Uint8Array) => Promise<RemoteAsset>
  deleteAsset: (assetId: number) => Promise<void>
}
