import type { Logger } from './logging'
import type { DownloadedFile, DownloadedSource, RetryOptions } from './types'
import type { MirrorAttempt } from './errors'
import { createHash, randomBytes } from 'node:crypto'
import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { CancelledError, DownloadExhaustedError, errorMessage } from './errors'
import { fetchWithTimeout, isTransientStatus, RequestTimeoutError, sleep } from './http'
import { silentLogger } from './logging'

export interface FetchFileOptions extends RetryOptions {
  signal?: AbortSignal
  logger?: Logger
}

export interface FetchTarballOptions extends FetchFileOptions {
  /** Primary override, tried before `mirrors` */
  mirror?: string
  mirrors: readonly string[]
}

class HttpStatusError extends Error {
  constructor(readonly status: number, url: string) {
    super(`HTTP ${status} for ${url}`)
    this.name = 'HttpStatusError'
  }
}

class TruncatedTransferError extends Error {
  constructor(expected: number, received: number) {
    super(`Incomplete transfer: expected ${expected} bytes, received ${received}`)
    this.name = 'TruncatedTransferError'
  }
}

export function tarballName(version: string): string {
  return `gettext-${version}.tar.gz`
}

/**
 * The mirrors to try, in order: the primary override first, then the fallbacks.
 * Empty entries are dropped and a mirror listed twice is only tried once.
 */
export function mirrorList(primary: string | undefined, fallbacks: readonly string[]): string[] {
  const seen = new Set<string>()
  const mirrors: string[] = []
  for (const entry of [primary ?? '', ...fallbacks]) {
    const mirror = entry.trim().replace(/\/+$/, '')
    if (!mirror || seen.has(mirror))
      continue
    seen.add(mirror)
    mirrors.push(mirror)
  }
  return mirrors
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError)
    return isTransientStatus(error.status)
  // Timeouts, resets and truncated bodies are all worth another try
  return error instanceof RequestTimeoutError || error instanceof TruncatedTransferError || error instanceof TypeError
}

/**
 * Downloads `url` to `dest` in a single attempt. The body lands in a temporary file next to
 * `dest` and is renamed into place only once complete.
 */
export async function fetchFile(url: string, dest: string, options: Pick<FetchFileOptions, 'timeoutMs' | 'signal'>): Promise<Omit<DownloadedFile, 'mirror'>> {
  const data = await fetchWithTimeout(url, { timeoutMs: options.timeoutMs, signal: options.signal }, async (response) => {
    if (!response.ok)
      throw new HttpStatusError(response.status, url)
    const body = new Uint8Array(await response.arrayBuffer())
    const declared = response.headers.get('content-length')
    // fetch transparently decodes Content-Encoding, after which the header no longer matches
    if (declared && !response.headers.get('content-encoding') && Number(declared) !== body.byteLength)
      throw new TruncatedTransferError(Number(declared), body.byteLength)
    return body
  })

  await mkdir(path.dirname(dest), { recursive: true })
  const temp = `${dest}.${randomBytes(6).toString('hex')}.partial`
  try {
    await writeFile(temp, data)
    await rename(temp, dest)
  }
  catch (error) {
    await rm(temp, { force: true })
    throw error
  }

  return {
    path: dest,
    url,
    bytes: data.byteLength,
    sha256: createHash('sha256').update(data).digest('hex'),
  }
}

export type MirrorFetchResult =
  | { ok: true, file: DownloadedFile }
  | { ok: false, attempt: MirrorAttempt }

/**
 * Tries one mirror up to `attempts` times with `retryDelayMs` between tries. Permanent
 * failures (404 and other non-transient statuses) end the mirror after the first try.
 */
export async function fetchFromMirror(mirror: string, fileName: string, dest: string, options: FetchFileOptions): Promise<MirrorFetchResult> {
  const logger = options.logger ?? silentLogger
  const url = `${mirror}/${fileName}`
  let lastError = 'not attempted'
  let made = 0

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    if (options.signal?.aborted)
      throw new CancelledError(`download of ${fileName}`)
    made = attempt
    try {
      const file = await fetchFile(url, dest, options)
      return { ok: true, file: { ...file, mirror } }
    }
    catch (error) {
      if (options.signal?.aborted)
        throw new CancelledError(`download of ${fileName}`)
      lastError = errorMessage(error)
      logger.debug(`   attempt ${attempt}/${options.attempts} for ${url} failed: ${lastError}`)
      if (!isRetryable(error))
        break
      if (attempt < options.attempts)
        await sleep(options.retryDelayMs, options.signal)
    }
  }

  return { ok: false, attempt: { mirror, url, attempts: made, error: lastError } }
}

/**
 * Downloads `gettext-{version}.tar.gz` into `destDir` from the first mirror that delivers
 * it completely. Throws `DownloadExhaustedError` once every mirror has used its attempts.
 */
export async function fetchTarball(version: string, destDir: string, options: FetchTarballOptions): Promise<DownloadedSource> {
  const logger = options.logger ?? silentLogger
  const fileName = tarballName(version)
  const dest = path.join(destDir, fileName)
  const failures: MirrorAttempt[] = []

  for (const mirror of mirrorList(options.mirror, options.mirrors)) {
    logger.info(`   Trying ${mirror}/${fileName}...`)
    const result = await fetchFromMirror(mirror, fileName, dest, options)
    if (result.ok) {
      logger.info(`   ✓ Downloaded ${fileName} from ${mirror} (${result.file.bytes} bytes)`)
      return { ...result.file, version }
    }
    logger.info(`   ✗ Failed to download from ${mirror}: ${result.attempt.error}`)
    failures.push(result.attempt)
  }

  throw new DownloadExhaustedError(fileName, failures)
}
