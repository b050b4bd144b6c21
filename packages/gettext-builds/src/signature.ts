import type { FetchFileOptions } from './mirrors'
import type { DownloadedSource, VerificationResult, VerifyMode } from './types'
import type { KeyserverFailure } from './errors'
import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import path from 'node:path'
import * as exec from '@actions/exec'
import {
  CancelledError,
  DownloadExhaustedError,
  errorMessage,
  KeyImportFailedError,
  SignatureInvalidError,
} from './errors'
import { silentLogger } from './logging'
import { fetchFromMirror } from './mirrors'

export interface GpgResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Runs one GnuPG command against an isolated home directory.
 */
export interface GpgRunner {
  run: (args: string[], options: { homedir: string }) => Promise<GpgResult>
}

export class ExecGpgRunner implements GpgRunner {
  constructor(private readonly binary = 'gpg') {}

  async run(args: string[], options: { homedir: string }): Promise<GpgResult> {
    const { exitCode, stdout, stderr } = await exec.getExecOutput(
      this.binary,
      ['--batch', '--no-tty', '--homedir', options.homedir, ...args],
      { ignoreReturnCode: true, silent: true },
    )
    return { exitCode, stdout, stderr }
  }
}

export interface VerifyOptions extends FetchFileOptions {
  mode: VerifyMode
  keyservers: readonly string[]
  keys: readonly string[]
  /** Directory for the signature's temporary GnuPG home */
  workDir: string
  gpg?: GpgRunner
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n').filter(Boolean)
  return lines[lines.length - 1] ?? ''
}

/**
 * Imports `keys`, trying each keyserver in order until one provides all of them.
 * Returns the keyserver that succeeded.
 */
export async function importKeys(
  gpg: GpgRunner,
  homedir: string,
  keyservers: readonly string[],
  keys: readonly string[],
  signal?: AbortSignal,
): Promise<string> {
  const failures: KeyserverFailure[] = []

  for (const keyserver of keyservers) {
    if (signal?.aborted)
      throw new CancelledError('key import')
    try {
      const received = await gpg.run(['--keyserver', keyserver, '--recv-keys', ...keys], { homedir })
      if (received.exitCode !== 0) {
        failures.push({ keyserver, error: lastLine(received.stderr) || `gpg exited with code ${received.exitCode}` })
        continue
      }
      // --recv-keys can succeed with only part of the keys; make sure every key is there
      const listed = await gpg.run(['--list-keys', ...keys], { homedir })
      if (listed.exitCode !== 0) {
        failures.push({ keyserver, error: lastLine(listed.stderr) || 'some keys were not imported' })
        continue
      }
      return keyserver
    }
    catch (error) {
      failures.push({ keyserver, error: errorMessage(error) })
    }
  }

  throw new KeyImportFailedError([...keys], failures)
}

async function verifyWithKeys(source: DownloadedSource, options: VerifyOptions): Promise<string> {
  const logger = options.logger ?? silentLogger
  const gpg = options.gpg ?? new ExecGpgRunner()
  const fileName = path.basename(source.path)
  const sigName = `${fileName}.sig`

  // Same mirror as the tarball, so both come from one snapshot
  const signature = await fetchFromMirror(source.mirror, sigName, `${source.path}.sig`, options)
  if (!signature.ok)
    throw new DownloadExhaustedError(sigName, [signature.attempt])

  await mkdir(options.workDir, { recursive: true })
  const homedir = await mkdtemp(path.join(options.workDir, 'gnupg-'))
  try {
    logger.debug(`Importing GPG keys: ${options.keys.join(', ')}`)
    const keyserver = await importKeys(gpg, homedir, options.keyservers, options.keys, options.signal)
    logger.debug(`GPG keys imported from ${keyserver}`)

    const result = await gpg.run(['--verify', signature.file.path, source.path], { homedir })
    if (result.exitCode !== 0)
      throw new SignatureInvalidError(fileName, lastLine(result.stderr) || `gpg exited with code ${result.exitCode}`)
    return keyserver
  }
  finally {
    await rm(homedir, { recursive: true, force: true })
  }
}

/**
 * Checks the detached signature of a downloaded tarball.
 *
 * - `strict`: any failure throws (`SignatureInvalid`, `KeyImportFailed`, or
 *   `DownloadExhausted` for the signature file).
 * - `allow-insecure`: the same failures are logged and returned as `unverified-allowed`,
 *   keeping the failure as the reason.
 * - `skip`: nothing is downloaded and no keyserver is contacted.
 */
export async function verifyTarball(source: DownloadedSource, options: VerifyOptions): Promise<VerificationResult> {
  const logger = options.logger ?? silentLogger

  if (options.mode === 'skip') {
    logger.warn(`Skipping GPG verification of gettext ${source.version}`)
    return { status: 'skipped' }
  }

  try {
    const keyserver = await verifyWithKeys(source, options)
    logger.info(`   ✓ Signature verified for gettext-${source.version}.tar.gz`)
    return { status: 'verified', keyserver }
  }
  catch (error) {
    if (options.mode === 'allow-insecure'
      && (error instanceof SignatureInvalidError || error instanceof KeyImportFailedError || error instanceof DownloadExhaustedError)) {
      logger.warn(`${error.message}; continuing because insecure builds are allowed`)
      return { status: 'unverified-allowed', reason: error }
    }
    throw error
  }
}
