import type { ContainerRunner, ContainerRunSpec } from './container'
import type { Logger } from './logging'
import type { Sandbox } from './sandbox'
import type {
  Artifact,
  BuildJobResult,
  BuildJobState,
  DownloadedSource,
  StateTransition,
  Toolchain,
  VerificationResult,
} from './types'
import { randomBytes } from 'node:crypto'
import { copyFile, mkdir, rename, stat } from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import {
  ArtifactMissingError,
  asBuildError,
  BuildFailedError,
  CancelledError,
  GettextBuildError,
  throwIfAborted,
} from './errors'
import { silentLogger } from './logging'
import { withSandbox } from './sandbox'
import { toolchainEnv } from './targets'

export const BUILD_SCRIPT = fileURLToPath(new URL('../container/build.sh', import.meta.url))

const FORWARD: readonly BuildJobState[] = ['pending', 'fetching', 'verifying', 'building', 'packaging', 'succeeded']
const MAX_ERROR_OUTPUT = 4000

export function isTerminal(state: BuildJobState): boolean {
  return state === 'succeeded' || state === 'failed'
}

/**
 * One (version, target) compilation attempt. States only move forward one step at a time,
 * or to `failed` from any non-terminal state. There is no way back: a retry is a new job.
 */
export class BuildJob {
  private current: BuildJobState = 'pending'
  private readonly history: StateTransition[] = []

  constructor(readonly version: string, readonly toolchain: Toolchain) {}

  get target(): string {
    return this.toolchain.target
  }

  get id(): string {
    return `${this.version}/${this.target}`
  }

  get state(): BuildJobState {
    return this.current
  }

  get transitions(): StateTransition[] {
    return [...this.history]
  }

  advance(next: BuildJobState): void {
    if (isTerminal(this.current))
      throw new Error(`Build job ${this.id} is already ${this.current}`)
    if (next !== 'failed' && FORWARD.indexOf(next) !== FORWARD.indexOf(this.current) + 1)
      throw new Error(`Build job ${this.id} cannot move from ${this.current} to ${next}`)
    this.history.push({ from: this.current, to: next, at: new Date() })
    this.current = next
  }
}

/**
 * Per-version source shared read-only by that version's jobs. Both are memoised, so the
 * tarball is downloaded and verified once however many targets are built.
 */
export interface VersionSource {
  tarball: () => Promise<DownloadedSource>
  verification: () => Promise<VerificationResult>
}

export interface DispatchOptions {
  source: VersionSource
  runner: ContainerRunner
  image: string
  /** Passed to the collaborator as GETTEXT_MIRROR */
  mirror: string
  /** Parent directory for job sandboxes */
  workDir: string
  /** Artifacts end up in `{outputDir}/{version}/` */
  outputDir: string
  scriptPath?: string
  signal?: AbortSignal
  logger?: Logger
}

export function artifactNames(version: string, target: string): { target: string, src: string } {
  return {
    target: `${version}-${target}.tar.gz`,
    src: `${version}-src.tar.gz`,
  }
}

export function containerSpec(job: BuildJob, sandbox: Sandbox, stagedTarball: string, options: DispatchOptions): ContainerRunSpec {
  const tarballInContainer = `/tmp/gettext-${job.version}.tar.gz`
  const env: Record<string, string> = {
    GETTEXT_VERSION: job.version,
    BUILD_TARGET: job.target,
    GETTEXT_TARBALL: tarballInContainer,
    ...toolchainEnv(job.toolchain),
  }
  if (options.mirror)
    env.GETTEXT_MIRROR = options.mirror

  return {
    name: `gettext-build-${job.version}-${job.target}-${randomBytes(4).toString('hex')}`,
    image: options.image,
    env,
    mounts: [
      { source: sandbox.workDir, target: '/tmp/build' },
      { source: sandbox.installDir, target: '/tmp/install' },
      { source: sandbox.outDir, target: '/out' },
      { source: stagedTarball, target: tarballInContainer, readonly: true },
      { source: options.scriptPath ?? BUILD_SCRIPT, target: '/usr/local/bin/gettext-build.sh', readonly: true },
    ],
    command: ['bash', '/usr/local/bin/gettext-build.sh'],
  }
}

async function nonEmptyFile(file: string): Promise<boolean> {
  try {
    const info = await stat(file)
    return info.isFile() && info.size > 0
  }
  catch {
    return false
  }
}

/**
 * Moves the two expected tarballs out of the sandbox. The collaborator's exit status is not
 * trusted on its own: both files have to exist and be non-empty.
 */
export async function collectArtifacts(version: string, target: string, outDir: string, destDir: string): Promise<Artifact[]> {
  const names = artifactNames(version, target)
  const expected = [
    { name: names.target, target },
    { name: names.src, target: 'src' },
  ]

  const present = await Promise.all(expected.map(entry => nonEmptyFile(path.join(outDir, entry.name))))
  const missing = expected.filter((_, i) => !present[i]).map(entry => entry.name)
  if (missing.length > 0)
    throw new ArtifactMissingError(version, target, missing)

  await mkdir(destDir, { recursive: true })
  const artifacts: Artifact[] = []
  for (const entry of expected) {
    const from = path.join(outDir, entry.name)
    const to = path.join(destDir, entry.name)
    // Copy then rename: the sandbox may live on another filesystem, and sibling
    // jobs write the same src tarball name
    const temp = `${to}.${randomBytes(4).toString('hex')}.partial`
    await copyFile(from, temp)
    await rename(temp, to)
    const { size } = await stat(to)
    artifacts.push({ name: entry.name, path: to, version, target: entry.target, size })
  }
  return artifacts
}

function tail(output: string, limit = MAX_ERROR_OUTPUT): string {
  return output.length > limit ? output.slice(output.length - limit) : output
}

/**
 * Runs one build job to a terminal state inside its own sandbox. Never throws: the
 * failure, with the state it happened in, is part of the result.
 */
export async function runBuildJob(job: BuildJob, options: DispatchOptions): Promise<BuildJobResult> {
  const logger = options.logger ?? silentLogger
  const { signal } = options
  const started = Date.now()

  try {
    const artifacts = await withSandbox(options.workDir, `${job.version}-${job.target}`, async (sandbox) => {
      throwIfAborted(signal, 'fetching')
      job.advance('fetching')
      const source = await options.source.tarball()
      const staged = path.join(sandbox.srcDir, path.basename(source.path))
      await copyFile(source.path, staged)

      throwIfAborted(signal, 'verifying')
      job.advance('verifying')
      await options.source.verification()

      throwIfAborted(signal, 'building')
      job.advance('building')
      logger.info(`🔨 Building gettext ${job.version} for ${job.target}`)
      const spec = containerSpec(job, sandbox, staged, options)
      const result = await logger.group(`Build output ${job.id}`, () => options.runner.run(spec, signal))
      if (signal?.aborted)
        throw new CancelledError('building')
      if (result.exitCode !== 0)
        throw new BuildFailedError(job.version, job.target, result.exitCode, tail(result.output))

      job.advance('packaging')
      return collectArtifacts(job.version, job.target, sandbox.outDir, path.join(options.outputDir, job.version))
    })

    job.advance('succeeded')
    logger.success(`${job.id} built (${artifacts.map(a => a.name).join(', ')})`)
    return {
      version: job.version,
      target: job.target,
      status: 'succeeded',
      artifacts,
      transitions: job.transitions,
      durationMs: Date.now() - started,
    }
  }
  catch (caught) {
    const failedAt = job.state
    const error = asBuildError(caught, message => new GettextBuildError('BuildFailed', message))
    if (!isTerminal(job.state))
      job.advance('failed')
    logger.error(`${job.id} failed while ${failedAt}: ${error.message}`)
    if (error instanceof BuildFailedError && error.output)
      logger.info(error.output)
    return {
      version: job.version,
      target: job.target,
      status: 'failed',
      failedAt,
      error,
      artifacts: [],
      transitions: job.transitions,
      durationMs: Date.now() - started,
    }
  }
}
