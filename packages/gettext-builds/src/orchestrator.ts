import type { VersionSource } from './builder'
import type { ContainerRunner } from './container'
import type { Logger } from './logging'
import type { GpgRunner } from './signature'
import type {
  BuildJobResult,
  BuildsConfig,
  DownloadedSource,
  ReleaseHost,
  RunSummary,
  Toolchain,
  VerificationResult,
  VersionOutcome,
} from './types'
import { rm } from 'node:fs/promises'
import path from 'node:path'
import pLimit from 'p-limit'
import { BuildJob, runBuildJob } from './builder'
import {
  asBuildError,
  CancelledError,
  ConfigInvalidError,
  NothingToPublishError,
  PublishFailedError,
} from './errors'
import { silentLogger, withScope } from './logging'
import { fetchTarball } from './mirrors'
import { publishRelease } from './publisher'
import { verifyTarball } from './signature'
import { resolveTargets } from './targets'
import { isVersion, listMissingVersions, sortVersions } from './versions'

export interface OrchestratorDeps {
  /** Required unless the run is local-only or a dry run */
  host?: ReleaseHost
  runner: ContainerRunner
  gpg?: GpgRunner
  logger?: Logger
  signal?: AbortSignal
}

type Limit = ReturnType<typeof pLimit>

function memoize<T>(fn: () => Promise<T>): () => Promise<T> {
  let promise: Promise<T> | undefined
  return () => {
    if (!promise)
      promise = fn()
    return promise
  }
}

/**
 * The versions a run works on: the requested ones, or every upstream version without a
 * release when none are requested. Newest first either way.
 */
export async function planVersions(config: BuildsConfig, deps: OrchestratorDeps, requested: readonly string[] = []): Promise<string[]> {
  const logger = deps.logger ?? silentLogger

  if (requested.length > 0) {
    const invalid = requested.filter(version => !isVersion(version))
    if (invalid.length > 0)
      throw new ConfigInvalidError(invalid.map(version => `"${version}" is not a version`))
    return sortVersions(requested)
  }

  logger.info('🔍 Checking for missing gettext versions...')
  const { upstream, published, missing } = await listMissingVersions({
    indexUrls: config.indexUrls,
    timeoutMs: config.download.timeoutMs,
    signal: deps.signal,
    logger,
    host: deps.host,
    tagPrefix: config.tagPrefix,
  })
  logger.info(`   ${upstream.length} upstream, ${published.length} published, ${missing.length} missing`)
  return missing
}

function createVersionSource(
  version: string,
  downloadDir: string,
  config: BuildsConfig,
  deps: OrchestratorDeps,
  logger: Logger,
  onVerified: (result: VerificationResult) => void,
): VersionSource {
  const tarball = memoize((): Promise<DownloadedSource> => {
    logger.info(`📥 Downloading gettext ${version}...`)
    return fetchTarball(version, downloadDir, {
      ...config.download,
      mirror: config.mirror,
      mirrors: config.mirrors,
      signal: deps.signal,
      logger,
    })
  })

  const verification = memoize(async (): Promise<VerificationResult> => {
    const source = await tarball()
    const result = await verifyTarball(source, {
      ...config.download,
      mode: config.verify,
      keyservers: config.keyservers,
      keys: config.trustedKeys,
      workDir: downloadDir,
      gpg: deps.gpg,
      signal: deps.signal,
      logger,
    })
    onVerified(result)
    return result
  })

  return { tarball, verification }
}

async function processVersion(
  version: string,
  toolchains: readonly Toolchain[],
  jobLimit: Limit,
  config: BuildsConfig,
  deps: OrchestratorDeps,
): Promise<VersionOutcome> {
  const logger = withScope(deps.logger ?? silentLogger, version)
  const downloadDir = path.join(config.workDir, 'downloads', version)
  let verification: VerificationResult | undefined
  const source = createVersionSource(version, downloadDir, config, deps, logger, (result) => {
    verification = result
  })

  logger.info(`📦 Processing gettext ${version} (${toolchains.map(t => t.target).join(', ')})`)

  let jobs: BuildJobResult[]
  try {
    jobs = await Promise.all(toolchains.map(toolchain => jobLimit(() => runBuildJob(new BuildJob(version, toolchain), {
      source,
      runner: deps.runner,
      image: config.image,
      mirror: config.mirror,
      workDir: path.join(config.workDir, 'jobs'),
      outputDir: config.outputDir,
      signal: deps.signal,
      logger,
    }))))
  }
  finally {
    await rm(downloadDir, { recursive: true, force: true })
  }

  const outcome: VersionOutcome = { version, status: 'failed', verification, jobs }

  if (deps.signal?.aborted) {
    outcome.status = 'cancelled'
    outcome.error = new CancelledError(`gettext ${version}`)
    return outcome
  }

  if (!jobs.some(job => job.status === 'succeeded')) {
    outcome.error = new NothingToPublishError(version)
    logger.error(outcome.error.message)
    return outcome
  }

  if (config.localOnly || !deps.host) {
    outcome.status = 'built'
    return outcome
  }

  try {
    outcome.publish = await publishRelease(version, jobs.flatMap(job => job.artifacts), deps.host, {
      tagPrefix: config.tagPrefix,
      draft: config.draft,
      prerelease: config.prerelease,
      assetPolicy: config.assetPolicy,
      logger,
    })
    outcome.status = 'published'
    logger.success(`Published ${outcome.publish.tag} (${outcome.publish.uploaded.length} uploaded, ${outcome.publish.skipped.length} skipped)`)
  }
  catch (error) {
    outcome.status = 'publish-failed'
    outcome.error = asBuildError(error, message => new PublishFailedError(version, message))
    logger.error(outcome.error.message)
  }
  return outcome
}

export function exitCodeFor(outcomes: readonly VersionOutcome[]): number {
  return outcomes.some(o => o.status === 'failed' || o.status === 'publish-failed' || o.status === 'cancelled') ? 1 : 0
}

/**
 * Runs the release workflow: work set → fetch and verify once per version → one build job
 * per target → publish. Per-version failures end up in the summary; only problems that
 * stop the whole run (bad targets or configuration, an unavailable listing) throw.
 */
export async function runReleases(config: BuildsConfig, deps: OrchestratorDeps, requested: readonly string[] = []): Promise<RunSummary> {
  const logger = deps.logger ?? silentLogger

  // Before any network or sandbox cost
  const toolchains = resolveTargets(config.targets)
  if (toolchains.length === 0)
    throw new ConfigInvalidError(['at least one target is required'])
  if (!config.localOnly && !config.dryRun && !deps.host)
    throw new ConfigInvalidError(['a release host is required unless running with --local-only'])

  const versions = await planVersions(config, deps, requested)

  if (versions.length === 0) {
    logger.success('Nothing to build, every upstream version has a release')
    return { versions: [], dryRun: config.dryRun, localOnly: config.localOnly, exitCode: 0 }
  }

  if (config.dryRun) {
    logger.info(`🧪 Dry run: would build ${versions.join(', ')} for ${toolchains.map(t => t.target).join(', ')}`)
    return {
      versions: versions.map(version => ({ version, status: 'planned', jobs: [] })),
      dryRun: true,
      localOnly: config.localOnly,
      exitCode: 0,
    }
  }

  const versionLimit = pLimit(config.concurrency)
  const jobLimit = pLimit(config.jobs)
  const outcomes = await Promise.all(versions.map(version => versionLimit(() => processVersion(version, toolchains, jobLimit, config, deps))))

  return {
    versions: outcomes,
    dryRun: false,
    localOnly: config.localOnly,
    exitCode: exitCodeFor(outcomes),
  }
}
