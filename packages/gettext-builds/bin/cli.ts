#!/usr/bin/env tsx
/* eslint-disable no-console */
import type { BuildCommandOptions } from '../src/cli'
import type { BuildsConfig } from '../src/types'
import process from 'node:process'
import { CAC } from 'cac'
import packageJson from '../package.json'
import { overridesFromOptions } from '../src/cli'
import { defaultConfig, resolveConfig } from '../src/config'
import { DockerRunner } from '../src/container'
import { errorMessage } from '../src/errors'
import { GitHubReleaseHost } from '../src/github'
import { createLogger } from '../src/logging'
import { runReleases } from '../src/orchestrator'
import { printSummary, writeJobSummary } from '../src/summary'
import { TOOLCHAINS } from '../src/targets'
import { listMissingVersions, listUpstreamVersions } from '../src/versions'

const cli = new CAC('gettext-builds')

cli.version(packageJson.version)
cli.help()

/**
 * SIGINT/SIGTERM abort the run: running containers are killed, sandboxes removed and
 * nothing more is published. A second signal exits at once.
 */
function abortOnSignals(): AbortSignal {
  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted)
      process.exit(130)
    console.warn(`\n⚠️  Received ${signal}, stopping running builds (press again to exit immediately)`)
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
  return controller.signal
}

function releaseHost(config: BuildsConfig): GitHubReleaseHost | undefined {
  return config.repository ? new GitHubReleaseHost(config.repository, config.token, { timeoutMs: config.download.timeoutMs }) : undefined
}

function fail(error: unknown): never {
  console.error(`❌ ${errorMessage(error)}`)
  process.exit(1)
}

cli
  .command('[...versions]', 'Build and publish gettext versions (every missing version when none are given)')
  .option('--targets <list>', 'Comma-separated targets to build')
  .option('--dry-run', 'Show what would be built without building or publishing')
  .option('--local-only', 'Build into the output directory without publishing')
  .option('--mirror <url>', 'Primary mirror, tried before the fallback mirrors')
  .option('--verify <mode>', 'Signature verification: strict, allow-insecure or skip')
  .option('--concurrency <n>', 'Versions processed at the same time')
  .option('--jobs <n>', 'Build jobs running at the same time across all versions')
  .option('--output <dir>', 'Directory receiving the built artifacts')
  .option('--repo <owner/name>', 'Repository that hosts the releases')
  .option('--image <image>', 'Container image running the build')
  .option('--overwrite-assets', 'Replace release assets that already exist')
  .option('--draft', 'Create new releases as drafts')
  .option('--verbose', 'Enable verbose output')
  .example('gettext-builds --dry-run')
  .example('gettext-builds 0.22.5 --targets linux-amd64 --local-only')
  .action(async (versions: string[], options: BuildCommandOptions) => {
    try {
      const config = resolveConfig(overridesFromOptions(options))
      const logger = createLogger({ verbose: config.verbose, quiet: config.quiet })
      const summary = await runReleases(config, {
        host: releaseHost(config),
        runner: new DockerRunner({ verbose: config.verbose, logger }),
        logger,
        signal: abortOnSignals(),
      }, versions)

      printSummary(summary)
      await writeJobSummary(summary)
      process.exit(summary.exitCode)
    }
    catch (error) {
      fail(error)
    }
  })

cli
  .command('versions', 'List upstream gettext versions, newest first')
  .action(async () => {
    try {
      const versions = await listUpstreamVersions({ indexUrls: defaultConfig.indexUrls, timeoutMs: defaultConfig.download.timeoutMs })
      for (const version of versions)
        console.log(version)
    }
    catch (error) {
      fail(error)
    }
  })

cli
  .command('missing', 'List upstream versions that have no release yet')
  .option('--repo <owner/name>', 'Repository that hosts the releases')
  .action(async (options: Pick<BuildCommandOptions, 'repo'>) => {
    try {
      const config: BuildsConfig = { ...defaultConfig, ...(options.repo ? { repository: options.repo } : {}) }
      const { missing } = await listMissingVersions({
        indexUrls: config.indexUrls,
        timeoutMs: config.download.timeoutMs,
        host: releaseHost(config),
        tagPrefix: config.tagPrefix,
      })
      for (const version of missing)
        console.log(version)
    }
    catch (error) {
      fail(error)
    }
  })

cli
  .command('targets', 'List the supported build targets')
  .action(() => {
    for (const toolchain of Object.values(TOOLCHAINS)) {
      console.log(`${toolchain.target.padEnd(16)} ${toolchain.description}`)
      if (toolchain.host)
        console.log(`${''.padEnd(16)} host=${toolchain.host} build=${toolchain.build ?? 'native'} cc=${toolchain.cc ?? 'cc'}`)
    }
  })

cli.parse()
