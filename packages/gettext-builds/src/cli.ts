import type { BuildsConfig } from './types'
import path from 'node:path'
import { isVerifyMode } from './config'
import { ConfigInvalidError } from './errors'

/** Options of the default command as cac hands them over */
export interface BuildCommandOptions {
  targets?: string
  dryRun?: boolean
  localOnly?: boolean
  mirror?: string
  verify?: string
  concurrency?: string | number
  jobs?: string | number
  output?: string
  repo?: string
  image?: string
  overwriteAssets?: boolean
  draft?: boolean
  verbose?: boolean
}

function toCount(name: string, value: string | number, problems: string[]): number | undefined {
  const count = typeof value === 'number' ? value : Number(value.trim())
  if (!Number.isInteger(count) || count < 1) {
    problems.push(`--${name} must be a positive integer (got ${value})`)
    return undefined
  }
  return count
}

/**
 * Translates command-line flags into configuration overrides. Flags that were not given
 * leave the environment-derived defaults alone.
 */
export function overridesFromOptions(options: BuildCommandOptions): Partial<BuildsConfig> {
  const overrides: Partial<BuildsConfig> = {}
  const problems: string[] = []

  if (options.targets !== undefined)
    overrides.targets = String(options.targets).split(',').map(t => t.trim()).filter(Boolean)
  if (options.mirror !== undefined)
    overrides.mirror = String(options.mirror).trim()
  if (options.verify !== undefined) {
    if (isVerifyMode(options.verify))
      overrides.verify = options.verify
    else
      problems.push(`--verify must be one of strict, allow-insecure, skip (got ${options.verify})`)
  }
  const concurrency = options.concurrency === undefined ? undefined : toCount('concurrency', options.concurrency, problems)
  if (concurrency !== undefined)
    overrides.concurrency = concurrency
  const jobs = options.jobs === undefined ? undefined : toCount('jobs', options.jobs, problems)
  if (jobs !== undefined)
    overrides.jobs = jobs
  if (options.output !== undefined)
    overrides.outputDir = path.resolve(String(options.output))
  if (options.repo !== undefined)
    overrides.repository = String(options.repo)
  if (options.image !== undefined)
    overrides.image = String(options.image)
  if (options.overwriteAssets)
    overrides.assetPolicy = 'overwrite'
  if (options.dryRun)
    overrides.dryRun = true
  if (options.localOnly)
    overrides.localOnly = true
  if (options.draft)
    overrides.draft = true
  if (options.verbose)
    overrides.verbose = true

  if (problems.length > 0)
    throw new ConfigInvalidError(problems)
  return overrides
}
