import type { AssetPolicy, BuildsConfig, VerifyMode } from './types'
import { availableParallelism, tmpdir } from 'node:os'
import path from 'node:path'
import process from 'node:process'
import { ConfigInvalidError } from './errors'
import { TOOLCHAINS } from './targets'

// ftp.gnu.org goes last since it's often slow
export const DEFAULT_MIRRORS: readonly string[] = [
  'https://mirrors.ocf.berkeley.edu/gnu/gettext',
  'https://mirror.dogado.de/gnu/gettext',
  'https://mirror.checkdomain.de/gnu/gettext',
  'https://ftp.cc.uoc.gr/mirrors/gnu/gettext',
  'https://ftpmirror.gnu.org/gettext',
  'https://ftp.gnu.org/gnu/gettext',
]

export const DEFAULT_INDEX_URLS: readonly string[] = [
  'https://ftp.gnu.org/gnu/gettext/',
  'https://ftpmirror.gnu.org/gettext/',
  'https://mirrors.ocf.berkeley.edu/gnu/gettext/',
  'https://mirror.dogado.de/gnu/gettext/',
  'https://mirror.checkdomain.de/gnu/gettext/',
  'https://ftp.cc.uoc.gr/mirrors/gnu/gettext/',
]

export const DEFAULT_KEYSERVERS: readonly string[] = [
  'hkps://keyserver.ubuntu.com',
  'hkps://keys.openpgp.org',
  'hkps://pgp.mit.edu',
]

// Bruno Haible, gettext maintainer
export const TRUSTED_KEYS: readonly string[] = [
  'B6301D9E1BBEAC08',
  'F5BE8B267C6A406D',
  '4F494A942E4616C2',
]

export const DEFAULT_IMAGE = 'gettext-buildenv:latest'

const VERIFY_MODES: readonly VerifyMode[] = ['strict', 'allow-insecure', 'skip']
const ASSET_POLICIES: readonly AssetPolicy[] = ['skip', 'overwrite']

export function isVerifyMode(value: string): value is VerifyMode {
  return VERIFY_MODES.some(mode => mode === value)
}

export function isAssetPolicy(value: string): value is AssetPolicy {
  return ASSET_POLICIES.some(policy => policy === value)
}

export function isCI(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.CI === 'true' || env.GITHUB_ACTIONS === 'true'
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined)
    return undefined
  return value.split(',').map(item => item.trim()).filter(Boolean)
}

function envInt(value: string | undefined, fallback: number): number {
  return value ? Number.parseInt(value, 10) : fallback
}

/**
 * Builds a configuration from environment variables. Numbers that fail to parse come
 * through as NaN, and unknown modes are kept in `invalidEnv`; `validateConfig` reports both.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): BuildsConfig {
  const verify = env.GETTEXT_BUILDS_VERIFY || 'strict'
  const assetPolicy = env.GETTEXT_BUILDS_ASSET_POLICY || 'skip'
  const invalidEnv: NonNullable<BuildsConfig['invalidEnv']> = {}
  if (!isVerifyMode(verify))
    invalidEnv.verify = verify
  if (!isAssetPolicy(assetPolicy))
    invalidEnv.assetPolicy = assetPolicy

  return {
    repository: env.GETTEXT_BUILDS_REPOSITORY || env.GITHUB_REPOSITORY || '',
    token: env.GITHUB_TOKEN || env.GH_TOKEN || '',
    tagPrefix: env.GETTEXT_BUILDS_TAG_PREFIX || '',
    targets: splitList(env.GETTEXT_BUILDS_TARGETS) ?? Object.keys(TOOLCHAINS),
    mirror: env.GETTEXT_MIRROR || '',
    mirrors: splitList(env.GETTEXT_BUILDS_MIRRORS) ?? [...DEFAULT_MIRRORS],
    indexUrls: splitList(env.GETTEXT_BUILDS_INDEX_URLS) ?? [...DEFAULT_INDEX_URLS],
    keyservers: splitList(env.GETTEXT_BUILDS_KEYSERVERS) ?? [...DEFAULT_KEYSERVERS],
    trustedKeys: [...TRUSTED_KEYS],
    verify: isVerifyMode(verify) ? verify : 'strict',
    concurrency: envInt(env.GETTEXT_BUILDS_CONCURRENCY, 1),
    jobs: envInt(env.GETTEXT_BUILDS_JOBS, availableParallelism()),
    dryRun: env.GETTEXT_BUILDS_DRY_RUN === 'true',
    localOnly: env.GETTEXT_BUILDS_LOCAL_ONLY === 'true',
    outputDir: path.resolve(env.GETTEXT_BUILDS_OUTPUT_DIR || 'out'),
    workDir: env.GETTEXT_BUILDS_WORK_DIR || path.join(tmpdir(), 'gettext-builds'),
    image: env.GETTEXT_BUILDS_IMAGE || DEFAULT_IMAGE,
    assetPolicy: isAssetPolicy(assetPolicy) ? assetPolicy : 'skip',
    draft: env.GETTEXT_BUILDS_DRAFT === 'true',
    prerelease: env.GETTEXT_BUILDS_PRERELEASE === 'true',
    download: {
      attempts: envInt(env.GETTEXT_BUILDS_DOWNLOAD_ATTEMPTS, 3),
      timeoutMs: envInt(env.GETTEXT_BUILDS_DOWNLOAD_TIMEOUT, 30000),
      retryDelayMs: envInt(env.GETTEXT_BUILDS_DOWNLOAD_RETRY_DELAY, 2000),
    },
    verbose: env.GETTEXT_BUILDS_VERBOSE === 'true' || isCI(env),
    quiet: false,
    invalidEnv,
  }
}

export interface ConfigValidationResult {
  valid: boolean
  errors: string[]
}

export function validateConfig(config: BuildsConfig): ConfigValidationResult {
  const errors: string[] = []

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1)
    errors.push(`concurrency must be a positive integer (got ${config.concurrency})`)
  if (!Number.isInteger(config.jobs) || config.jobs < 1)
    errors.push(`jobs must be a positive integer (got ${config.jobs})`)
  if (!Number.isInteger(config.download.attempts) || config.download.attempts < 1)
    errors.push(`download attempts must be a positive integer (got ${config.download.attempts})`)
  if (!Number.isFinite(config.download.timeoutMs) || config.download.timeoutMs <= 0)
    errors.push(`download timeout must be positive (got ${config.download.timeoutMs})`)
  if (!Number.isFinite(config.download.retryDelayMs) || config.download.retryDelayMs < 0)
    errors.push(`download retry delay must not be negative (got ${config.download.retryDelayMs})`)
  if (config.targets.length === 0)
    errors.push('at least one target is required')
  if (config.mirror && !/^https?:\/\//.test(config.mirror))
    errors.push(`mirror must be an http(s) URL (got ${config.mirror})`)
  if (config.invalidEnv?.verify !== undefined)
    errors.push(`GETTEXT_BUILDS_VERIFY must be one of ${VERIFY_MODES.join(', ')} (got ${config.invalidEnv.verify})`)
  if (config.invalidEnv?.assetPolicy !== undefined)
    errors.push(`GETTEXT_BUILDS_ASSET_POLICY must be one of ${ASSET_POLICIES.join(', ')} (got ${config.invalidEnv.assetPolicy})`)
  if (config.verify !== 'skip' && config.keyservers.length === 0)
    errors.push('signature verification needs at least one keyserver')

  if (config.repository && !/^[\w.-]+\/[\w.-]+$/.test(config.repository))
    errors.push(`repository must look like owner/name (got "${config.repository}")`)
  // Local builds don't need a release host; dry runs still read existing releases
  if (!config.localOnly) {
    if (!config.repository)
      errors.push('repository is required unless running with --local-only')
    if (!config.token && !config.dryRun)
      errors.push('GITHUB_TOKEN is required to publish releases')
  }

  return { valid: errors.length === 0, errors }
}

export function resolveConfig(overrides: Partial<BuildsConfig> = {}, base: BuildsConfig = defaultConfig): BuildsConfig {
  const config: BuildsConfig = {
    ...base,
    ...overrides,
    download: { ...base.download, ...overrides.download },
  }
  // A flag replaces whatever the environment said
  const invalidEnv = { ...base.invalidEnv, ...overrides.invalidEnv }
  if (overrides.verify !== undefined)
    delete invalidEnv.verify
  if (overrides.assetPolicy !== undefined)
    delete invalidEnv.assetPolicy
  config.invalidEnv = invalidEnv
  const validation = validateConfig(config)
  if (!validation.valid)
    throw new ConfigInvalidError(validation.errors)
  return config
}

export const defaultConfig: BuildsConfig = configFromEnv()
