import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { overridesFromOptions } from '../src/cli'
import { configFromEnv, DEFAULT_MIRRORS, isCI, resolveConfig, validateConfig } from '../src/config'
import { ConfigInvalidError } from '../src/errors'

describe('Configuration', () => {
  it('should fall back to defaults with an empty environment', () => {
    const config = configFromEnv({})

    expect(config.verify).toBe('strict')
    expect(config.assetPolicy).toBe('skip')
    expect(config.concurrency).toBe(1)
    expect(config.jobs).toBeGreaterThanOrEqual(1)
    expect(config.mirror).toBe('')
    expect(config.mirrors).toEqual([...DEFAULT_MIRRORS])
    expect(config.mirrors[config.mirrors.length - 1]).toBe('https://ftp.gnu.org/gnu/gettext')
    expect(config.targets).toEqual(['linux-amd64', 'linux-aarch64', 'windows-amd64'])
    expect(config.download).toEqual({ attempts: 3, timeoutMs: 30000, retryDelayMs: 2000 })
    expect(config.tagPrefix).toBe('')
    expect(config.verbose).toBe(false)
  })

  it('should read settings from the environment', () => {
    const config = configFromEnv({
      GITHUB_REPOSITORY: 'octo/gettext-builds',
      GITHUB_TOKEN: 'test-secret',
      GETTEXT_MIRROR: 'https://mirror.test/gettext',
      GETTEXT_BUILDS_TARGETS: 'linux-amd64, windows-amd64',
      GETTEXT_BUILDS_VERIFY: 'allow-insecure',
      GETTEXT_BUILDS_CONCURRENCY: '2',
      GETTEXT_BUILDS_ASSET_POLICY: 'overwrite',
      CI: 'true',
    })

    expect(config.repository).toBe('octo/gettext-builds')
    expect(config.token).toBe('test-secret')
    expect(config.mirror).toBe('https://mirror.test/gettext')
    expect(config.targets).toEqual(['linux-amd64', 'windows-amd64'])
    expect(config.verify).toBe('allow-insecure')
    expect(config.concurrency).toBe(2)
    expect(config.assetPolicy).toBe('overwrite')
    expect(config.verbose).toBe(true)
  })

  it('should detect CI environments', () => {
    expect(isCI({ GITHUB_ACTIONS: 'true' })).toBe(true)
    expect(isCI({})).toBe(false)
  })

  describe('validation', () => {
    const base = configFromEnv({ GITHUB_REPOSITORY: 'octo/gettext-builds', GITHUB_TOKEN: 'test-secret' })

    it('should accept the defaults when a repository and token are set', () => {
      expect(validateConfig(base)).toEqual({ valid: true, errors: [] })
    })

    it('should report unparsable numbers', () => {
      const config = configFromEnv({ GITHUB_REPOSITORY: 'octo/gettext-builds', GITHUB_TOKEN: 'test-secret', GETTEXT_BUILDS_JOBS: 'many' })
      expect(validateConfig(config).errors).toEqual(['jobs must be a positive integer (got NaN)'])
    })

    it('should report unknown modes from the environment', () => {
      const config = configFromEnv({
        GITHUB_REPOSITORY: 'octo/gettext-builds',
        GITHUB_TOKEN: 'test-secret',
        GETTEXT_BUILDS_VERIFY: 'lenient',
        GETTEXT_BUILDS_ASSET_POLICY: 'replace',
      })

      expect(validateConfig(config).errors).toEqual([
        'GETTEXT_BUILDS_VERIFY must be one of strict, allow-insecure, skip (got lenient)',
        'GETTEXT_BUILDS_ASSET_POLICY must be one of skip, overwrite (got replace)',
      ])
      expect(() => resolveConfig({}, config)).toThrow(ConfigInvalidError)
      expect(resolveConfig({ verify: 'skip', assetPolicy: 'overwrite' }, config).verify).toBe('skip')
    })

    it('should require a token only when publishing', () => {
      const config = { ...base, token: '' }
      expect(validateConfig(config).errors).toEqual(['GITHUB_TOKEN is required to publish releases'])
      expect(validateConfig({ ...config, dryRun: true }).valid).toBe(true)
      expect(validateConfig({ ...config, repository: '', localOnly: true }).valid).toBe(true)
    })

    it('should throw ConfigInvalid from resolveConfig', () => {
      expect(() => resolveConfig({ concurrency: 0 }, base)).toThrow(ConfigInvalidError)
      expect(() => resolveConfig({ repository: 'not a repo' }, base)).toThrow('repository must look like owner/name (got "not a repo")')
    })

    it('should merge download overrides with the base', () => {
      const config = resolveConfig({ download: { attempts: 5, timeoutMs: 1000, retryDelayMs: 0 } }, base)
      expect(config.download).toEqual({ attempts: 5, timeoutMs: 1000, retryDelayMs: 0 })
      expect(config.repository).toBe('octo/gettext-builds')
    })
  })

  describe('command-line flags', () => {
    it('should map flags onto configuration keys', () => {
      expect(overridesFromOptions({
        targets: 'linux-amd64,windows-amd64',
        dryRun: true,
        verify: 'skip',
        concurrency: 2,
        jobs: '4',
        output: 'dist/out',
        repo: 'octo/gettext-builds',
        overwriteAssets: true,
      })).toEqual({
        targets: ['linux-amd64', 'windows-amd64'],
        dryRun: true,
        verify: 'skip',
        concurrency: 2,
        jobs: 4,
        outputDir: path.resolve('dist/out'),
        repository: 'octo/gettext-builds',
        assetPolicy: 'overwrite',
      })
    })

    it('should leave unset flags out', () => {
      expect(overridesFromOptions({})).toEqual({})
    })

    it('should reject bad values together', () => {
      expect(() => overridesFromOptions({ verify: 'maybe', jobs: 0 })).toThrow(
        'Invalid configuration: --verify must be one of strict, allow-insecure, skip (got maybe); --jobs must be a positive integer (got 0)',
      )
    })
  })
})
