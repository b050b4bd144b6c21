import process from 'node:process'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, withScope } from '../src/logging'

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
  })

  it('should only print debug lines when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    createLogger().debug('hidden')
    createLogger({ verbose: true }).debug('shown')

    expect(log.mock.calls).toEqual([['🔍 shown']])
  })

  it('should keep warnings and errors when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const logger = createLogger({ quiet: true })

    logger.info('progress')
    logger.success('done')
    logger.warn('careful')
    logger.error('broken')

    expect(log).not.toHaveBeenCalled()
    expect(warn.mock.calls).toEqual([['⚠️  careful']])
    expect(error.mock.calls).toEqual([['❌ broken']])
  })

  it('should prefix scoped messages', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    withScope(createLogger(), '0.22.5').success('built')

    expect(log.mock.calls).toEqual([['✅ [0.22.5] built']])
  })

  it('should wrap groups in workflow commands on GitHub Actions', async () => {
    vi.stubEnv('GITHUB_ACTIONS', 'true')
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

    const value = await createLogger().group('Build output', async () => 42)

    expect(value).toBe(42)
    const written = write.mock.calls.map(call => String(call[0])).filter(line => line.startsWith('::'))
    expect(written).toEqual(['::group::Build output\n', '::endgroup::\n'])
  })
})
