/* eslint-disable no-console */
import process from 'node:process'
import * as core from '@actions/core'

export interface Logger {
  info: (message: string) => void
  success: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  debug: (message: string) => void
  /** Runs `fn` inside a collapsible log group when running on GitHub Actions */
  group: <T>(title: string, fn: () => Promise<T>) => Promise<T>
}

export interface LoggerOptions {
  verbose?: boolean
  quiet?: boolean
}

function inGitHubActions(): boolean {
  return process.env.GITHUB_ACTIONS === 'true'
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const quiet = options.quiet ?? false

  return {
    info: (message) => {
      if (!quiet)
        console.log(message)
    },
    success: (message) => {
      if (!quiet)
        console.log(`✅ ${message}`)
    },
    warn: message => console.warn(`⚠️  ${message}`),
    error: message => console.error(`❌ ${message}`),
    debug: (message) => {
      if (options.verbose && !quiet)
        console.log(`🔍 ${message}`)
    },
    group: async (title, fn) => {
      if (!inGitHubActions())
        return fn()
      core.startGroup(title)
      try {
        return await fn()
      }
      finally {
        core.endGroup()
      }
    },
  }
}

/** Prefixes every message of `logger` with `[scope]` */
export function withScope(logger: Logger, scope: string): Logger {
  const tag = (message: string) => `[${scope}] ${message}`
  return {
    info: message => logger.info(tag(message)),
    success: message => logger.success(tag(message)),
    warn: message => logger.warn(tag(message)),
    error: message => logger.error(tag(message)),
    debug: message => logger.debug(tag(message)),
    group: (title, fn) => logger.group(tag(title), fn),
  }
}

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  group: async (_title, fn) => fn(),
}
