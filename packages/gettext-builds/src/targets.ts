import type { Toolchain } from './types'
import { UnknownTargetError } from './errors'

const STATIC_FLAGS = ['--disable-shared', '--enable-static']

/**
 * Target → toolchain table. Adding a platform means adding a row here;
 * `container/build.sh` consumes the row through the environment.
 */
export const TOOLCHAINS: Readonly<Record<string, Toolchain>> = {
  'linux-amd64': {
    target: 'linux-amd64',
    description: 'Linux x86_64 (native)',
    configureFlags: [...STATIC_FLAGS],
  },
  'linux-aarch64': {
    target: 'linux-aarch64',
    description: 'Linux arm64 (cross, GNU toolchain)',
    host: 'aarch64-linux-gnu',
    build: 'x86_64-linux-gnu',
    cc: 'aarch64-linux-gnu-gcc',
    cxx: 'aarch64-linux-gnu-g++',
    configureFlags: [...STATIC_FLAGS],
  },
  'windows-amd64': {
    target: 'windows-amd64',
    description: 'Windows x86_64 (cross, MinGW-w64)',
    host: 'x86_64-w64-mingw32',
    build: 'x86_64-linux-gnu',
    cc: 'x86_64-w64-mingw32-gcc',
    cxx: 'x86_64-w64-mingw32-g++',
    configureFlags: ['--target=x86_64-w64-mingw32', ...STATIC_FLAGS],
  },
}

export function knownTargets(): string[] {
  return Object.keys(TOOLCHAINS)
}

export function getToolchain(target: string): Toolchain {
  const toolchain = Object.hasOwn(TOOLCHAINS, target) ? TOOLCHAINS[target] : undefined
  if (!toolchain)
    throw new UnknownTargetError(target, knownTargets())
  return toolchain
}

/**
 * Resolves target names to toolchains, keeping the requested order and dropping duplicates.
 * Throws `UnknownTargetError` on the first unrecognized name.
 */
export function resolveTargets(names: readonly string[]): Toolchain[] {
  const seen = new Set<string>()
  const resolved: Toolchain[] = []
  for (const raw of names) {
    const name = raw.trim()
    if (!name || seen.has(name))
      continue
    seen.add(name)
    resolved.push(getToolchain(name))
  }
  return resolved
}

/** Environment handed to the compilation collaborator for one toolchain */
export function toolchainEnv(toolchain: Toolchain): Record<string, string> {
  const env: Record<string, string> = {
    CONFIGURE_FLAGS: toolchain.configureFlags.join(' '),
  }
  if (toolchain.host)
    env.BUILD_HOST = toolchain.host
  if (toolchain.build)
    env.BUILD_TRIPLE = toolchain.build
  if (toolchain.cc)
    env.CC = toolchain.cc
  if (toolchain.cxx)
    env.CXX = toolchain.cxx
  return env
}
