import type { Logger } from './logging'
import type { ReleaseHost } from './types'
import { errorMessage, ListingUnavailableError } from './errors'
import { fetchWithTimeout } from './http'
import { silentLogger } from './logging'

const VERSION_PATTERN = /^\d+(?:\.\d+)*$/
const LISTING_PATTERN = /gettext-(\d+(?:\.\d+)*)\.tar\.gz(\.sig)?(?![\w.-])/g

export function isVersion(value: string): boolean {
  return VERSION_PATTERN.test(value)
}

/** Compare dotted numeric versions. Returns <0 if a<b, 0 if a==b, >0 if a>b */
export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(Number)
  const pb = b.split('.').map(Number)
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const na = pa[i] || 0
    const nb = pb[i] || 0
    if (na !== nb) return na - nb
  }
  return 0
}

/** Newest first, duplicates removed */
export function sortVersions(versions: Iterable<string>): string[] {
  return [...new Set(versions)].sort((a, b) => compareVersions(b, a))
}

/**
 * Extracts tarball versions from a GNU-style directory index. Signature files and
 * non-numeric names such as `gettext-latest.tar.gz` are ignored.
 */
export function parseVersionListing(html: string): string[] {
  const versions = new Set<string>()
  for (const match of html.matchAll(LISTING_PATTERN)) {
    if (!match[2])
      versions.add(match[1])
  }
  return sortVersions(versions)
}

/**
 * Versions in `upstream` that have no release yet, newest first.
 */
export function diffVersions(upstream: Iterable<string>, existing: Iterable<string>): string[] {
  const published = new Set(existing)
  return sortVersions([...upstream].filter(version => !published.has(version)))
}

export interface ListUpstreamOptions {
  indexUrls: readonly string[]
  timeoutMs: number
  signal?: AbortSignal
  logger?: Logger
}

/**
 * Reads the upstream directory index, trying each index URL in order. A page without any
 * versions counts as a failure, so an unreachable upstream never looks like "nothing new".
 */
export async function listUpstreamVersions(options: ListUpstreamOptions): Promise<string[]> {
  const logger = options.logger ?? silentLogger
  const failures: string[] = []

  for (const url of options.indexUrls.filter(Boolean)) {
    logger.debug(`Trying ${url}...`)
    try {
      const html = await fetchWithTimeout(url, { timeoutMs: options.timeoutMs, signal: options.signal }, async (response) => {
        if (!response.ok)
          throw new Error(`HTTP ${response.status}`)
        return response.text()
      })
      const versions = parseVersionListing(html)
      if (versions.length > 0) {
        logger.debug(`✓ Found ${versions.length} versions at ${url}`)
        return versions
      }
      failures.push(`${url}: no versions found`)
      logger.warn(`No versions found at ${url}`)
    }
    catch (error) {
      if (options.signal?.aborted)
        throw error
      failures.push(`${url}: ${errorMessage(error)}`)
      logger.debug(`✗ Failed to fetch ${url}: ${errorMessage(error)}`)
    }
  }

  throw new ListingUnavailableError('upstream', failures)
}

export async function listPublishedVersions(host: ReleaseHost, tagPrefix = ''): Promise<string[]> {
  let tags: string[]
  try {
    tags = await host.listReleaseTags()
  }
  catch (error) {
    throw new ListingUnavailableError('releases', [errorMessage(error)])
  }

  const versions = tags
    .filter(tag => tag.startsWith(tagPrefix))
    .map(tag => tag.slice(tagPrefix.length))
    .filter(isVersion)
  return sortVersions(versions)
}

export interface ListMissingOptions extends ListUpstreamOptions {
  /** Omitted when nothing is published yet or publishing is disabled */
  host?: ReleaseHost
  tagPrefix?: string
}

export interface MissingVersions {
  upstream: string[]
  published: string[]
  missing: string[]
}

export async function listMissingVersions(options: ListMissingOptions): Promise<MissingVersions> {
  const [upstream, published] = await Promise.all([
    listUpstreamVersions(options),
    options.host ? listPublishedVersions(options.host, options.tagPrefix) : Promise.resolve([]),
  ])
  return { upstream, published, missing: diffVersions(upstream, published) }
}
