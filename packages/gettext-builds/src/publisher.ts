import type { Logger } from './logging'
import type { Artifact, AssetPolicy, PublishReport, ReleaseHost, RemoteAsset, RemoteRelease } from './types'
import { readFile } from 'node:fs/promises'
import { NothingToPublishError, PublishFailedError } from './errors'
import { silentLogger } from './logging'

export interface PublishOptions {
  tagPrefix?: string
  draft?: boolean
  prerelease?: boolean
  assetPolicy?: AssetPolicy
  logger?: Logger
}

export function releaseTag(version: string, tagPrefix = ''): string {
  return `${tagPrefix}${version}`
}

export function releaseNotes(version: string, artifacts: readonly Artifact[]): string {
  const targets = [...new Set(artifacts.filter(a => a.target !== 'src').map(a => a.target))].sort()
  const lines = [
    `Prebuilt static binaries of GNU gettext ${version}.`,
    '',
    `Built from https://ftp.gnu.org/gnu/gettext/gettext-${version}.tar.gz`,
    '',
    '| Target | Asset |',
    '|--------|-------|',
    ...targets.map(target => `| ${target} | \`${version}-${target}.tar.gz\` |`),
    `| source | \`${version}-src.tar.gz\` |`,
  ]
  return lines.join('\n')
}

/**
 * Orders uploads so every target tarball goes before the source repackaging, which
 * several jobs of the same version produce under one name.
 */
function uploadPlan(artifacts: readonly Artifact[]): Artifact[] {
  const byName = new Map<string, Artifact>()
  for (const artifact of artifacts) {
    if (!byName.has(artifact.name))
      byName.set(artifact.name, artifact)
  }
  return [...byName.values()].sort((a, b) => Number(a.target === 'src') - Number(b.target === 'src') || a.name.localeCompare(b.name))
}

async function findOrCreateRelease(host: ReleaseHost, version: string, artifacts: readonly Artifact[], options: PublishOptions): Promise<{ release: RemoteRelease, created: boolean }> {
  const tag = releaseTag(version, options.tagPrefix)
  const existing = await host.findRelease(tag)
  if (existing)
    return { release: existing, created: false }

  const release = await host.createRelease({
    tag,
    name: `gettext ${version}`,
    body: releaseNotes(version, artifacts),
    draft: options.draft ?? false,
    prerelease: options.prerelease ?? false,
  })
  return { release, created: true }
}

/**
 * Creates or reuses the release for `version` and uploads its artifacts. Running it twice
 * with the same artifacts leaves one release with one copy of each asset.
 */
export async function publishRelease(
  version: string,
  artifacts: readonly Artifact[],
  host: ReleaseHost,
  options: PublishOptions = {},
): Promise<PublishReport> {
  const logger = options.logger ?? silentLogger
  const policy = options.assetPolicy ?? 'skip'

  if (!artifacts.some(a => a.target !== 'src'))
    throw new NothingToPublishError(version)

  try {
    const { release, created } = await findOrCreateRelease(host, version, artifacts, options)
    logger.info(created ? `📦 Created release ${release.tag}` : `📦 Reusing release ${release.tag}`)

    const remote = new Map<string, RemoteAsset>()
    for (const asset of await host.listAssets(release.id))
      remote.set(asset.name, asset)

    const report: PublishReport = { tag: release.tag, releaseId: release.id, created, uploaded: [], skipped: [], replaced: [] }

    for (const artifact of uploadPlan(artifacts)) {
      const current = remote.get(artifact.name)
      if (current && policy === 'skip') {
        logger.info(`   ⏭️  ${artifact.name} already uploaded`)
        report.skipped.push(artifact.name)
        continue
      }
      if (current) {
        await host.deleteAsset(current.id)
        report.replaced.push(artifact.name)
      }

      const data = await readFile(artifact.path)
      const uploaded = await host.uploadAsset(release.id, artifact.name, new Uint8Array(data))
      remote.set(uploaded.name, uploaded)
      report.uploaded.push(artifact.name)
      logger.info(`   ⬆️  ${artifact.name} (${(artifact.size / 1024 / 1024).toFixed(1)} MB)`)
    }

    return report
  }
  catch (error) {
    throw new PublishFailedError(version, error)
  }
}
