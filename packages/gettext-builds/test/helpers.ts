import type { ContainerResult, ContainerRunner, ContainerRunSpec } from '../src/container'
import type { GpgResult, GpgRunner } from '../src/signature'
import type { CreateReleaseInput, ReleaseHost, RemoteAsset, RemoteRelease } from '../src/types'
import { createHash } from 'node:crypto'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { vi } from 'vitest'

export function makeTempDir(prefix = 'gettext-builds-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function sha256(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

type RouteHandler = (init?: RequestInit) => Response | Promise<Response>

/**
 * Replaces the global fetch. Unknown URLs answer 404; every requested URL is recorded.
 */
export function stubFetch(routes: Record<string, RouteHandler>) {
  const calls: string[] = []
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    calls.push(url)
    const handler = routes[url]
    return handler ? handler(init) : new Response('Not Found', { status: 404 })
  })
  vi.stubGlobal('fetch', fetchMock)
  return { calls, fetchMock }
}

/** A response that never arrives, failing only when the request is aborted */
export function hangingResponse(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
  })
}

/** Signature files understood by `FakeGpg`: the sha256 of the signed content */
export function fakeSignature(content: string | Uint8Array): string {
  return sha256(content)
}

/**
 * In-process GnuPG. Keyservers listed in `failingKeyservers` refuse to hand out keys;
 * `--verify` succeeds when the signature file holds the tarball's sha256.
 */
export class FakeGpg implements GpgRunner {
  readonly calls: string[][] = []
  readonly homedirs = new Set<string>()

  constructor(private readonly failingKeyservers: string[] = []) {}

  async run(args: string[], options: { homedir: string }): Promise<GpgResult> {
    this.calls.push(args)
    this.homedirs.add(options.homedir)

    if (args[0] === '--keyserver') {
      const keyserver = args[1]
      if (this.failingKeyservers.includes(keyserver))
        return { exitCode: 2, stdout: '', stderr: `gpg: keyserver receive failed: No route to host (${keyserver})` }
      return { exitCode: 0, stdout: '', stderr: 'gpg: Total number processed: 3' }
    }
    if (args[0] === '--list-keys')
      return { exitCode: 0, stdout: 'pub   rsa4096', stderr: '' }
    if (args[0] === '--verify') {
      const signature = fs.readFileSync(args[1], 'utf8').trim()
      const content = fs.readFileSync(args[2])
      return signature === sha256(content)
        ? { exitCode: 0, stdout: '', stderr: 'gpg: Good signature from "Bruno Haible"' }
        : { exitCode: 1, stdout: '', stderr: 'gpg: BAD signature from "Bruno Haible"' }
    }
    return { exitCode: 2, stdout: '', stderr: `unsupported: ${args.join(' ')}` }
  }

  get keyserversContacted(): string[] {
    return this.calls.filter(args => args[0] === '--keyserver').map(args => args[1])
  }
}

export function mountSource(spec: ContainerRunSpec, target: string): string {
  const mount = spec.mounts.find(m => m.target === target)
  if (!mount)
    throw new Error(`no mount at ${target}`)
  return mount.source
}

type BuildBehaviour = (spec: ContainerRunSpec, outDir: string) => ContainerResult | Promise<ContainerResult>

/** Writes both expected tarballs and exits 0 */
export const succeedingBuild: BuildBehaviour = (spec, outDir) => {
  const version = spec.env.GETTEXT_VERSION
  fs.writeFileSync(path.join(outDir, `${version}-${spec.env.BUILD_TARGET}.tar.gz`), `binaries ${version} ${spec.env.BUILD_TARGET}`)
  fs.writeFileSync(path.join(outDir, `${version}-src.tar.gz`), `sources ${version}`)
  return { exitCode: 0, output: 'Build completed successfully!' }
}

/**
 * In-process container runner; the behaviour decides what ends up in `/out`.
 * Behaviours can be set per target.
 */
export class FakeContainerRunner implements ContainerRunner {
  readonly specs: ContainerRunSpec[] = []

  constructor(
    private readonly behaviour: BuildBehaviour = succeedingBuild,
    private readonly perTarget: Record<string, BuildBehaviour> = {},
  ) {}

  async run(spec: ContainerRunSpec): Promise<ContainerResult> {
    this.specs.push(spec)
    const behaviour = this.perTarget[spec.env.BUILD_TARGET] ?? this.behaviour
    return behaviour(spec, mountSource(spec, '/out'))
  }
}

export interface StoredAsset extends RemoteAsset {
  content: string
}

/**
 * Release host kept in memory. `failOn` makes the named operation throw.
 */
export class MemoryReleaseHost implements ReleaseHost {
  readonly releases: (RemoteRelease & { body: string, prerelease: boolean })[] = []
  readonly assets = new Map<number, StoredAsset[]>()
  readonly operations: string[] = []
  private nextId = 1

  constructor(private readonly failOn: string[] = []) {}

  private record(operation: string): void {
    this.operations.push(operation)
    if (this.failOn.includes(operation))
      throw new Error(`${operation} unavailable`)
  }

  async listReleaseTags(): Promise<string[]> {
    this.record('listReleaseTags')
    return this.releases.map(release => release.tag)
  }

  async findRelease(tag: string): Promise<RemoteRelease | null> {
    this.record('findRelease')
    return this.releases.find(release => release.tag === tag) ?? null
  }

  async createRelease(input: CreateReleaseInput): Promise<RemoteRelease> {
    this.record('createRelease')
    const release = {
      id: this.nextId++,
      tag: input.tag,
      name: input.name,
      draft: input.draft,
      url: `https://example.test/releases/${input.tag}`,
      body: input.body,
      prerelease: input.prerelease,
    }
    this.releases.push(release)
    this.assets.set(release.id, [])
    return release
  }

  async listAssets(releaseId: number): Promise<RemoteAsset[]> {
    this.record('listAssets')
    return (this.assets.get(releaseId) ?? []).map(({ id, name, size }) => ({ id, name, size }))
  }

  async uploadAsset(releaseId: number, name: string, data: Uint8Array): Promise<RemoteAsset> {
    this.record('uploadAsset')
    const list = this.assets.get(releaseId)
    if (!list)
      throw new Error(`release ${releaseId} not found`)
    const asset = { id: this.nextId++, name, size: data.byteLength, content: Buffer.from(data).toString('utf8') }
    list.push(asset)
    return { id: asset.id, name, size: asset.size }
  }

  async deleteAsset(assetId: number): Promise<void> {
    this.record('deleteAsset')
    for (const [releaseId, list] of this.assets)
      this.assets.set(releaseId, list.filter(asset => asset.id !== assetId))
  }

  assetNames(tag: string): string[] {
    const release = this.releases.find(r => r.tag === tag)
    return release ? (this.assets.get(release.id) ?? []).map(asset => asset.name).sort() : []
  }
}
