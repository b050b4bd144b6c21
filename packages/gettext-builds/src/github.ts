import type { CreateReleaseInput, ReleaseHost, RemoteAsset, RemoteRelease } from './types'
import { fetchWithTimeout } from './http'

export interface GitHubReleaseHostOptions {
  apiUrl?: string
  uploadUrl?: string
  timeoutMs?: number
}

export class GitHubApiError extends Error {
  constructor(readonly status: number, readonly endpoint: string, detail: string) {
    super(`GitHub API ${status} for ${endpoint}${detail ? `: ${detail}` : ''}`)
    this.name = 'GitHubApiError'
  }
}

const PER_PAGE = 100

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function field<T>(record: Record<string, unknown>, key: string, check: (value: unknown) => value is T): T {
  const value = record[key]
  if (!check(value))
    throw new TypeError(`Unexpected GitHub response: "${key}" is missing or malformed`)
  return value
}

const isNumber = (value: unknown): value is number => typeof value === 'number'
const isString = (value: unknown): value is string => typeof value === 'string'
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean'

function toRelease(value: unknown): RemoteRelease {
  if (!isRecord(value))
    throw new TypeError('Unexpected GitHub response: release is not an object')
  return {
    id: field(value, 'id', isNumber),
    tag: field(value, 'tag_name', isString),
    name: isString(value.name) ? value.name : '',
    draft: field(value, 'draft', isBoolean),
    url: isString(value.html_url) ? value.html_url : '',
  }
}

function toAsset(value: unknown): RemoteAsset {
  if (!isRecord(value))
    throw new TypeError('Unexpected GitHub response: asset is not an object')
  return {
    id: field(value, 'id', isNumber),
    name: field(value, 'name', isString),
    size: field(value, 'size', isNumber),
  }
}

function toList<T>(value: unknown, convert: (item: unknown) => T): T[] {
  if (!Array.isArray(value))
    throw new TypeError('Unexpected GitHub response: expected a list')
  return value.map(convert)
}

/**
 * Release host backed by the GitHub REST API.
 */
export class GitHubReleaseHost implements ReleaseHost {
  private readonly apiUrl: string
  private readonly uploadUrl: string
  private readonly timeoutMs: number

  constructor(readonly repository: string, private readonly token: string, options: GitHubReleaseHostOptions = {}) {
    this.apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '')
    this.uploadUrl = (options.uploadUrl ?? 'https://uploads.github.com').replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 60000
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github.v3+json',
      'User-Agent': 'gettext-builds',
      'X-GitHub-Api-Version': '2022-11-28',
      ...extra,
    }
    if (this.token)
      headers.Authorization = `token ${this.token}`
    return headers
  }

  private async request(
    method: string,
    url: string,
    body?: RequestInit['body'],
    extraHeaders?: Record<string, string>,
  ): Promise<{ status: number, data: unknown }> {
    const endpoint = `${method} ${url.replace(this.apiUrl, '').replace(this.uploadUrl, '')}`
    return fetchWithTimeout(url, { method, body, headers: this.headers(extraHeaders), timeoutMs: this.timeoutMs }, async (response) => {
      if (response.status === 404)
        return { status: 404, data: null }
      if (!response.ok)
        throw new GitHubApiError(response.status, endpoint, (await response.text()).slice(0, 500))
      if (response.status === 204)
        return { status: 204, data: null }
      const data: unknown = await response.json()
      return { status: response.status, data }
    })
  }

  private repoUrl(path: string): string {
    return `${this.apiUrl}/repos/${this.repository}${path}`
  }

  private async listReleases(): Promise<RemoteRelease[]> {
    const releases: RemoteRelease[] = []
    for (let page = 1; ; page++) {
      const { status, data } = await this.request('GET', this.repoUrl(`/releases?per_page=${PER_PAGE}&page=${page}`))
      if (status === 404)
        throw new GitHubApiError(404, `GET /repos/${this.repository}/releases`, 'repository not found')
      const batch = toList(data, toRelease)
      releases.push(...batch)
      if (batch.length < PER_PAGE)
        return releases
    }
  }

  async listReleaseTags(): Promise<string[]> {
    return (await this.listReleases()).map(release => release.tag)
  }

  /**
   * The tag endpoint answers 404 for drafts, so a miss falls back to the
   * authenticated release listing, which includes them.
   */
  async findRelease(tag: string): Promise<RemoteRelease | null> {
    const { status, data } = await this.request('GET', this.repoUrl(`/releases/tags/${encodeURIComponent(tag)}`))
    if (status !== 404)
      return toRelease(data)
    return (await this.listReleases()).find(release => release.tag === tag) ?? null
  }

  async createRelease(input: CreateReleaseInput): Promise<RemoteRelease> {
    const { status, data } = await this.request('POST', this.repoUrl('/releases'), JSON.stringify({
      tag_name: input.tag,
      name: input.name,
      body: input.body,
      draft: input.draft,
      prerelease: input.prerelease,
    }), { 'Content-Type': 'application/json' })
    if (status === 404)
      throw new GitHubApiError(404, `POST /repos/${this.repository}/releases`, 'repository not found')
    return toRelease(data)
  }

  async listAssets(releaseId: number): Promise<RemoteAsset[]> {
    const assets: RemoteAsset[] = []
    for (let page = 1; ; page++) {
      const { status, data } = await this.request('GET', this.repoUrl(`/releases/${releaseId}/assets?per_page=${PER_PAGE}&page=${page}`))
      if (status === 404)
        throw new GitHubApiError(404, `GET /repos/${this.repository}/releases/${releaseId}/assets`, 'release not found')
      const batch = toList(data, toAsset)
      assets.push(...batch)
      if (batch.length < PER_PAGE)
        return assets
    }
  }

  async uploadAsset(releaseId: number, name: string, data: Uint8Array): Promise<RemoteAsset> {
    const url = `${this.uploadUrl}/repos/${this.repository}/releases/${releaseId}/assets?name=${encodeURIComponent(name)}`
    const response = await this.request('POST', url, new Blob([data]), { 'Content-Type': 'application/gzip' })
    if (response.status === 404)
      throw new GitHubApiError(404, `POST /repos/${this.repository}/releases/${releaseId}/assets`, 'release not found')
    return toAsset(response.data)
  }

  async deleteAsset(assetId: number): Promise<void> {
    await this.request('DELETE', this.repoUrl(`/releases/assets/${assetId}`))
  }
}
