export interface FetchWithTimeoutOptions {
  timeoutMs: number
  signal?: AbortSignal
  method?: string
  headers?: Record<string, string>
  body?: RequestInit['body']
}

export class RequestTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms: ${url}`)
    this.name = 'RequestTimeoutError'
  }
}

/**
 * `fetch` with a per-request deadline that also follows an outer abort signal.
 * The deadline covers the body as well, so callers read it before returning.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: FetchWithTimeoutOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController()
  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, options.timeoutMs)
  const onAbort = () => controller.abort()
  options.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      redirect: 'follow',
      signal: controller.signal,
    })
    return await read(response)
  }
  catch (error) {
    if (timedOut)
      throw new RequestTimeoutError(url, options.timeoutMs)
    throw error
  }
  finally {
    clearTimeout(timer)
    options.signal?.removeEventListener('abort', onAbort)
  }
}

/** Statuses worth another attempt against the same host */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted)
    return Promise.resolve()
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    signal?.addEventListener('abort', done, { once: true })
  })
}
