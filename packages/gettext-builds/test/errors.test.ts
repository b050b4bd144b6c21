import { describe, expect, it } from 'vitest'
import {
  asBuildError,
  CancelledError,
  DownloadExhaustedError,
  GettextBuildError,
  isGettextBuildError,
  KeyImportFailedError,
  throwIfAborted,
} from '../src/errors'

describe('Errors', () => {
  it('should name errors after their kind', () => {
    const error = new DownloadExhaustedError('gettext-9.9.9.tar.gz', [
      { mirror: 'https://a.test', url: 'https://a.test/gettext-9.9.9.tar.gz', attempts: 1, error: 'HTTP 404' },
    ])

    expect(error.name).toBe('DownloadExhaustedError')
    expect(error.kind).toBe('DownloadExhausted')
    expect(error.message).toBe('Failed to download gettext-9.9.9.tar.gz from all mirrors (tried: https://a.test)')
  })

  it('should narrow by kind', () => {
    const error: unknown = new KeyImportFailedError(['AAAA1111'], [])

    expect(isGettextBuildError(error)).toBe(true)
    expect(isGettextBuildError(error, 'KeyImportFailed')).toBe(true)
    expect(isGettextBuildError(error, 'SignatureInvalid')).toBe(false)
    expect(isGettextBuildError(new Error('plain'))).toBe(false)
  })

  it('should keep typed errors and wrap anything else', () => {
    const typed = new CancelledError('building')
    const cause = new Error('disk full')
    const fallback = (message: string) => new GettextBuildError('BuildFailed', message)

    expect(asBuildError(typed, fallback)).toBe(typed)
    const wrapped = asBuildError(cause, fallback)
    expect(wrapped.kind).toBe('BuildFailed')
    expect(wrapped.message).toBe('disk full')
    expect(wrapped.cause).toBe(cause)
    expect(asBuildError('just a string', fallback).message).toBe('just a string')
  })

  it('should throw Cancelled only once aborted', () => {
    const controller = new AbortController()

    expect(() => throwIfAborted(controller.signal, 'fetching')).not.toThrow()
    controller.abort()
    expect(() => throwIfAborted(controller.signal, 'fetching')).toThrow('Cancelled during fetching')
  })
})
