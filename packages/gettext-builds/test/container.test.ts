import type { ContainerRunSpec } from '../src/container'
import process from 'node:process'
import * as exec from '@actions/exec'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { appendTail, dockerArgs, DockerRunner } from '../src/container'
import { CancelledError } from '../src/errors'

vi.mock('@actions/exec', () => ({ exec: vi.fn(), getExecOutput: vi.fn() }))

const execMock = vi.mocked(exec.exec)

const spec: ContainerRunSpec = {
  name: 'gettext-build-0.22.5-linux-amd64-abcd',
  image: 'gettext-buildenv:test',
  env: { GETTEXT_VERSION: '0.22.5', BUILD_TARGET: 'linux-amd64' },
  mounts: [
    { source: '/tmp/sandbox/out', target: '/out' },
    { source: '/tmp/sandbox/src/gettext-0.22.5.tar.gz', target: '/tmp/gettext-0.22.5.tar.gz', readonly: true },
  ],
  command: ['bash', '/usr/local/bin/gettext-build.sh'],
}

describe('Container runner', () => {
  afterEach(() => {
    execMock.mockReset()
  })

  it('should translate a run spec into docker arguments', () => {
    const user = process.getuid && process.getgid ? ['--user', `${process.getuid()}:${process.getgid()}`] : []

    expect(dockerArgs(spec)).toEqual([
      'run',
      '--rm',
      '--init',
      '--name',
      'gettext-build-0.22.5-linux-amd64-abcd',
      ...user,
      '-v',
      '/tmp/sandbox/out:/out',
      '-v',
      '/tmp/sandbox/src/gettext-0.22.5.tar.gz:/tmp/gettext-0.22.5.tar.gz:ro',
      '-e',
      'GETTEXT_VERSION=0.22.5',
      '-e',
      'BUILD_TARGET=linux-amd64',
      'gettext-buildenv:test',
      'bash',
      '/usr/local/bin/gettext-build.sh',
    ])
  })

  it('should keep only the tail of long output', () => {
    expect(appendTail('abcdef', 'ghij', 5)).toBe('fghij')
    expect(appendTail('ab', 'cd', 5)).toBe('abcd')
  })

  it('should capture output and the exit code', async () => {
    execMock.mockImplementation(async (_command, _args, options) => {
      options?.listeners?.stdout?.(Buffer.from('checking for gcc... gcc\n'))
      options?.listeners?.stderr?.(Buffer.from('warning: deprecated\n'))
      return 0
    })

    const result = await new DockerRunner().run(spec)

    expect(result).toEqual({ exitCode: 0, output: 'checking for gcc... gcc\nwarning: deprecated\n' })
    expect(execMock).toHaveBeenCalledTimes(1)
    expect(execMock.mock.calls[0][0]).toBe('docker')
    expect(execMock.mock.calls[0][2]).toMatchObject({ ignoreReturnCode: true, silent: true })
  })

  it('should kill the container when the run is aborted', async () => {
    let finish: (code: number) => void = () => {}
    execMock.mockImplementation(async (_command, args) => {
      if (args?.[0] === 'kill') {
        finish(137)
        return 0
      }
      return new Promise<number>((resolve) => {
        finish = resolve
      })
    })
    const controller = new AbortController()

    const running = new DockerRunner({ binary: 'podman' }).run(spec, controller.signal)
    controller.abort()
    const result = await running

    expect(result.exitCode).toBe(137)
    expect(execMock).toHaveBeenCalledWith('podman', ['kill', 'gettext-build-0.22.5-linux-amd64-abcd'], { ignoreReturnCode: true, silent: true })
  })

  it('should not start a container once aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(new DockerRunner().run(spec, controller.signal)).rejects.toBeInstanceOf(CancelledError)
    expect(execMock).not.toHaveBeenCalled()
  })
})
