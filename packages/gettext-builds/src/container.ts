import type { Logger } from './logging'
import process from 'node:process'
import * as exec from '@actions/exec'
import { CancelledError, errorMessage } from './errors'
import { silentLogger } from './logging'

export interface Mount {
  source: string
  target: string
  readonly?: boolean
}

export interface ContainerRunSpec {
  /** Unique container name, used to kill it on cancellation */
  name: string
  image: string
  env: Record<string, string>
  mounts: Mount[]
  command: string[]
}

export interface ContainerResult {
  exitCode: number
  /** Tail of the combined stdout/stderr */
  output: string
}

/**
 * Executes the compilation collaborator. The call resolves once the container has exited.
 */
export interface ContainerRunner {
  run: (spec: ContainerRunSpec, signal?: AbortSignal) => Promise<ContainerResult>
}

const MAX_CAPTURED_OUTPUT = 64 * 1024

export function appendTail(buffer: string, chunk: string, limit = MAX_CAPTURED_OUTPUT): string {
  const next = buffer + chunk
  return next.length > limit ? next.slice(next.length - limit) : next
}

export interface DockerRunnerOptions {
  binary?: string
  /** Stream container output to the console as it arrives */
  verbose?: boolean
  logger?: Logger
}

export function dockerArgs(spec: ContainerRunSpec): string[] {
  const args = ['run', '--rm', '--init', '--name', spec.name]
  // Files written to the mounts must stay removable by the invoking user
  if (process.getuid && process.getgid)
    args.push('--user', `${process.getuid()}:${process.getgid()}`)
  for (const mount of spec.mounts)
    args.push('-v', `${mount.source}:${mount.target}${mount.readonly ? ':ro' : ''}`)
  for (const [key, value] of Object.entries(spec.env))
    args.push('-e', `${key}=${value}`)
  args.push(spec.image, ...spec.command)
  return args
}

export class DockerRunner implements ContainerRunner {
  private readonly binary: string
  private readonly logger: Logger

  constructor(private readonly options: DockerRunnerOptions = {}) {
    this.binary = options.binary ?? 'docker'
    this.logger = options.logger ?? silentLogger
  }

  async run(spec: ContainerRunSpec, signal?: AbortSignal): Promise<ContainerResult> {
    if (signal?.aborted)
      throw new CancelledError(`container ${spec.name}`)

    let output = ''
    const onAbort = () => {
      this.logger.warn(`Stopping container ${spec.name}`)
      exec.exec(this.binary, ['kill', spec.name], { ignoreReturnCode: true, silent: true })
        .catch(error => this.logger.warn(`Could not stop ${spec.name}: ${errorMessage(error)}`))
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const exitCode = await exec.exec(this.binary, dockerArgs(spec), {
        ignoreReturnCode: true,
        silent: !this.options.verbose,
        listeners: {
          stdout: (data: Buffer) => {
            output = appendTail(output, data.toString())
          },
          stderr: (data: Buffer) => {
            output = appendTail(output, data.toString())
          },
        },
      })
      return { exitCode, output }
    }
    finally {
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
