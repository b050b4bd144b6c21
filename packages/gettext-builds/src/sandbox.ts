import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import path from 'node:path'

/**
 * Filesystem half of a build sandbox. Every job gets a fresh one and nothing in it
 * outlives the job.
 */
export interface Sandbox {
  root: string
  /** Extracted sources, mounted at /tmp/build */
  workDir: string
  /** `make install` prefix, mounted at /tmp/install */
  installDir: string
  /** Output tarballs, mounted at /out */
  outDir: string
  /** Staged copy of the verified upstream tarball */
  srcDir: string
  dispose: () => Promise<void>
}

export async function acquireSandbox(parent: string, label: string): Promise<Sandbox> {
  await mkdir(parent, { recursive: true })
  const root = await mkdtemp(path.join(parent, `${label.replace(/[^\w.-]/g, '-')}-`))
  const sandbox: Sandbox = {
    root,
    workDir: path.join(root, 'work'),
    installDir: path.join(root, 'install'),
    outDir: path.join(root, 'out'),
    srcDir: path.join(root, 'src'),
    dispose: () => rm(root, { recursive: true, force: true }),
  }
  await Promise.all([sandbox.workDir, sandbox.installDir, sandbox.outDir, sandbox.srcDir].map(dir => mkdir(dir)))
  return sandbox
}

/**
 * Runs `fn` with a fresh sandbox and removes it afterwards, whether `fn` resolves or throws.
 */
export async function withSandbox<T>(parent: string, label: string, fn: (sandbox: Sandbox) => Promise<T>): Promise<T> {
  const sandbox = await acquireSandbox(parent, label)
  try {
    return await fn(sandbox)
  }
  finally {
    await sandbox.dispose()
  }
}
