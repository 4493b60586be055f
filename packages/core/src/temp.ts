import { mkdir, mkdtemp, rm, rmdir } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { logger } from './logger.js'

export type TempDirOptions = {
  prefix?: string
  parent?: string
}

async function makeTempDir(options: TempDirOptions): Promise<string> {
  const { prefix = 'bootstrap-', parent = tmpdir() } = options
  await mkdir(parent, { recursive: true })
  return mkdtemp(join(parent, prefix))
}

/**
 * Runs `fn` with a fresh scratch directory and removes the directory and
 * everything in it afterwards, also when `fn` throws.
 */
export async function withTempDir<T>(
  options: TempDirOptions,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await makeTempDir(options)
  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}

/**
 * Like withTempDir, for mount points. Removal is non-recursive and fails
 * while a volume is still attached. When `fn` throws, a failed removal is
 * logged and `fn`'s error is rethrown.
 */
export async function withMountPoint<T>(
  options: TempDirOptions,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await makeTempDir(options)

  let result: T
  try {
    result = await fn(dir)
  } catch (error) {
    await rmdir(dir).catch((removeError: unknown) => {
      logger.error({ err: removeError, dir }, 'Failed to remove mount point')
    })
    throw error
  }

  await rmdir(dir)
  return result
}
