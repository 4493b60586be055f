import { lstat, mkdir, symlink } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { withSearchPath, type ProvisionContext } from './context.js'
import { runCommand } from './exec.js'
import { logger } from './logger.js'

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch {
    return false
  }
}

/**
 * Creates `linkName` pointing at `target` unless something is already there.
 * A dangling link at `linkName` counts as existing. Returns whether a link
 * was created.
 */
export async function createSymlink(
  target: string,
  linkName: string,
): Promise<boolean> {
  if (await pathExists(linkName)) {
    logger.info({ linkName }, `File already exists: ${linkName}`)
    return false
  }

  logger.info({ linkName, target }, `Creating a symlink from ${linkName} to ${target}`)
  await symlink(target, linkName)
  return true
}

export type AddToPathOptions = {
  linkName?: string
  isDirectory?: boolean
}

/**
 * Puts `path` on the search path: a directory goes first, a file's parent
 * directory goes last. On Windows the new value is persisted machine-wide;
 * elsewhere a file is also linked into the global binary directory.
 */
export async function addToPath(
  ctx: ProvisionContext,
  path: string,
  options: AddToPathOptions = {},
): Promise<ProvisionContext> {
  const { linkName, isDirectory = false } = options
  const dir = isDirectory ? path : dirname(path)

  logger.info({ dir }, `Adding ${dir} to PATH`)
  const searchPath = isDirectory
    ? ctx.searchPath.prepend(dir)
    : ctx.searchPath.append(dir)
  const next = withSearchPath(ctx, searchPath)

  if (ctx.platform.isWindows) {
    await runCommand(next, ['setx', '/m', 'PATH', searchPath.toString()])
  }

  if (ctx.platform.isWindows || isDirectory) {
    return next
  }

  // /usr/local/bin is missing on a fresh OS X install
  await mkdir(ctx.globalBinDir, { recursive: true })
  await createSymlink(path, join(ctx.globalBinDir, linkName ?? basename(path)))

  return next
}
