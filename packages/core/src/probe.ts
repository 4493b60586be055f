import { constants } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import { join } from 'node:path'
import type { ProvisionContext } from './context.js'
import { logger } from './logger.js'

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path)
    if (!stats.isFile()) return false
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Returns the first executable named `name` on the context's search path,
 * or null.
 */
export async function locate(
  ctx: ProvisionContext,
  name: string,
): Promise<string | null> {
  const filename = name + ctx.platform.executableExtension

  for (const entry of ctx.searchPath.entries) {
    const candidate = join(entry.replace(/^"+|"+$/g, ''), filename)
    if (await isExecutableFile(candidate)) {
      return candidate
    }
  }

  return null
}

export async function isInstalled(
  ctx: ProvisionContext,
  name: string,
): Promise<boolean> {
  const path = await locate(ctx, name)
  if (path) {
    logger.info({ name, path }, `${name} is installed in ${path}`)
  }
  return path !== null
}
