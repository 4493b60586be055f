import { existsSync } from 'node:fs'
import { cp, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { ProvisionContext } from './context.js'
import { logger } from './logger.js'

/**
 * Copies each entry of `<sourceDir>/opt/<platformName>` into the context's
 * opt directory. Entries that already exist there are left alone.
 *
 * @returns the destinations that were copied
 */
export async function copyOptionalDependencies(
  ctx: ProvisionContext,
  platformName: string,
  sourceDir = '',
): Promise<string[]> {
  const platformDir = join(sourceDir, 'opt', platformName)
  if (!existsSync(platformDir)) {
    return []
  }

  const entries = (await readdir(platformDir))
    .filter((name) => !name.startsWith('.'))
    .sort()
  const copied: string[] = []

  for (const name of entries) {
    const src = join(platformDir, name)
    const dest = join(ctx.optDir, name)
    if (existsSync(dest)) continue

    logger.info({ src, dest }, `Copying ${src} to ${dest}`)
    await cp(src, dest, { recursive: true, verbatimSymlinks: true })
    copied.push(dest)
  }

  return copied
}
