import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  ProvisionError,
  ProvisionErrorCode,
  logger,
  runCommand,
  withMountPoint,
  type ProvisionContext,
} from '@bootstrap-kit/core'

/** Installs an OS X `.pkg` onto the root volume. */
export async function installPackageFile(
  ctx: ProvisionContext,
  path: string,
  allowUntrusted = false,
): Promise<void> {
  logger.info({ path }, `Installing ${path}`)
  const argv = ['sudo', 'installer', '-pkg', path, '-target', '/']
  if (allowUntrusted) {
    argv.push('-allowUntrusted')
  }
  await runCommand(ctx, argv)
}

async function findPackage(mountPoint: string): Promise<string> {
  const pkg = (await readdir(mountPoint))
    .filter((name) => !name.startsWith('.'))
    .sort()
    .find((name) => name.endsWith('pkg'))

  if (!pkg) {
    throw new ProvisionError(
      ProvisionErrorCode.NOT_FOUND,
      `No package found in disk image mounted at ${mountPoint}`,
      { mountPoint },
    )
  }

  return join(mountPoint, pkg)
}

/**
 * Mounts a `.dmg`, installs the first package inside it and detaches the
 * image again, also when the install fails.
 */
export async function installDiskImage(
  ctx: ProvisionContext,
  path: string,
  allowUntrusted = false,
): Promise<void> {
  await withMountPoint({ prefix: 'dmg-' }, async (mountPoint) => {
    await runCommand(ctx, ['hdiutil', 'attach', path, '-mountpoint', mountPoint])
    try {
      await installPackageFile(ctx, await findPackage(mountPoint), allowUntrusted)
    } catch (error) {
      // A detach failure must not mask the install error.
      await runCommand(ctx, ['hdiutil', 'detach', mountPoint]).catch(
        (detachError: unknown) => {
          logger.error({ err: detachError, mountPoint }, 'Failed to detach disk image')
        },
      )
      throw error
    }
    await runCommand(ctx, ['hdiutil', 'detach', mountPoint])
  })
}
