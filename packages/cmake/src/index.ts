import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  ProvisionError,
  ProvisionErrorCode,
  runRecipe,
  type ArchiveKind,
  type InstallRecipe,
  type InstallResult,
  type ProvisionContext,
} from '@bootstrap-kit/core'

export const TOOL_NAME = 'cmake'
export const DISPLAY_NAME = 'CMake'

export type CMakePackage = {
  /** Top-level directory inside the archive, e.g. `cmake-3.10.2-Linux-x86_64` */
  directory: string
  /** major.minor, e.g. `3.10` */
  version: string
  patch: string
  platform: string
  archive: ArchiveKind
}

// cmake-<major.minor>.<patch>[...]-<platform>.<ext>
const PACKAGE_PATTERN = /^(cmake-(\d+\.\d+)\.(\d+).*-([^.]+))\..*/

export function parseCMakePackage(packageName: string): CMakePackage {
  const match = PACKAGE_PATTERN.exec(packageName)
  const [, directory, version, patch, platform] = match ?? []

  if (!directory || !version || !patch || !platform) {
    throw new ProvisionError(
      ProvisionErrorCode.PARSE_FAILED,
      `Not a CMake package name: ${packageName}. ` +
        `Expected cmake-<major.minor>.<patch>-<platform>.<ext>`,
      { packageName },
    )
  }

  return {
    directory,
    version,
    patch,
    platform,
    archive: packageName.endsWith('zip') ? 'zip' : 'tar.gz',
  }
}

export function getDownloadUrl(packageName: string): string {
  const { version } = parseCMakePackage(packageName)
  return `https://cmake.org/files/v${version}/${packageName}`
}

// The OS X packages nest the tree inside CMake.app/Contents.
async function findAppContents(dir: string): Promise<string> {
  const bundle = (await readdir(dir))
    .sort()
    .find((name) => name.startsWith('CMake') && name.endsWith('.app'))

  if (!bundle) {
    throw new ProvisionError(
      ProvisionErrorCode.NOT_FOUND,
      `No CMake*.app bundle found in ${dir}`,
      { dir },
    )
  }

  return join(dir, bundle, 'Contents')
}

export type InstallCMakeOptions = {
  checkInstalled?: boolean
  installDir?: string
  downloadDir?: string
}

export function cmakeRecipe(
  packageName: string,
  installDir: string,
): InstallRecipe {
  const pkg = parseCMakePackage(packageName)

  return {
    name: DISPLAY_NAME,
    probe: TOOL_NAME,
    download: { url: getDownloadUrl(packageName) },
    archive: pkg.archive,
    extractTo: { kind: 'directory', path: installDir },
    finish: async (root, ctx) => {
      let dir = join(root, pkg.directory)
      if (ctx.platform.isMacOS) {
        dir = await findAppContents(dir)
      }
      return join(dir, 'bin', TOOL_NAME)
    },
    register: installDir !== '.',
  }
}

/**
 * Downloads and installs a CMake binary package such as
 * `cmake-3.10.2-Linux-x86_64.tar.gz`.
 *
 * `executable` is the path of the installed `cmake` binary.
 */
export async function installCMake(
  ctx: ProvisionContext,
  packageName: string,
  options: InstallCMakeOptions = {},
): Promise<InstallResult> {
  const { checkInstalled = true, downloadDir } = options
  const installDir = options.installDir ?? ctx.installDir

  return runRecipe(ctx, cmakeRecipe(packageName, installDir), {
    checkInstalled,
    downloadDir,
  })
}
