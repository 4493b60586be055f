import { existsSync } from 'node:fs'
import type { PlatformInfo } from './platform.js'

export type ConfigOptions = {
  installDir?: string
  downloadDir?: string
  globalBinDir?: string
  optDir?: string
  python?: string
  pip?: string
}

export type ProvisionConfig = Required<ConfigOptions>

// Inside a Vagrant VM this folder is synced with the host, so downloads
// placed there do not grow the VM drive.
export const VAGRANT_DIR = '/vagrant'

export function getWorkDir(options: { vagrantDir?: string } = {}): string {
  const { vagrantDir = VAGRANT_DIR } = options
  return existsSync(vagrantDir) ? vagrantDir : '.'
}

export function getInstallDir(
  platform: PlatformInfo,
  options: ConfigOptions = {},
): string {
  if (options.installDir) {
    return options.installDir
  }

  if (process.env['BOOTSTRAP_INSTALL_DIR']) {
    return process.env['BOOTSTRAP_INSTALL_DIR']
  }

  return platform.isWindows ? '\\Program Files' : '/opt'
}

export function getDownloadDir(options: ConfigOptions = {}): string {
  if (options.downloadDir) {
    return options.downloadDir
  }

  if (process.env['BOOTSTRAP_DOWNLOAD_DIR']) {
    return process.env['BOOTSTRAP_DOWNLOAD_DIR']
  }

  return getWorkDir()
}

export function resolveConfig(
  platform: PlatformInfo,
  options: ConfigOptions = {},
): ProvisionConfig {
  const env = process.env

  return {
    installDir: getInstallDir(platform, options),
    downloadDir: getDownloadDir(options),
    globalBinDir:
      options.globalBinDir || env['BOOTSTRAP_BIN_DIR'] || '/usr/local/bin',
    optDir: options.optDir || env['BOOTSTRAP_OPT_DIR'] || '/opt',
    python: options.python || env['BOOTSTRAP_PYTHON'] || 'python',
    pip: options.pip || env['BOOTSTRAP_PIP'] || 'pip',
  }
}
