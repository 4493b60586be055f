import { ProvisionError, ProvisionErrorCode } from './errors.js'

export type Platform = 'linux' | 'darwin' | 'win32'

export type PlatformInfo = {
  platform: Platform
  isWindows: boolean
  isMacOS: boolean
  executableExtension: string
  pathDelimiter: string
}

export function detectPlatform(os: NodeJS.Platform = process.platform): Platform {
  if (os === 'linux' || os === 'darwin' || os === 'win32') return os

  throw new ProvisionError(
    ProvisionErrorCode.UNSUPPORTED_PLATFORM,
    `Unsupported platform: ${os}. Supported platforms: linux, darwin, win32`,
    { os },
  )
}

export function getPlatformInfo(os?: NodeJS.Platform): PlatformInfo {
  const platform = detectPlatform(os)
  const isWindows = platform === 'win32'

  return {
    platform,
    isWindows,
    isMacOS: platform === 'darwin',
    executableExtension: isWindows ? '.exe' : '',
    pathDelimiter: isWindows ? ';' : ':',
  }
}

export const SUPPORTED_PLATFORMS: Platform[] = ['linux', 'darwin', 'win32']
