import { resolveConfig, type ConfigOptions, type ProvisionConfig } from './config.js'
import { FetchDownloader, type Downloader } from './download.js'
import { LocalRunner, type CommandRunner } from './exec.js'
import { getPlatformInfo, type PlatformInfo } from './platform.js'
import { SearchPath } from './search-path.js'

/**
 * Everything a provisioning helper reads from its surroundings. Helpers that
 * change the search path return a new context instead of writing PATH.
 */
export type ProvisionContext = ProvisionConfig & {
  platform: PlatformInfo
  searchPath: SearchPath
  runner: CommandRunner
  downloader: Downloader
}

export type ContextOptions = ConfigOptions & {
  os?: NodeJS.Platform
  path?: string
  runner?: CommandRunner
  downloader?: Downloader
}

export function createContext(options: ContextOptions = {}): ProvisionContext {
  const { os, path = process.env['PATH'], runner, downloader, ...config } =
    options
  const platform = getPlatformInfo(os)

  return {
    ...resolveConfig(platform, config),
    platform,
    searchPath: SearchPath.parse(path, platform.pathDelimiter),
    runner: runner ?? new LocalRunner(),
    downloader: downloader ?? new FetchDownloader(),
  }
}

export function withSearchPath(
  ctx: ProvisionContext,
  searchPath: SearchPath,
): ProvisionContext {
  return { ...ctx, searchPath }
}
