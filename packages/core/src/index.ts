// Platform detection
export {
  type Platform,
  type PlatformInfo,
  detectPlatform,
  getPlatformInfo,
  SUPPORTED_PLATFORMS,
} from './platform.js'

// Errors and logging
export {
  ProvisionError,
  ProvisionErrorCode,
  isProvisionError,
} from './errors.js'
export { logger } from './logger.js'

// Configuration and context
export {
  type ConfigOptions,
  type ProvisionConfig,
  VAGRANT_DIR,
  getWorkDir,
  getInstallDir,
  getDownloadDir,
  resolveConfig,
} from './config.js'
export {
  type ProvisionContext,
  type ContextOptions,
  createContext,
  withSearchPath,
} from './context.js'

// Subprocesses
export {
  type Command,
  type CommandRunner,
  type ExecResult,
  type RunOptions,
  LocalRunner,
  mergeEnv,
  runCommand,
  captureCommand,
  probeCommand,
} from './exec.js'

// Download utilities
export {
  type DownloadOptions,
  type DownloadResult,
  type DownloadRequest,
  type DownloadSource,
  type Downloader,
  FetchDownloader,
  downloadFile,
  withDownload,
} from './download.js'

// Extract utilities
export {
  type ArchiveKind,
  type ExtractOptions,
  extractTarGz,
  extractTarBz2,
  extractZip,
  extractArchive,
  getArchiveType,
} from './extract.js'

// Scratch directories
export { type TempDirOptions, withTempDir, withMountPoint } from './temp.js'

// Search path, probing and registration
export { SearchPath } from './search-path.js'
export { locate, isInstalled } from './probe.js'
export {
  type AddToPathOptions,
  addToPath,
  createSymlink,
} from './path-registry.js'

// Install recipes
export {
  type ExtractTarget,
  type InstallRecipe,
  type InstallResult,
  type RecipeOptions,
  runRecipe,
} from './recipe.js'
export { copyOptionalDependencies } from './optional-deps.js'
