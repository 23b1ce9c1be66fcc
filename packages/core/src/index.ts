// Errors
export {
  type InstallerErrorCode,
  type SerializedInstallerError,
  InstallerError,
  UnsupportedPlatformError,
  ResolutionError,
  DownloadError,
  ChecksumMissingError,
  ChecksumMismatchError,
  UnsupportedFormatError,
  ExtractionError,
  BinaryNotFoundError,
  PermissionError,
  UsageError,
  describeError,
} from './errors.js'

// Logging
export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  createLogger,
  SILENT_LOGGER,
} from './logger.js'

// Platform detection
export {
  type OperatingSystem,
  type Architecture,
  type Platform,
  type PlatformKey,
  type DetectPlatformOptions,
  KNOWN_OPERATING_SYSTEMS,
  KNOWN_ARCHITECTURES,
  SUPPORTED_PLATFORMS,
  detectPlatform,
  normalizeOs,
  normalizeArch,
  formatPlatform,
  isWindows,
  executableName,
} from './platform.js'

// Release resolution
export {
  type Release,
  type ReleaseAsset,
  type ReleaseAssets,
  type ResolveReleaseOptions,
  LATEST_TAG,
  resolveRelease,
  getReleaseAssets,
  getReleaseMetadataUrl,
  getArchiveExtension,
  tagToVersion,
} from './release.js'

// Download utilities
export {
  type DownloadOptions,
  type DownloadResult,
  type RequestOptions,
  DEFAULT_TIMEOUT_MS,
  downloadFile,
  fetchJson,
  formatBytes,
  createProgressLogger,
} from './download.js'

// Checksums
export {
  type ChecksumRecord,
  parseChecksums,
  findChecksum,
  formatChecksums,
  hashFile,
  verifyChecksum,
} from './checksum.js'

// Extract utilities
export {
  type ArchiveFormat,
  type Extractor,
  ARCHIVE_FORMATS,
  EXTRACTORS,
  getArchiveFormat,
  extractArchive,
  makeExecutable,
  isInsideDirectory,
} from './extract.js'

// Install
export {
  type InstallBinaryOptions,
  type ElevatedInstallOptions,
  type ElevatedRunner,
  installBinary,
  installBinaryElevated,
  copyIntoPlace,
  locateBinary,
  runWithSudo,
} from './install.js'

// Scratch workspace
export { type ScratchWorkspaceOptions, withScratchWorkspace } from './workspace.js'

// Configuration and pipeline
export {
  type ProjectDefinition,
  type InstallArgs,
  type InstallConfig,
  type Environment,
  DEFAULT_BIN_DIR,
  DEFAULT_API_HOST,
  DEFAULT_DOWNLOAD_HOST,
  createInstallConfig,
} from './config.js'

export {
  type InstallResult,
  type PipelineDependencies,
  type RunInstallOptions,
  DEFAULT_DEPENDENCIES,
  runInstall,
} from './pipeline.js'

export { type CliArgs, type CliIo, parseArgs, renderUsage, runCli } from './cli.js'
