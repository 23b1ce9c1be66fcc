import { join } from 'node:path'
import { verifyChecksum } from './checksum.js'
import type { InstallConfig } from './config.js'
import { downloadFile, type DownloadOptions } from './download.js'
import { installBinary, installBinaryElevated, runWithSudo } from './install.js'
import type { ElevatedRunner } from './install.js'
import { SILENT_LOGGER, type Logger } from './logger.js'
import {
  detectPlatform,
  executableName,
  formatPlatform,
  isWindows,
  type DetectPlatformOptions,
  type Platform,
} from './platform.js'
import { getReleaseAssets, resolveRelease } from './release.js'
import { withScratchWorkspace } from './workspace.js'

export type InstallResult = {
  readonly installedPath: string
  readonly tag: string
  readonly version: string
  readonly platform: Platform
}

/**
 * Stage implementations, replaceable in tests.
 */
export type PipelineDependencies = {
  detectPlatform: typeof detectPlatform
  resolveRelease: typeof resolveRelease
  downloadFile: typeof downloadFile
  verifyChecksum: typeof verifyChecksum
  installBinary: typeof installBinary
  runElevated: ElevatedRunner
}

export const DEFAULT_DEPENDENCIES: PipelineDependencies = {
  detectPlatform,
  resolveRelease,
  downloadFile,
  verifyChecksum,
  installBinary,
  runElevated: runWithSudo,
}

export type RunInstallOptions = {
  logger?: Logger
  /** Host values for platform detection; read from the OS when omitted */
  host?: Pick<DetectPlatformOptions, 'rawOs' | 'rawArch'>
  onProgress?: DownloadOptions['onProgress']
  dependencies?: Partial<PipelineDependencies>
}

/**
 * Detect, resolve, download, verify, install. Each stage only starts once the
 * previous one succeeded; the target directory is not touched until the
 * archive has been verified.
 */
export async function runInstall(
  config: InstallConfig,
  options: RunInstallOptions = {},
): Promise<InstallResult> {
  const { logger = SILENT_LOGGER, host = {}, onProgress } = options
  const deps: PipelineDependencies = { ...DEFAULT_DEPENDENCIES, ...options.dependencies }
  const { project } = config

  const platform = deps.detectPlatform({
    ...host,
    supported: config.supportedPlatforms,
    logger,
  })

  const release = await deps.resolveRelease({
    ownerRepo: `${project.owner}/${project.repo}`,
    tag: config.tag,
    apiHost: config.apiHost,
    token: config.token,
    timeoutMs: config.timeoutMs,
    logger,
  })
  logger.info(
    `The desired version to download: ${release.version} for ${release.tag}/${formatPlatform(platform)}`,
  )

  const assets = getReleaseAssets({
    project,
    release,
    platform,
    downloadHost: config.downloadHost,
  })
  const binaryName = executableName(project.binary, platform)

  const installedPath = await withScratchWorkspace(
    async (dir) => {
      const archivePath = join(dir, assets.archive.name)
      const checksumsPath = join(dir, assets.checksums.name)

      await deps.downloadFile({
        url: assets.archive.url,
        destination: archivePath,
        timeoutMs: config.timeoutMs,
        onProgress,
        logger,
      })
      await deps.downloadFile({
        url: assets.checksums.url,
        destination: checksumsPath,
        timeoutMs: config.timeoutMs,
        logger,
      })

      await deps.verifyChecksum(archivePath, checksumsPath, logger)
      logger.debug(`verified ${assets.archive.name}`)

      const canEscalate = config.elevate && !isWindows(platform)

      return deps.installBinary({
        archivePath,
        binaryName,
        targetDir: config.binDir,
        workDir: dir,
        logger,
        escalate: canEscalate
          ? (sourcePath) =>
              installBinaryElevated({
                sourcePath,
                binaryName,
                targetDir: config.binDir,
                run: deps.runElevated,
                logger,
              })
          : undefined,
      })
    },
    { root: config.tempRoot, prefix: `${project.name}-`, logger },
  )

  logger.info(`Installed ${installedPath}`)

  const notice = project.notices?.[formatPlatform(platform)]
  if (notice) {
    logger.info(notice)
  }

  return Object.freeze({
    installedPath,
    tag: release.tag,
    version: release.version,
    platform,
  })
}
