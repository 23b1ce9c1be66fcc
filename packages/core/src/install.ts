import { execFile } from 'node:child_process'
import { copyFile, mkdir, rename, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { promisify } from 'node:util'
import {
  BinaryNotFoundError,
  PermissionError,
  describeError,
  isPermissionFailure,
} from './errors.js'
import { extractArchive, makeExecutable } from './extract.js'
import { SILENT_LOGGER, type Logger } from './logger.js'

const execFileAsync = promisify(execFile)

export type InstallBinaryOptions = {
  archivePath: string
  /** File name expected at the root of the extracted archive */
  binaryName: string
  targetDir: string
  /** Scratch directory the archive is unpacked into */
  workDir: string
  /** Called at most once, when the unprivileged copy is refused */
  escalate?: (sourcePath: string, denied: PermissionError) => Promise<string>
  logger?: Logger
}

export type ElevatedRunner = (command: string, args: string[]) => Promise<void>

export type ElevatedInstallOptions = {
  sourcePath: string
  binaryName: string
  targetDir: string
  run?: ElevatedRunner
  logger?: Logger
}

export const runWithSudo: ElevatedRunner = async (command, args) => {
  await execFileAsync('sudo', [command, ...args])
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

export async function locateBinary(
  extractedDir: string,
  binaryName: string,
): Promise<string> {
  const candidate = join(extractedDir, binaryName)
  if (!(await isFile(candidate))) {
    throw new BinaryNotFoundError(
      `Archive does not contain '${binaryName}' at its root`,
    )
  }
  return candidate
}

/**
 * Copy `sourcePath` into `targetDir` as `binaryName`, replacing any existing
 * file. The copy lands in a hidden sibling first and is renamed into place.
 */
export async function copyIntoPlace(
  sourcePath: string,
  targetDir: string,
  binaryName: string,
  logger: Logger = SILENT_LOGGER,
): Promise<string> {
  const destination = join(targetDir, binaryName)
  const staging = join(targetDir, `.${binaryName}.${process.pid}.tmp`)

  try {
    logger.trace(`mkdir -p ${targetDir}`)
    await mkdir(targetDir, { recursive: true })
    logger.trace(`cp ${sourcePath} ${staging}`)
    await copyFile(sourcePath, staging)
    await makeExecutable(staging)
    logger.trace(`mv ${staging} ${destination}`)
    await rename(staging, destination)
  } catch (error) {
    await rm(staging, { force: true }).catch(() => undefined)
    if (isPermissionFailure(error)) {
      throw new PermissionError(
        `Permission denied writing ${destination}`,
        destination,
        { cause: error },
      )
    }
    throw error
  }

  return destination
}

export async function installBinary(options: InstallBinaryOptions): Promise<string> {
  const {
    archivePath,
    binaryName,
    targetDir,
    workDir,
    escalate,
    logger = SILENT_LOGGER,
  } = options

  const extractedDir = join(workDir, 'extracted')
  const format = await extractArchive(archivePath, extractedDir)
  logger.debug(`extracted ${format} archive into ${extractedDir}`)

  const source = await locateBinary(extractedDir, binaryName)

  try {
    return await copyIntoPlace(source, targetDir, binaryName, logger)
  } catch (error) {
    if (!(error instanceof PermissionError) || !escalate) throw error
    logger.warn(`${error.message}, retrying with elevated privileges`)
    return escalate(source, error)
  }
}

/**
 * The single privileged retry used when the unprivileged copy was refused.
 */
export async function installBinaryElevated(
  options: ElevatedInstallOptions,
): Promise<string> {
  const {
    sourcePath,
    binaryName,
    targetDir,
    run = runWithSudo,
    logger = SILENT_LOGGER,
  } = options
  const destination = join(targetDir, binaryName)

  try {
    logger.trace(`sudo install -d ${targetDir}`)
    await run('install', ['-d', targetDir])
    logger.trace(`sudo install -m 0755 ${sourcePath} ${destination}`)
    await run('install', ['-m', '0755', sourcePath, destination])
  } catch (error) {
    throw new PermissionError(
      `Elevated install to ${destination} failed: ${describeError(error)}`,
      destination,
      { cause: error },
    )
  }

  return destination
}
