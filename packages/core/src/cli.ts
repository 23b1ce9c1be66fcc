import {
  createInstallConfig,
  DEFAULT_BIN_DIR,
  type Environment,
  type InstallArgs,
  type InstallConfig,
  type ProjectDefinition,
} from './config.js'
import { createProgressLogger } from './download.js'
import { InstallerError, UsageError, describeError } from './errors.js'
import { createLogger, type Logger } from './logger.js'
import { runInstall, type RunInstallOptions } from './pipeline.js'

export type CliArgs = InstallArgs & {
  help: boolean
}

export type CliIo = {
  /** Writes a line to the error stream */
  writeError?: (line: string) => void
  logger?: Logger
  showProgress?: boolean
} & Pick<RunInstallOptions, 'dependencies' | 'host'>

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false }
  const positionals: string[] = []

  const takeValue = (flag: string, index: number): string => {
    const value = argv[index]
    if (value === undefined || value === '') {
      throw new UsageError(`Option ${flag} requires a value`)
    }
    return value
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? ''

    switch (arg) {
      case '-b':
      case '--bin-dir':
        args.binDir = takeValue(arg, ++i)
        break
      case '-d':
      case '--debug':
        args.debug = true
        break
      case '-x':
      case '--trace':
        args.trace = true
        break
      case '-h':
      case '-?':
      case '--help':
        args.help = true
        break
      default:
        if (arg.startsWith('-b') && arg.length > 2) {
          args.binDir = arg.slice(2)
        } else if (arg.startsWith('--bin-dir=')) {
          const value = arg.slice('--bin-dir='.length)
          if (value === '') {
            throw new UsageError('Option --bin-dir requires a value')
          }
          args.binDir = value
        } else if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`)
        } else {
          positionals.push(arg)
        }
    }
  }

  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one tag, got: ${positionals.join(' ')}`)
  }
  if (positionals[0] !== undefined) {
    args.tag = positionals[0]
  }

  return args
}

export function renderUsage(project: ProjectDefinition, command: string): string {
  return `${command}: ${project.displayName} binary downloader

Usage: ${command} [-b bin_dir] [-d] [-x] [tag]
  -b, --bin-dir   set bin_dir or installation directory, Default: ${DEFAULT_BIN_DIR}
                  (or $BINDIR when set)
  -d, --debug     turn on debug logging
  -x, --trace     print every request and file operation
  -h, --help      show this help
  [tag]           a tag from https://github.com/${project.owner}/${project.repo}/releases
                  In case a tag is missing, the latest tag will be used.
`
}

/**
 * Parse flags, build the configuration and run the install pipeline.
 * Resolves to the process exit code.
 */
export async function runCli(
  project: ProjectDefinition,
  argv: readonly string[],
  env: Environment = process.env,
  io: CliIo = {},
): Promise<number> {
  const command = `install-${project.name}`
  const writeError = io.writeError ?? ((line: string) => process.stderr.write(`${line}\n`))

  let config: InstallConfig
  try {
    const args = parseArgs(argv)
    if (args.help) {
      writeError(renderUsage(project, command))
      return 2
    }
    config = createInstallConfig(project, args, env)
  } catch (error) {
    writeError(`${command}: ${describeError(error)}`)
    writeError(renderUsage(project, command))
    return error instanceof UsageError ? error.exitCode : 1
  }

  const logger =
    io.logger ?? createLogger({ prefix: project.logPrefix, level: config.logLevel })
  const showProgress = io.showProgress ?? process.stderr.isTTY === true

  try {
    await runInstall(config, {
      logger,
      onProgress: showProgress
        ? createProgressLogger({ prefix: `${project.logPrefix} ` })
        : undefined,
      dependencies: io.dependencies,
      host: io.host,
    })
    return 0
  } catch (error) {
    logger.error(describeError(error))
    return error instanceof InstallerError ? error.exitCode : 1
  }
}
