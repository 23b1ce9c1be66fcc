import { tmpdir } from 'node:os'
import { DEFAULT_TIMEOUT_MS } from './download.js'
import { UsageError } from './errors.js'
import type { ArchiveFormat } from './extract.js'
import type { LogLevel } from './logger.js'
import { SUPPORTED_PLATFORMS, type PlatformKey } from './platform.js'

/**
 * Everything that identifies one installable product on the release host.
 */
export type ProjectDefinition = {
  /** Asset name prefix, e.g. `orca-cli` in `orca-cli_1.2.3_linux_amd64.tar.gz` */
  readonly name: string
  readonly owner: string
  readonly repo: string
  /** Executable inside the archive, without the windows `.exe` suffix */
  readonly binary: string
  readonly displayName: string
  readonly logPrefix: string
  readonly supportedPlatforms?: readonly PlatformKey[]
  /** Archive format for non-windows platforms. Windows always uses zip. */
  readonly format?: Exclude<ArchiveFormat, 'zip'> | 'tgz'
  readonly notices?: Readonly<Partial<Record<PlatformKey, string>>>
}

export type InstallArgs = {
  binDir?: string
  tag?: string
  debug?: boolean
  trace?: boolean
}

export type InstallConfig = {
  readonly project: ProjectDefinition
  readonly binDir: string
  readonly tag: string
  readonly tempRoot: string
  readonly apiHost: string
  readonly downloadHost: string
  readonly token?: string
  readonly timeoutMs: number
  readonly logLevel: LogLevel
  readonly elevate: boolean
  readonly supportedPlatforms: readonly PlatformKey[]
}

export type Environment = Readonly<Record<string, string | undefined>>

export const DEFAULT_BIN_DIR = '/usr/local/bin'
export const DEFAULT_API_HOST = 'https://api.github.com'
export const DEFAULT_DOWNLOAD_HOST = 'https://github.com'

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_TIMEOUT_MS

  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`BINFETCH_TIMEOUT_MS must be a positive integer, got '${raw}'`)
  }
  return value
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '')
}

/**
 * Assemble the immutable run configuration from parsed flags and the
 * environment. Flags win over environment variables.
 */
export function createInstallConfig(
  project: ProjectDefinition,
  args: InstallArgs = {},
  env: Environment = process.env,
): InstallConfig {
  const logLevel: LogLevel = args.trace ? 'trace' : args.debug ? 'debug' : 'info'

  return Object.freeze({
    project,
    binDir: nonEmpty(args.binDir) ?? nonEmpty(env['BINDIR']) ?? DEFAULT_BIN_DIR,
    tag: nonEmpty(args.tag) ?? '',
    tempRoot: nonEmpty(env['TMPDIR']) ?? tmpdir(),
    apiHost: trimTrailingSlash(nonEmpty(env['BINFETCH_API_HOST']) ?? DEFAULT_API_HOST),
    downloadHost: trimTrailingSlash(
      nonEmpty(env['BINFETCH_DOWNLOAD_HOST']) ?? DEFAULT_DOWNLOAD_HOST,
    ),
    token: nonEmpty(env['GITHUB_TOKEN']),
    timeoutMs: parseTimeout(nonEmpty(env['BINFETCH_TIMEOUT_MS'])),
    logLevel,
    elevate: env['BINFETCH_NO_SUDO'] !== '1',
    supportedPlatforms: project.supportedPlatforms ?? SUPPORTED_PLATFORMS,
  })
}
