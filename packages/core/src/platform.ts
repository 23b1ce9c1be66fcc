import { machine, type } from 'node:os'
import { UnsupportedPlatformError } from './errors.js'
import { SILENT_LOGGER, type Logger } from './logger.js'

export const KNOWN_OPERATING_SYSTEMS = [
  'darwin',
  'dragonfly',
  'freebsd',
  'linux',
  'android',
  'nacl',
  'netbsd',
  'openbsd',
  'plan9',
  'solaris',
  'windows',
] as const

export const KNOWN_ARCHITECTURES = [
  '386',
  'amd64',
  'arm64',
  'armv5',
  'armv6',
  'armv7',
  'ppc64',
  'ppc64le',
  'mips',
  'mipsle',
  'mips64',
  'mips64le',
  's390x',
  'amd64p32',
] as const

export type OperatingSystem = (typeof KNOWN_OPERATING_SYSTEMS)[number]
export type Architecture = (typeof KNOWN_ARCHITECTURES)[number]

export type Platform = {
  readonly os: OperatingSystem
  readonly arch: Architecture
}

export type PlatformKey = `${OperatingSystem}/${Architecture}`

export const SUPPORTED_PLATFORMS: readonly PlatformKey[] = [
  'darwin/amd64',
  'darwin/arm64',
  'linux/amd64',
  'linux/arm64',
]

const OS_ALIASES: ReadonlyArray<[RegExp, OperatingSystem]> = [
  [/^cygwin_nt/, 'windows'],
  [/^mingw/, 'windows'],
  [/^msys_nt/, 'windows'],
  [/^windows_nt$/, 'windows'],
  [/^win32$/, 'windows'],
]

const ARCH_ALIASES: ReadonlyArray<[RegExp, Architecture]> = [
  [/^(x86_64|x64)$/, 'amd64'],
  [/^(x86|i686|i386|ia32)$/, '386'],
  [/^aarch64$/, 'arm64'],
  [/^armv5/, 'armv5'],
  [/^armv6/, 'armv6'],
  [/^armv7/, 'armv7'],
]

const OS_NAMES: ReadonlySet<string> = new Set(KNOWN_OPERATING_SYSTEMS)
const ARCH_NAMES: ReadonlySet<string> = new Set(KNOWN_ARCHITECTURES)

function isKnownOs(value: string): value is OperatingSystem {
  return OS_NAMES.has(value)
}

function isKnownArch(value: string): value is Architecture {
  return ARCH_NAMES.has(value)
}

export function normalizeOs(raw: string): OperatingSystem {
  const lowered = raw.trim().toLowerCase()
  const alias = OS_ALIASES.find(([pattern]) => pattern.test(lowered))
  const os = alias ? alias[1] : lowered

  if (!isKnownOs(os)) {
    throw new UnsupportedPlatformError(
      `Unsupported operating system: '${raw}' converted to '${os}'`,
    )
  }
  return os
}

export function normalizeArch(raw: string): Architecture {
  const lowered = raw.trim().toLowerCase()
  const alias = ARCH_ALIASES.find(([pattern]) => pattern.test(lowered))
  const arch = alias ? alias[1] : lowered

  if (!isKnownArch(arch)) {
    throw new UnsupportedPlatformError(
      `Unsupported architecture: '${raw}' converted to '${arch}'`,
    )
  }
  return arch
}

export function formatPlatform(platform: Platform): PlatformKey {
  return `${platform.os}/${platform.arch}`
}

export function isWindows(platform: Platform): boolean {
  return platform.os === 'windows'
}

export function executableName(name: string, platform: Platform): string {
  return isWindows(platform) ? `${name}.exe` : name
}

export type DetectPlatformOptions = {
  rawOs?: string
  rawArch?: string
  supported?: readonly PlatformKey[]
  logger?: Logger
}

export function detectPlatform(options: DetectPlatformOptions = {}): Platform {
  const {
    rawOs = type(),
    rawArch = machine(),
    supported = SUPPORTED_PLATFORMS,
    logger = SILENT_LOGGER,
  } = options

  const os = normalizeOs(rawOs)
  logger.info(`Discovered os: ${os}`)
  const arch = normalizeArch(rawArch)
  logger.info(`Discovered architecture: ${arch}`)

  const platform: Platform = Object.freeze({ os, arch })
  const key = formatPlatform(platform)

  if (!supported.includes(key)) {
    throw new UnsupportedPlatformError(
      `Platform ${key} is not supported. ` +
        `Supported platforms: ${supported.join(', ')}`,
    )
  }

  logger.info(`Platform ${key} is supported`)
  return platform
}
