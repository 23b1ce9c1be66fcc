export type InstallerErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'RESOLUTION_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'CHECKSUM_MISSING'
  | 'CHECKSUM_MISMATCH'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'BINARY_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'USAGE'

export type SerializedInstallerError = {
  code: InstallerErrorCode
  message: string
}

/**
 * Base class for every failure the install pipeline reports. All of them are
 * terminal: the run stops and the process exits with `exitCode`.
 */
export abstract class InstallerError extends Error {
  abstract readonly code: InstallerErrorCode
  readonly exitCode: number = 1

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedInstallerError {
    return { code: this.code, message: this.message }
  }
}

export class UnsupportedPlatformError extends InstallerError {
  readonly code = 'UNSUPPORTED_PLATFORM' as const
}

export class ResolutionError extends InstallerError {
  readonly code = 'RESOLUTION_FAILED' as const
}

export class DownloadError extends InstallerError {
  readonly code = 'DOWNLOAD_FAILED' as const

  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export class ChecksumMissingError extends InstallerError {
  readonly code = 'CHECKSUM_MISSING' as const
}

export class ChecksumMismatchError extends InstallerError {
  readonly code = 'CHECKSUM_MISMATCH' as const

  constructor(
    readonly filename: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(
      `Checksum mismatch for ${filename}. Expected: ${expected}, got: ${actual}`,
    )
  }
}

export class UnsupportedFormatError extends InstallerError {
  readonly code = 'UNSUPPORTED_FORMAT' as const
}

export class ExtractionError extends InstallerError {
  readonly code = 'EXTRACTION_FAILED' as const
}

export class BinaryNotFoundError extends InstallerError {
  readonly code = 'BINARY_NOT_FOUND' as const
}

export class PermissionError extends InstallerError {
  readonly code = 'PERMISSION_DENIED' as const

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export class UsageError extends InstallerError {
  readonly code = 'USAGE' as const
  override readonly exitCode = 2
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS'])

export function isPermissionFailure(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    PERMISSION_CODES.has(error.code)
  )
}
