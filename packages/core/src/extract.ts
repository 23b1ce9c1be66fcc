import { createWriteStream } from 'node:fs'
import { chmod, mkdir } from 'node:fs/promises'
import { dirname, isAbsolute, join, relative, sep } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { extract as tarExtract } from 'tar'
import yauzl from 'yauzl'
import {
  ExtractionError,
  InstallerError,
  UnsupportedFormatError,
  describeError,
} from './errors.js'

export const ARCHIVE_FORMATS = ['tar.gz', 'tar', 'zip'] as const

export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number]

export type Extractor = (archivePath: string, destination: string) => Promise<void>

export function getArchiveFormat(filename: string): ArchiveFormat {
  const lower = filename.toLowerCase()

  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) {
    return 'tar.gz'
  }
  if (lower.endsWith('.tar')) {
    return 'tar'
  }
  if (lower.endsWith('.zip')) {
    return 'zip'
  }

  throw new UnsupportedFormatError(
    `Unknown archive format for ${filename}. ` +
      `Supported formats: .tar.gz, .tgz, .tar, .zip`,
  )
}

// tar sniffs gzip itself, so one extractor covers both tar variants
async function extractTar(archivePath: string, destination: string): Promise<void> {
  await tarExtract({
    file: archivePath,
    cwd: destination,
    strict: true,
  })
}

/**
 * Whether `target` is `root` itself or lies below it. yauzl already refuses
 * absolute and `..` entry names; this guards whatever it lets through.
 */
export function isInsideDirectory(root: string, target: string): boolean {
  const rel = relative(root, target)
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)
}

function extractZip(archivePath: string, destination: string): Promise<void> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (openError, zipfile) => {
      if (openError) {
        reject(openError)
        return
      }

      const fail = (error: unknown) => {
        zipfile.close()
        reject(error)
      }

      zipfile.on('entry', (entry: yauzl.Entry) => {
        const entryPath = join(destination, entry.fileName)

        if (!isInsideDirectory(destination, entryPath)) {
          fail(new ExtractionError(`Path traversal detected in archive: ${entry.fileName}`))
          return
        }

        if (entry.fileName.endsWith('/')) {
          mkdir(entryPath, { recursive: true })
            .then(() => zipfile.readEntry())
            .catch(fail)
          return
        }

        zipfile.openReadStream(entry, (streamError, readStream) => {
          if (streamError) {
            fail(streamError)
            return
          }

          // Unix mode lives in the upper 16 bits of the external attributes
          const mode = (entry.externalFileAttributes >>> 16) & 0o777

          mkdir(dirname(entryPath), { recursive: true })
            .then(() => pipeline(readStream, createWriteStream(entryPath)))
            .then(() => (mode !== 0 ? chmod(entryPath, mode) : undefined))
            .then(() => zipfile.readEntry())
            .catch(fail)
        })
      })

      zipfile.on('end', () => resolve())
      zipfile.on('error', fail)
      zipfile.readEntry()
    })
  })
}

export const EXTRACTORS: Record<ArchiveFormat, Extractor> = {
  'tar.gz': extractTar,
  tar: extractTar,
  zip: extractZip,
}

export async function extractArchive(
  archivePath: string,
  destination: string,
): Promise<ArchiveFormat> {
  const format = getArchiveFormat(archivePath)

  await mkdir(destination, { recursive: true })

  try {
    await EXTRACTORS[format](archivePath, destination)
  } catch (error) {
    if (error instanceof InstallerError) throw error
    throw new ExtractionError(
      `Failed to extract ${archivePath}: ${describeError(error)}`,
      { cause: error },
    )
  }

  return format
}

export async function makeExecutable(filePath: string): Promise<void> {
  if (process.platform !== 'win32') {
    await chmod(filePath, 0o755)
  }
}
