import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { ChecksumMismatchError, ChecksumMissingError } from './errors.js'
import { SILENT_LOGGER, type Logger } from './logger.js'

export type ChecksumRecord = {
  filename: string
  digest: string
}

// "hash  filename", "hash\tfilename" or "hash *filename" (binary mode)
const RECORD_PATTERN = /^([a-fA-F0-9]+)[ \t]+\*?(.+)$/

/**
 * Parse checksum manifest content into records, in file order.
 */
export function parseChecksums(content: string): ChecksumRecord[] {
  const records: ChecksumRecord[] = []

  for (const line of content.split(/\r?\n/)) {
    const match = RECORD_PATTERN.exec(line.trim())
    if (match?.[1] && match[2]) {
      records.push({ digest: match[1], filename: match[2].trim() })
    }
  }

  return records
}

export function findChecksum(
  records: readonly ChecksumRecord[],
  filename: string,
): ChecksumRecord | undefined {
  return records.find((record) => record.filename === filename)
}

export function formatChecksums(records: readonly ChecksumRecord[]): string {
  return records
    .map((record) => `${record.digest}  ${record.filename}\n`)
    .join('')
}

export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256')
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk)
  }
  return hash.digest('hex')
}

/**
 * Verify `filePath` against the record for its basename in the manifest at
 * `manifestPath`. Nothing downstream may touch the file unless this resolves.
 */
export async function verifyChecksum(
  filePath: string,
  manifestPath: string,
  logger: Logger = SILENT_LOGGER,
): Promise<void> {
  const filename = basename(filePath)
  const records = parseChecksums(await readFile(manifestPath, 'utf-8'))
  const record = findChecksum(records, filename)

  if (!record) {
    throw new ChecksumMissingError(
      `Unable to find checksum for '${filename}' in '${basename(manifestPath)}'`,
    )
  }

  const expected = record.digest.toLowerCase()
  const actual = await hashFile(filePath)
  logger.debug(`sha256 ${filename}: expected ${expected}, got ${actual}`)

  if (actual !== expected) {
    throw new ChecksumMismatchError(filename, expected, actual)
  }
}
