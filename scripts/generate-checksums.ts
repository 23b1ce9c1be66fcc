#!/usr/bin/env tsx
/**
 * Write a checksum manifest for a directory of release archives
 *
 * Produces `<project>_<version>_checksums.txt` in the format the installer
 * verifies against.
 *
 * Usage:
 *   npm run checksums -- dist/release --project orca-cli --version 1.2.3
 *   npm run checksums -- dist/release --project orca-cli --version 1.2.3 --dry-run
 */

import { readdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import {
  formatChecksums,
  getArchiveFormat,
  hashFile,
  type ChecksumRecord,
} from '@binfetch/core'

type Options = {
  dir: string
  project: string
  version: string
  dryRun: boolean
}

const USAGE = `
Usage: npm run checksums -- <dir> --project <name> --version <version> [options]

Options:
  --dry-run           Print the manifest instead of writing it
  --help              Show this help
`

export function parseArgs(argv: readonly string[]): Options | null {
  let dir: string | undefined
  let project: string | undefined
  let version: string | undefined
  let dryRun = false

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--dry-run':
        dryRun = true
        break
      case '--project':
        project = argv[++i]
        break
      case '--version':
        version = argv[++i]
        break
      case '--help':
      case '-h':
        return null
      default:
        dir = argv[i]
    }
  }

  if (!dir || !project || !version) return null
  return { dir, project, version: version.replace(/^v/, ''), dryRun }
}

function isArchive(filename: string): boolean {
  try {
    getArchiveFormat(filename)
    return true
  } catch {
    return false
  }
}

export async function collectChecksums(dir: string): Promise<ChecksumRecord[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const archives = entries
    .filter((entry) => entry.isFile() && isArchive(entry.name))
    .map((entry) => entry.name)
    .sort()

  const records: ChecksumRecord[] = []
  for (const filename of archives) {
    records.push({ filename, digest: await hashFile(join(dir, filename)) })
  }
  return records
}

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2))
  if (!options) {
    console.log(USAGE)
    return 2
  }

  const records = await collectChecksums(options.dir)
  if (records.length === 0) {
    console.error(`No release archives found in ${options.dir}`)
    return 1
  }

  const manifest = formatChecksums(records)
  const manifestName = `${options.project}_${options.version}_checksums.txt`

  if (options.dryRun) {
    console.log(`# ${manifestName}`)
    process.stdout.write(manifest)
    return 0
  }

  await writeFile(join(options.dir, manifestName), manifest)
  console.log(`Wrote ${records.length} checksums to ${manifestName}`)
  return 0
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = await main()
}
