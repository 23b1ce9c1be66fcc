/**
 * Test helpers: temporary directories, real archives and a stubbed `fetch`.
 */

import { createHash } from 'node:crypto'
import { createWriteStream } from 'node:fs'
import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import archiver from 'archiver'
import { create as tarCreate } from 'tar'
import { vi } from 'vitest'

export type FileTree = Record<string, string>

export function createTempDir(prefix = 'binfetch-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export function sha256(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex')
}

async function writeTree(dir: string, files: FileTree): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(dir, relativePath)
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, content)
    await chmod(filePath, 0o755)
  }
}

/**
 * Build a tar archive (gzip-compressed unless `gzip` is false) holding `files`.
 */
export async function createTarArchive(
  archivePath: string,
  files: FileTree,
  options: { gzip?: boolean } = {},
): Promise<void> {
  const sourceDir = await createTempDir('binfetch-src-')
  await writeTree(sourceDir, files)
  try {
    await tarCreate(
      { gzip: options.gzip ?? true, file: archivePath, cwd: sourceDir },
      Object.keys(files),
    )
  } finally {
    await rm(sourceDir, { recursive: true, force: true })
  }
}

export async function createZipArchive(
  archivePath: string,
  files: FileTree,
): Promise<void> {
  const output = createWriteStream(archivePath)
  const archive = archiver('zip', { zlib: { level: 9 } })
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve())
    output.on('error', reject)
    archive.on('error', reject)
  })

  archive.pipe(output)
  for (const [name, content] of Object.entries(files)) {
    archive.append(content, { name, mode: 0o755 })
  }
  await archive.finalize()
  await closed
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
  }
  return c >>> 0
})

function crc32(data: Uint8Array): number {
  let crc = 0xffffffff
  for (const byte of data) {
    crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}

/**
 * Write a single-entry stored zip with `name` taken verbatim. archiver
 * sanitizes entry names, so fixtures with hostile names are assembled here.
 */
export async function createRawZip(
  archivePath: string,
  name: string,
  content: string,
): Promise<void> {
  const nameBytes = Buffer.from(name, 'utf-8')
  const data = Buffer.from(content, 'utf-8')
  const crc = crc32(data)

  const local = Buffer.alloc(30)
  local.writeUInt32LE(0x04034b50, 0)
  local.writeUInt16LE(20, 4)
  local.writeUInt32LE(crc, 14)
  local.writeUInt32LE(data.length, 18)
  local.writeUInt32LE(data.length, 22)
  local.writeUInt16LE(nameBytes.length, 26)

  const central = Buffer.alloc(46)
  central.writeUInt32LE(0x02014b50, 0)
  central.writeUInt16LE(20, 4)
  central.writeUInt16LE(20, 6)
  central.writeUInt32LE(crc, 16)
  central.writeUInt32LE(data.length, 20)
  central.writeUInt32LE(data.length, 24)
  central.writeUInt16LE(nameBytes.length, 28)

  const centralOffset = local.length + nameBytes.length + data.length
  const centralSize = central.length + nameBytes.length

  const end = Buffer.alloc(22)
  end.writeUInt32LE(0x06054b50, 0)
  end.writeUInt16LE(1, 8)
  end.writeUInt16LE(1, 10)
  end.writeUInt32LE(centralSize, 12)
  end.writeUInt32LE(centralOffset, 16)

  await writeFile(
    archivePath,
    Buffer.concat([local, nameBytes, data, central, nameBytes, end]),
  )
}

export function bytesResponse(content: string | Uint8Array, status = 200): Response {
  const bytes =
    typeof content === 'string' ? new TextEncoder().encode(content) : new Uint8Array(content)
  return new Response(bytes, { status })
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

export type FetchRoutes = Record<string, () => Response | Promise<Response>>

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.href
  return input.url
}

/**
 * Replace the global `fetch` with a router over `routes`. Unknown URLs answer
 * 404. Restore with `vi.unstubAllGlobals()`.
 */
export function stubFetch(routes: FetchRoutes) {
  const fetchMock = vi.fn(
    async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      const route = routes[requestUrl(input)]
      return route ? route() : new Response('Not Found', { status: 404 })
    },
  )
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

export function requestedUrls(fetchMock: ReturnType<typeof stubFetch>): string[] {
  return fetchMock.mock.calls.map(([input]) => requestUrl(input))
}
