import { readFile, readdir, rm } from 'node:fs/promises'
import { createServer, type RequestListener, type ServerResponse } from 'node:http'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createProgressLogger, downloadFile, fetchJson, formatBytes } from './download.js'
import { DownloadError } from './errors.js'
import { bytesResponse, createTempDir, jsonResponse, stubFetch } from './test-utils.js'

const URL_BASE = 'https://downloads.test/orcasecurity/orca-cli/releases/download/v1.2.3'

describe('downloadFile', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes the full body to the destination', async () => {
    stubFetch({ [`${URL_BASE}/asset.tar.gz`]: () => bytesResponse('archive-bytes') })
    const destination = join(tempDir, 'nested', 'asset.tar.gz')

    const result = await downloadFile({ url: `${URL_BASE}/asset.tar.gz`, destination })

    expect(result).toEqual({ path: destination, size: 13 })
    expect(await readFile(destination, 'utf-8')).toBe('archive-bytes')
    expect(await readdir(join(tempDir, 'nested'))).toEqual(['asset.tar.gz'])
  })

  it('sends a user agent and any extra headers', async () => {
    const fetchMock = stubFetch({ [`${URL_BASE}/a.txt`]: () => bytesResponse('ok') })

    await downloadFile({
      url: `${URL_BASE}/a.txt`,
      destination: join(tempDir, 'a.txt'),
      headers: { Accept: 'application/json' },
    })

    const init = fetchMock.mock.calls[0]?.[1]
    expect(init?.headers).toEqual({
      'User-Agent': 'binfetch/0.1.0',
      Accept: 'application/json',
    })
    expect(init?.redirect).toBe('follow')
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  it('fails with DownloadError on a non-success status and leaves no file', async () => {
    stubFetch({})
    const destination = join(tempDir, 'missing.tar.gz')

    const error = await downloadFile({ url: `${URL_BASE}/missing.tar.gz`, destination }).catch(
      (e: unknown) => e,
    )

    expect(error).toBeInstanceOf(DownloadError)
    expect(error).toMatchObject({ statusCode: 404 })
    expect(await readdir(tempDir)).toEqual([])
  })

  it('wraps transport errors in DownloadError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed')
      }),
    )

    await expect(
      downloadFile({ url: `${URL_BASE}/a.txt`, destination: join(tempDir, 'a.txt') }),
    ).rejects.toThrow(`Network error fetching ${URL_BASE}/a.txt: fetch failed`)
  })

  it('removes the partial file when the body fails mid-stream', async () => {
    async function* failingBody(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode('partial')
      throw new Error('connection reset')
    }
    stubFetch({ [`${URL_BASE}/a.tar.gz`]: () => new Response(failingBody()) })

    await expect(
      downloadFile({ url: `${URL_BASE}/a.tar.gz`, destination: join(tempDir, 'a.tar.gz') }),
    ).rejects.toThrow(DownloadError)
    expect(await readdir(tempDir)).toEqual([])
  })

  it('reports progress per chunk', async () => {
    stubFetch({ [`${URL_BASE}/a.txt`]: () => bytesResponse('12345') })
    const onProgress = vi.fn()

    await downloadFile({
      url: `${URL_BASE}/a.txt`,
      destination: join(tempDir, 'a.txt'),
      onProgress,
    })

    expect(onProgress).toHaveBeenLastCalledWith(5, expect.any(Number))
  })
})

describe('downloadFile progress', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('ends the progress line when the size was not announced', async () => {
    async function* body(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode('ab')
      yield new TextEncoder().encode('cde')
    }
    stubFetch({ [`${URL_BASE}/a.tar.gz`]: () => new Response(body()) })
    const writes: string[] = []
    const onProgress = createProgressLogger({
      prefix: 'x ',
      stream: { write: (chunk: string) => writes.push(chunk) },
    })

    await downloadFile({
      url: `${URL_BASE}/a.tar.gz`,
      destination: join(tempDir, 'a.tar.gz'),
      onProgress,
    })

    expect(writes.slice(-2)).toEqual(['\rx Downloading... 100% (5 B/5 B)', '\n'])
  })
})

type TestServer = {
  url: string
  close(): Promise<void>
}

async function startServer(handler: RequestListener): Promise<TestServer> {
  const server = createServer(handler)
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('test server has no port')
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () => {
      server.closeAllConnections()
      return new Promise((resolve, reject) =>
        server.close((error) => (error ? reject(error) : resolve())),
      )
    },
  }
}

function writeChunks(res: ServerResponse, count: number, intervalMs: number): void {
  let sent = 0
  const timer = setInterval(() => {
    res.write(Buffer.alloc(1024, 'x'))
    sent++
    if (sent === count) {
      clearInterval(timer)
      res.end()
    }
  }, intervalMs)
  res.on('close', () => clearInterval(timer))
}

describe('downloadFile over HTTP', () => {
  let tempDir: string
  let server: TestServer | undefined

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    await server?.close()
    server = undefined
    await rm(tempDir, { recursive: true, force: true })
  })

  it('finishes a steady transfer that outlasts the timeout', async () => {
    server = await startServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/octet-stream' })
      res.flushHeaders()
      writeChunks(res, 10, 60)
    })
    const destination = join(tempDir, 'a.tar.gz')

    const result = await downloadFile({
      url: `${server.url}/a.tar.gz`,
      destination,
      timeoutMs: 300,
    })

    expect(result).toEqual({ path: destination, size: 10 * 1024 })
    expect((await readFile(destination)).length).toBe(10 * 1024)
  })

  it('gives up when the body stops arriving', async () => {
    server = await startServer((_req, res) => {
      res.writeHead(200, { 'Content-Length': '4096' })
      res.write('partial')
    })
    const url = `${server.url}/a.tar.gz`

    const error = await downloadFile({
      url,
      destination: join(tempDir, 'a.tar.gz'),
      timeoutMs: 200,
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(DownloadError)
    expect(error).toMatchObject({
      message: expect.stringContaining(`Failed to read download from ${url}:`),
    })
    expect(await readdir(tempDir)).toEqual([])
  })

  it('closes the connection when reading stops early', async () => {
    let connectionClosed: Promise<void> = Promise.resolve()
    server = await startServer((_req, res) => {
      connectionClosed = new Promise((resolve) => res.on('close', () => resolve()))
      res.writeHead(200, { 'Content-Length': '4096' })
      res.write('first chunk')
    })

    await expect(
      downloadFile({
        url: `${server.url}/a.tar.gz`,
        destination: join(tempDir, 'a.tar.gz'),
        onProgress: () => {
          throw new Error('progress sink failed')
        },
      }),
    ).rejects.toThrow(DownloadError)

    await connectionClosed
    expect(await readdir(tempDir)).toEqual([])
  })
})

describe('fetchJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns the parsed body', async () => {
    stubFetch({ 'https://api.test/meta': () => jsonResponse({ tag_name: 'v1.0.0' }) })

    expect(await fetchJson('https://api.test/meta')).toEqual({ tag_name: 'v1.0.0' })
  })

  it('rejects bodies that are not JSON', async () => {
    stubFetch({ 'https://api.test/meta': () => bytesResponse('<html>') })

    await expect(fetchJson('https://api.test/meta')).rejects.toThrow(DownloadError)
  })
})

describe('formatBytes', () => {
  it.each([
    [0, '0 B'],
    [512, '512 B'],
    [1536, '1.5 KB'],
    [5 * 1024 * 1024, '5 MB'],
  ])('formats %d as %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected)
  })
})

describe('createProgressLogger', () => {
  it('writes only when the percentage changes and ends the line at 100%', () => {
    const writes: string[] = []
    const stream = { write: (chunk: string) => writes.push(chunk) }
    const report = createProgressLogger({ prefix: 'x ', stream })

    report(512, 1024)
    report(512, 1024)
    report(1024, 1024)

    expect(writes).toEqual([
      '\rx Downloading... 50% (512 B/1 KB)',
      '\rx Downloading... 100% (1 KB/1 KB)',
      '\n',
    ])
  })
})
