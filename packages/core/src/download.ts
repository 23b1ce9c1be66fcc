import { createWriteStream } from 'node:fs'
import { mkdir, rename, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { DownloadError, describeError } from './errors.js'
import { SILENT_LOGGER, type Logger } from './logger.js'

export const DEFAULT_TIMEOUT_MS = 30_000
export const USER_AGENT = 'binfetch/0.1.0'

export type RequestOptions = {
  headers?: Record<string, string>
  timeoutMs?: number
  logger?: Logger
}

export type DownloadOptions = RequestOptions & {
  url: string
  destination: string
  onProgress?: (downloaded: number, total: number) => void
}

export type DownloadResult = {
  path: string
  size: number
}

type IdleTimeout = {
  readonly signal: AbortSignal
  reset(): void
  clear(): void
}

/**
 * Aborts `signal` once no progress has been reported for `timeoutMs`. The
 * timer starts before the request and is restarted by `reset()`, so a slow
 * but steady transfer never hits it.
 */
function createIdleTimeout(url: string, timeoutMs: number): IdleTimeout {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const reset = () => {
    clearTimeout(timer)
    timer = setTimeout(() => {
      controller.abort(new Error(`No data received from ${url} for ${timeoutMs} ms`))
    }, timeoutMs)
    timer.unref()
  }
  reset()

  return {
    signal: controller.signal,
    reset,
    clear: () => clearTimeout(timer),
  }
}

async function request(
  url: string,
  options: RequestOptions,
  signal: AbortSignal,
): Promise<Response> {
  const { headers = {}, logger = SILENT_LOGGER } = options

  logger.trace(`GET ${url}`)

  let response: Response
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, ...headers },
      redirect: 'follow',
      signal,
    })
  } catch (error) {
    throw new DownloadError(
      `Network error fetching ${url}: ${describeError(error)}`,
      undefined,
      { cause: error },
    )
  }

  logger.debug(`received HTTP status ${response.status} for ${url}`)

  if (!response.ok) {
    throw new DownloadError(
      `Failed to download ${url}: ${response.status} ${response.statusText}`.trim(),
      response.status,
    )
  }

  return response
}

export async function fetchJson(
  url: string,
  options: RequestOptions = {},
): Promise<unknown> {
  const idle = createIdleTimeout(url, options.timeoutMs ?? DEFAULT_TIMEOUT_MS)

  try {
    const response = await request(url, options, idle.signal)
    idle.reset()

    try {
      return await response.json()
    } catch (error) {
      throw new DownloadError(
        `Invalid JSON received from ${url}: ${describeError(error)}`,
        response.status,
        { cause: error },
      )
    }
  } finally {
    idle.clear()
  }
}

type ResponseBody = NonNullable<Response['body']>

async function* readChunks(
  body: ResponseBody,
  onChunk: (chunk: Uint8Array) => void,
  logger: Logger,
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader()
  let finished = false
  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) {
        finished = true
        break
      }
      onChunk(value)
      yield value
    }
  } finally {
    // stopped early: release the connection instead of leaving it half read
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        logger.debug(`cancelling response body failed: ${describeError(error)}`)
      })
    }
    reader.releaseLock()
  }
}

/**
 * Streams `url` into `destination`. The body is written to a `.part` sibling
 * and renamed once complete, so `destination` only ever holds a full file.
 * `timeoutMs` bounds the wait for the response and every gap between chunks,
 * not the whole transfer.
 */
export async function downloadFile(
  options: DownloadOptions,
): Promise<DownloadResult> {
  const {
    url,
    destination,
    onProgress,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    logger = SILENT_LOGGER,
  } = options

  logger.debug(`downloading ${url}`)
  await mkdir(dirname(destination), { recursive: true })

  const idle = createIdleTimeout(url, timeoutMs)
  const partial = `${destination}.part`
  let downloaded = 0

  try {
    const response = await request(url, options, idle.signal)
    idle.reset()

    if (!response.body) {
      throw new DownloadError(`No response body received from ${url}`, response.status)
    }

    const total = Number(response.headers.get('content-length')) || 0

    try {
      await pipeline(
        Readable.from(
          readChunks(
            response.body,
            (chunk) => {
              idle.reset()
              downloaded += chunk.length
              onProgress?.(downloaded, total)
            },
            logger,
          ),
        ),
        createWriteStream(partial),
      )
      await rename(partial, destination)
    } catch (error) {
      await rm(partial, { force: true })
      throw new DownloadError(
        `Failed to read download from ${url}: ${describeError(error)}`,
        response.status,
        { cause: error },
      )
    }

    // without a usable content-length the progress line never reached 100%
    if (downloaded > 0 && (total <= 0 || downloaded < total)) {
      onProgress?.(downloaded, downloaded)
    }
  } finally {
    idle.clear()
  }

  logger.trace(`wrote ${formatBytes(downloaded)} to ${destination}`)

  return { path: destination, size: downloaded }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}

export type ProgressStream = {
  write(chunk: string): unknown
}

export function createProgressLogger(
  options: { prefix?: string; stream?: ProgressStream } = {},
): (downloaded: number, total: number) => void {
  const { prefix = '', stream = process.stderr } = options
  let lastPercent = -1

  return (downloaded: number, total: number) => {
    const percent = total > 0 ? Math.round((downloaded / total) * 100) : 0

    if (percent !== lastPercent) {
      lastPercent = percent
      const downloadedStr = formatBytes(downloaded)
      const totalStr = total > 0 ? formatBytes(total) : 'unknown'
      stream.write(
        `\r${prefix}Downloading... ${percent}% (${downloadedStr}/${totalStr})`,
      )
      if (total > 0 && downloaded >= total) {
        stream.write('\n')
      }
    }
  }
}
