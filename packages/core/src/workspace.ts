import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describeError } from './errors.js'
import { SILENT_LOGGER, type Logger } from './logger.js'

export type ScratchWorkspaceOptions = {
  root?: string
  prefix?: string
  logger?: Logger
}

/**
 * Runs `fn` inside a freshly created temporary directory that belongs to this
 * call alone. The directory is removed once `fn` settles, whatever the outcome.
 */
export async function withScratchWorkspace<T>(
  fn: (dir: string) => Promise<T>,
  options: ScratchWorkspaceOptions = {},
): Promise<T> {
  const { root = tmpdir(), prefix = 'binfetch-', logger = SILENT_LOGGER } = options

  await mkdir(root, { recursive: true })
  const dir = await mkdtemp(join(root, prefix))
  logger.debug(`downloading files into ${dir}`)

  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn(`Failed to remove ${dir}: ${describeError(error)}`)
    })
  }
}
