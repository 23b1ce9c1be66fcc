import { mkdir, readdir, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { PermissionError } from './errors.js'
import { installBinary } from './install.js'
import { createTarArchive, createTempDir } from './test-utils.js'

const denial = vi.hoisted(() => ({ rename: false }))

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>()
  return {
    ...actual,
    rename: async (from: string, to: string) => {
      if (denial.rename) {
        throw Object.assign(new Error(`EACCES: permission denied, rename '${from}'`), {
          code: 'EACCES',
        })
      }
      return actual.rename(from, to)
    },
  }
})

describe('installBinary without write access', () => {
  let tempDir: string
  let workDir: string
  let targetDir: string
  let archivePath: string

  beforeEach(async () => {
    tempDir = await createTempDir()
    workDir = join(tempDir, 'work')
    targetDir = join(tempDir, 'bin')
    archivePath = join(tempDir, 'foo.tar.gz')
    await mkdir(workDir)
    await createTarArchive(archivePath, { foo: 'binary' })
    denial.rename = true
  })

  afterEach(async () => {
    denial.rename = false
    await rm(tempDir, { recursive: true, force: true })
  })

  it('fails with PermissionError and removes the staged copy', async () => {
    const error = await installBinary({ archivePath, binaryName: 'foo', targetDir, workDir }).catch(
      (e: unknown) => e,
    )

    expect(error).toBeInstanceOf(PermissionError)
    expect(error).toMatchObject({
      path: join(targetDir, 'foo'),
      message: `Permission denied writing ${join(targetDir, 'foo')}`,
    })
    expect(await readdir(targetDir)).toEqual([])
  })

  it('escalates exactly once with the extracted binary', async () => {
    const escalate = vi.fn(async (_source: string, _denied: PermissionError) => '/elevated/foo')

    const installed = await installBinary({
      archivePath,
      binaryName: 'foo',
      targetDir,
      workDir,
      escalate,
    })

    expect(installed).toBe('/elevated/foo')
    expect(escalate).toHaveBeenCalledTimes(1)
    expect(escalate.mock.calls[0]?.[0]).toBe(join(workDir, 'extracted', 'foo'))
    expect(escalate.mock.calls[0]?.[1]).toBeInstanceOf(PermissionError)
  })

  it('surfaces the failure of the elevated attempt without retrying again', async () => {
    const escalate = vi.fn(async (_source: string, denied: PermissionError): Promise<string> => {
      throw new PermissionError('Elevated install failed', denied.path)
    })

    await expect(
      installBinary({ archivePath, binaryName: 'foo', targetDir, workDir, escalate }),
    ).rejects.toThrow('Elevated install failed')
    expect(escalate).toHaveBeenCalledTimes(1)
  })
})
