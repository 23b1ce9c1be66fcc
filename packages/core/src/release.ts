import type { ProjectDefinition } from './config.js'
import { fetchJson } from './download.js'
import { ResolutionError, describeError } from './errors.js'
import { SILENT_LOGGER, type Logger } from './logger.js'
import { isWindows, type Platform } from './platform.js'

export const LATEST_TAG = 'latest'

export type Release = {
  /** Concrete tag as published, e.g. `v1.2.3` */
  readonly tag: string
  /** Tag without its leading `v`, used in asset filenames */
  readonly version: string
}

export type ReleaseAsset = {
  readonly name: string
  readonly url: string
}

export type ReleaseAssets = {
  readonly archive: ReleaseAsset
  readonly checksums: ReleaseAsset
}

export type ResolveReleaseOptions = {
  ownerRepo: string
  tag?: string
  apiHost: string
  token?: string
  timeoutMs?: number
  logger?: Logger
}

type ReleaseMetadata = {
  tag_name: string
}

function isReleaseMetadata(value: unknown): value is ReleaseMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'tag_name' in value &&
    typeof value.tag_name === 'string'
  )
}

export function tagToVersion(tag: string): string {
  return tag.startsWith('v') ? tag.slice(1) : tag
}

export function getReleaseMetadataUrl(
  apiHost: string,
  ownerRepo: string,
  tag: string,
): string {
  const base = `${apiHost}/repos/${ownerRepo}/releases`
  return tag === LATEST_TAG
    ? `${base}/${LATEST_TAG}`
    : `${base}/tags/${encodeURIComponent(tag)}`
}

/**
 * Turn a requested tag (or nothing, meaning "latest") into the concrete tag
 * published on the release host. Every asset URL is built from the result,
 * never from the mutable "latest" alias.
 */
export async function resolveRelease(
  options: ResolveReleaseOptions,
): Promise<Release> {
  const { ownerRepo, apiHost, token, timeoutMs, logger = SILENT_LOGGER } = options
  const requested = options.tag?.trim() || LATEST_TAG

  if (requested === LATEST_TAG) {
    logger.info('Checking the release host for the latest tag')
  } else {
    logger.info(`Checking the release host for tag '${requested}'`)
  }

  const url = getReleaseMetadataUrl(apiHost, ownerRepo, requested)

  let metadata: unknown
  try {
    metadata = await fetchJson(url, {
      headers: {
        Accept: 'application/vnd.github+json',
        ...(token ? { Authorization: `Bearer ${token}` } : {}),
      },
      timeoutMs,
      logger,
    })
  } catch (error) {
    throw new ResolutionError(
      `Unable to find '${requested}' in ${ownerRepo} - use '${LATEST_TAG}' or an ` +
        `existing release tag (${describeError(error)})`,
      { cause: error },
    )
  }

  if (!isReleaseMetadata(metadata) || metadata.tag_name.trim() === '') {
    throw new ResolutionError(`Release metadata for '${requested}' has no tag_name`)
  }

  const tag = metadata.tag_name.trim()
  if (tag === LATEST_TAG) {
    throw new ResolutionError(`Release host returned the alias '${LATEST_TAG}' as a tag`)
  }

  const release: Release = Object.freeze({ tag, version: tagToVersion(tag) })
  logger.info(`Resolved tag ${release.tag} (version ${release.version})`)
  return release
}

export function getArchiveExtension(
  project: ProjectDefinition,
  platform: Platform,
): string {
  if (isWindows(platform)) return 'zip'
  return project.format ?? 'tar.gz'
}

export function getReleaseAssets(options: {
  project: ProjectDefinition
  release: Release
  platform: Platform
  downloadHost: string
}): ReleaseAssets {
  const { project, release, platform, downloadHost } = options
  const tag = encodeURIComponent(release.tag)
  const base = `${downloadHost}/${project.owner}/${project.repo}/releases/download/${tag}`

  const archiveName =
    `${project.name}_${release.version}_${platform.os}_${platform.arch}` +
    `.${getArchiveExtension(project, platform)}`
  const checksumsName = `${project.name}_${release.version}_checksums.txt`

  return {
    archive: { name: archiveName, url: `${base}/${archiveName}` },
    checksums: { name: checksumsName, url: `${base}/${checksumsName}` },
  }
}
