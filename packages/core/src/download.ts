import { createWriteStream } from 'node:fs'
import { mkdir, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { randomUUID } from 'node:crypto'
import { pipeline } from 'node:stream/promises'
import { Readable } from 'node:stream'
import type { ProvisionContext } from './context.js'
import { ProvisionError, ProvisionErrorCode } from './errors.js'
import { logger } from './logger.js'

export type DownloadOptions = {
  url: string
  destination: string
  cookie?: string
}

export type DownloadResult = {
  path: string
  size: number
}

export async function downloadFile(
  options: DownloadOptions,
): Promise<DownloadResult> {
  const { url, destination, cookie } = options

  await mkdir(dirname(destination), { recursive: true })

  const headers: Record<string, string> = {
    'User-Agent': 'bootstrap-kit/0.1.0',
  }
  if (cookie) {
    headers['Cookie'] = cookie
  }

  const response = await fetch(url, { headers })

  if (!response.ok) {
    throw new ProvisionError(
      ProvisionErrorCode.DOWNLOAD_FAILED,
      `Failed to download ${url}: ${response.status} ${response.statusText}`,
      { url, status: response.status },
    )
  }

  if (!response.body) {
    throw new ProvisionError(
      ProvisionErrorCode.DOWNLOAD_FAILED,
      `No response body received from ${url}`,
      { url },
    )
  }

  const fileStream = createWriteStream(destination)

  try {
    await pipeline(Readable.fromWeb(response.body), fileStream)
  } catch (error) {
    await rm(destination, { force: true })
    throw error
  }

  return { path: destination, size: fileStream.bytesWritten }
}

export type DownloadRequest = DownloadOptions

export interface Downloader {
  download(request: DownloadRequest): Promise<DownloadResult>
}

export class FetchDownloader implements Downloader {
  async download(request: DownloadRequest): Promise<DownloadResult> {
    logger.info({ url: request.url }, 'Downloading')
    const result = await downloadFile(request)
    logger.info({ url: request.url, size: result.size }, 'Downloaded')
    return result
  }
}

export type DownloadSource = {
  url: string
  cookie?: string
}

/**
 * Downloads `source` into the context's download directory and hands the
 * local path to `fn`. The file is removed once `fn` settles, whether it
 * resolved or threw.
 */
export async function withDownload<T>(
  ctx: ProvisionContext,
  source: DownloadSource,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  const filename = basename(new URL(source.url).pathname) || 'download'
  const destination = join(
    ctx.downloadDir,
    `download-${randomUUID().slice(0, 8)}-${filename}`,
  )

  try {
    await ctx.downloader.download({ ...source, destination })
    return await fn(destination)
  } finally {
    await rm(destination, { force: true })
  }
}
