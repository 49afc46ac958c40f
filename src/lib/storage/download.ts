import { createWriteStream } from 'node:fs'
import { mkdir, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import { Readable, Transform } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import type { ReadableStream } from 'node:stream/web'
import { DownloadError, errorMessage, providerStatus } from './errors.js'
import type { DownloadOptions, Provider } from './types.js'

export interface DownloadContext {
  provider: Provider
  /** URL or id being downloaded */
  handle: string
}

export interface DownloadSource {
  body: Readable | ReadableStream<Uint8Array>
  /** Value of the content-length header, when the provider sent one */
  expectedLength?: number
}

// Default buffered bytes per stream stage; the payload is never held in memory as a whole
const CHUNK_SIZE = 1024 * 1024

export function parseContentLength(value: string | null | undefined): number | undefined {
  if (!value) return undefined
  const length = Number.parseInt(value, 10)
  return Number.isFinite(length) && length >= 0 ? length : undefined
}

/**
 * Byte count the decoded body should have. fetch and gaxios both inflate
 * compressed bodies, so content-length only describes an identity-encoded one.
 */
export function expectedBodyLength(
  contentLength: string | null | undefined,
  contentEncoding: string | null | undefined
): number | undefined {
  const encoding = contentEncoding?.trim().toLowerCase()
  if (encoding && encoding !== 'identity') return undefined
  return parseContentLength(contentLength)
}

/**
 * Fail before the destination exists when the response is not a success
 */
export async function sourceFromResponse(response: Response, context: DownloadContext): Promise<DownloadSource> {
  if (!response.ok || !response.body) {
    const detail = response.ok ? 'empty body' : `${response.status} ${response.statusText}`.trim()
    await response.body?.cancel()
    throw new DownloadError(`Download failed for ${context.handle}: ${detail}`, {
      provider: context.provider,
      operation: 'download',
      identifier: context.handle,
      status: response.status,
    })
  }
  return {
    body: response.body,
    expectedLength: expectedBodyLength(
      response.headers.get('content-length'),
      response.headers.get('content-encoding')
    ),
  }
}

/**
 * Stream a response body into destinationPath, returning the bytes written.
 * A short or overlong body counts as a failed download.
 */
export async function writeDownload(
  source: DownloadSource,
  destinationPath: string,
  context: DownloadContext,
  options: DownloadOptions = {}
): Promise<number> {
  const errorContext = { provider: context.provider, operation: 'download', identifier: context.handle }
  const highWaterMark = options.chunkSize ?? CHUNK_SIZE
  const { onProgress } = options
  let written = 0

  const counter = new Transform({
    highWaterMark,
    transform(chunk: Buffer, _encoding, callback) {
      written += chunk.length
      onProgress?.(written, source.expectedLength)
      callback(null, chunk)
    },
  })

  try {
    await mkdir(dirname(destinationPath), { recursive: true })
    const body = source.body instanceof Readable ? source.body : Readable.fromWeb(source.body, { highWaterMark })
    await pipeline(body, counter, createWriteStream(destinationPath, { highWaterMark }))

    if (source.expectedLength !== undefined && written !== source.expectedLength) {
      throw new DownloadError(
        `Download of ${context.handle} ended after ${written} of ${source.expectedLength} bytes`,
        errorContext
      )
    }
  } catch (error) {
    if (!options.keepPartial) {
      await rm(destinationPath, { force: true }).catch(cleanupError => {
        console.error(`[DOWNLOAD] Could not remove partial file ${destinationPath}: ${errorMessage(cleanupError)}`)
      })
    }
    if (error instanceof DownloadError) {
      throw error
    }
    throw new DownloadError(
      `Download of ${context.handle} to ${destinationPath} failed: ${errorMessage(error)}`,
      { ...errorContext, status: providerStatus(error) },
      { cause: error }
    )
  }

  console.log(`[DOWNLOAD] ${context.provider}: wrote ${written} bytes to ${destinationPath}`)
  return written
}

/**
 * Download a pre-authorized URL (Graph download URLs, Notion file URLs)
 */
export async function fetchToFile(
  url: string,
  destinationPath: string,
  context: DownloadContext,
  options?: DownloadOptions
): Promise<number> {
  let response: Response
  try {
    response = await fetch(url)
  } catch (error) {
    throw new DownloadError(
      `Download request failed for ${context.handle}: ${errorMessage(error)}`,
      { provider: context.provider, operation: 'download', identifier: context.handle },
      { cause: error }
    )
  }
  return writeDownload(await sourceFromResponse(response, context), destinationPath, context, options)
}
