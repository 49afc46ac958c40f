import { PaginationError, errorMessage, isLibraryError, providerStatus } from './errors.js'
import type { Page, PageCursor, PageFetcher, Provider, RemoteResource } from './types.js'

export interface PaginationContext {
  provider: Provider
  operation: string
  /** Folder, database or query being listed */
  identifier?: string
}

/**
 * Turn a page-fetch primitive into one lazy, single-pass sequence.
 *
 * Nothing is fetched until the first item is requested. Items come out in the
 * order pages return them; the listing ends on a null or empty cursor.
 */
export async function* paginate<T>(fetchPage: PageFetcher<T>, context: PaginationContext): AsyncGenerator<T> {
  let cursor: PageCursor = null
  let pageIndex = 0

  do {
    let page: Page<T>
    try {
      page = await fetchPage(cursor)
    } catch (error) {
      if (isLibraryError(error)) {
        throw error
      }
      const status = providerStatus(error)
      throw new PaginationError(
        `Failed to fetch page ${pageIndex} of ${context.operation}: ${status ? `${status} - ` : ''}${errorMessage(error)}`,
        { ...context, status, pageIndex },
        { cause: error }
      )
    }

    yield* page.items
    cursor = page.nextCursor || null
    pageIndex++
  } while (cursor !== null)
}

/**
 * Materialize a sequence, stopping early once maxResults items were read
 */
export async function collect<T>(sequence: AsyncIterable<T>, maxResults = Infinity): Promise<T[]> {
  const items: T[] = []
  if (maxResults <= 0) {
    return items
  }
  for await (const item of sequence) {
    items.push(item)
    if (items.length >= maxResults) break
  }
  return items
}

export async function* filterResources(
  sequence: AsyncIterable<RemoteResource>,
  predicate: (resource: RemoteResource) => boolean
): AsyncGenerator<RemoteResource> {
  for await (const resource of sequence) {
    if (predicate(resource)) {
      yield resource
    }
  }
}

export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.avi', '.mov', '.mkv', '.flv', '.wmv']

export function isVideo(resource: RemoteResource, extensions: readonly string[] = VIDEO_EXTENSIONS): boolean {
  if (resource.mimeType.startsWith('video/')) {
    return true
  }
  const name = resource.name.toLowerCase()
  return extensions.some(ext => name.endsWith(ext.toLowerCase()))
}
