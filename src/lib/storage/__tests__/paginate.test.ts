import { describe, it, expect, vi } from 'vitest'
import { createPages } from '../../../test/factories.js'
import { PaginationError, ProviderRequestError } from '../errors.js'
import { collect, filterResources, isVideo, paginate } from '../paginate.js'
import { createResource } from '../resources.js'
import type { Page, PageCursor } from '../types.js'

const context = { provider: 'onedrive' as const, operation: 'list', identifier: '/Videos' }

function fetcherFor<T>(pages: Map<string | null, Page<T>>) {
  return vi.fn(async (cursor: PageCursor) => {
    const page = pages.get(cursor)
    if (!page) throw new Error(`unexpected cursor ${cursor}`)
    return page
  })
}

function video(name: string, mimeType = 'application/octet-stream') {
  return createResource({
    provider: 'onedrive',
    id: name,
    name,
    size: 1,
    mimeType,
    downloadHandle: name,
  })
}

describe('paginate', () => {
  it('yields every item of every page in order', async () => {
    const fetchPage = fetcherFor(createPages(['a', 'b', 'c', 'd', 'e', 'f'], 3))

    const items = await collect(paginate(fetchPage, context))

    expect(items).toEqual(['a', 'b', 'c', 'd', 'e', 'f'])
    expect(fetchPage).toHaveBeenCalledTimes(2)
    expect(fetchPage).toHaveBeenNthCalledWith(1, null)
    expect(fetchPage).toHaveBeenNthCalledWith(2, 'cursor_1')
  })

  it('does not fetch until the first item is requested', async () => {
    const fetchPage = fetcherFor(createPages([1, 2, 3, 4], 2))

    const sequence = paginate(fetchPage, context)
    expect(fetchPage).not.toHaveBeenCalled()

    const first = await sequence.next()
    expect(first).toEqual({ done: false, value: 1 })
    expect(fetchPage).toHaveBeenCalledTimes(1)
  })

  it('stops fetching when the consumer stops early', async () => {
    const fetchPage = fetcherFor(createPages([1, 2, 3, 4, 5, 6], 2))

    const items = await collect(paginate(fetchPage, context), 3)

    expect(items).toEqual([1, 2, 3])
    expect(fetchPage).toHaveBeenCalledTimes(2)
  })

  it('treats an empty cursor as the end of the listing', async () => {
    const fetchPage = vi.fn(async () => ({ items: ['only'], nextCursor: '' }))

    expect(await collect(paginate(fetchPage, context))).toEqual(['only'])
    expect(fetchPage).toHaveBeenCalledTimes(1)
  })

  it('handles an empty first page', async () => {
    const fetchPage = vi.fn(async () => ({ items: [], nextCursor: null }))

    expect(await collect(paginate(fetchPage, context))).toEqual([])
  })

  it('keeps going past empty intermediate pages', async () => {
    const pages = new Map<string | null, Page<string>>([
      [null, { items: [], nextCursor: 'next' }],
      ['next', { items: ['x'], nextCursor: null }],
    ])

    expect(await collect(paginate(fetcherFor(pages), context))).toEqual(['x'])
  })

  it('wraps provider failures in PaginationError with the page index', async () => {
    const failure = Object.assign(new Error('Too Many Requests'), { statusCode: 429 })
    const fetchPage = vi
      .fn<(cursor: PageCursor) => Promise<Page<string>>>()
      .mockResolvedValueOnce({ items: ['a'], nextCursor: 'cursor_1' })
      .mockRejectedValueOnce(failure)

    const seen: string[] = []
    const error = await (async () => {
      for await (const item of paginate(fetchPage, context)) seen.push(item)
    })().catch((e: unknown) => e)

    expect(seen).toEqual(['a'])
    expect(error).toBeInstanceOf(PaginationError)
    expect(error).toMatchObject({
      message: 'Failed to fetch page 1 of list: 429 - Too Many Requests',
      provider: 'onedrive',
      pageIndex: 1,
      status: 429,
      cause: failure,
    })
  })

  it('passes library errors through unchanged', async () => {
    const failure = new ProviderRequestError('boom', { provider: 'onedrive', operation: 'list' })
    const fetchPage = vi.fn(async () => {
      throw failure
    })

    await expect(collect(paginate(fetchPage, context))).rejects.toBe(failure)
  })

  it('produces a fresh listing each time it is called', async () => {
    const fetchPage = fetcherFor(createPages(['a', 'b'], 1))

    expect(await collect(paginate(fetchPage, context))).toEqual(['a', 'b'])
    expect(await collect(paginate(fetchPage, context))).toEqual(['a', 'b'])
    expect(fetchPage).toHaveBeenCalledTimes(4)
  })
})

describe('collect', () => {
  it('returns nothing for a non-positive limit', async () => {
    const fetchPage = vi.fn(async () => ({ items: [1], nextCursor: null }))

    expect(await collect(paginate(fetchPage, context), 0)).toEqual([])
    expect(fetchPage).not.toHaveBeenCalled()
  })
})

describe('isVideo', () => {
  it('matches video MIME types', () => {
    expect(isVideo(video('clip', 'video/mp4'))).toBe(true)
  })

  it('matches known extensions case-insensitively', () => {
    expect(isVideo(video('Lecture.MKV'))).toBe(true)
    expect(isVideo(video('notes.pdf'))).toBe(false)
  })

  it('accepts a custom extension list', () => {
    expect(isVideo(video('talk.webm'), ['.webm'])).toBe(true)
  })
})

describe('filterResources', () => {
  it('keeps only matching resources', async () => {
    const fetchPage = vi.fn(async () => ({
      items: [video('a.mp4'), video('b.txt'), video('c.mov')],
      nextCursor: null,
    }))

    const videos = await collect(filterResources(paginate(fetchPage, context), resource => isVideo(resource)))

    expect(videos.map(resource => resource.name)).toEqual(['a.mp4', 'c.mov'])
  })
})
