/**
 * Remote resource abstraction shared by Notion, OneDrive and Google Drive
 */

export type Provider = 'notion' | 'onedrive' | 'google-drive'

export const PROVIDERS: readonly Provider[] = ['notion', 'onedrive', 'google-drive']

export type PropertyValue =
  | { kind: 'string'; value: string | null }
  | { kind: 'number'; value: number | null }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string-list'; value: string[] }
  | { kind: 'date'; value: string | null }

export interface RemoteResource {
  readonly provider: Provider
  readonly id: string
  readonly name: string
  /** Bytes; 0 when the provider reports no size */
  readonly size: number
  readonly mimeType: string
  /** URL or id accepted by the owning client's download() */
  readonly downloadHandle: string
  readonly createdAt?: string
  readonly modifiedAt?: string
  /** Decoded row properties (Notion only) */
  readonly properties: Readonly<Record<string, PropertyValue>>
}

/**
 * Continuation marker round-tripped into the next page fetch. null ends the listing.
 */
export type PageCursor = string | null

export interface Page<T> {
  items: T[]
  nextCursor: PageCursor
}

export type PageFetcher<T> = (cursor: PageCursor) => Promise<Page<T>>

export interface ListOptions<TFilter = unknown, TSort = unknown> {
  /** Passed through untranslated in the provider's own query grammar */
  filter?: TFilter
  sort?: TSort
}

export interface DownloadOptions {
  /** Leave a partially written file in place when the transfer fails */
  keepPartial?: boolean
  /** Bytes buffered per stream stage; defaults to 1 MiB */
  chunkSize?: number
  /**
   * Called after every chunk with the bytes written so far and, when the
   * provider reported an identity-encoded length, the expected total
   */
  onProgress?: (written: number, total?: number) => void
}

export interface ResourceClient<TFilter = unknown, TSort = unknown> {
  readonly provider: Provider

  /**
   * Lazily list resources, fetching one page at a time
   */
  list(options?: ListOptions<TFilter, TSort>): AsyncIterable<RemoteResource>

  /**
   * Provider-native search, normalized the same way as list()
   */
  search(query: string): AsyncIterable<RemoteResource>

  /**
   * Fetch a single resource by its provider id
   */
  getResource(id: string): Promise<RemoteResource>

  /**
   * Stream a resource body to disk, returning the number of bytes written
   */
  download(handle: string, destinationPath: string, options?: DownloadOptions): Promise<number>

  getProperty(resource: RemoteResource, name: string): PropertyValue
}

export interface CachedToken {
  accessToken: string
  /** Epoch milliseconds */
  expiresAt: number
  refreshToken?: string
  scope?: string
}

export type AuthState = 'unauthenticated' | 'authenticated' | 'expired'

export interface AuthSession {
  readonly provider: Provider
  readonly state: AuthState

  /**
   * Resolve a bearer token that stays valid for at least one more request
   */
  getBearer(): Promise<string>
}
