import { Client, type AuthenticationProvider } from '@microsoft/microsoft-graph-client'
import { z } from 'zod'
import type { OneDriveCredential } from './credentials.js'
import { fetchToFile } from './download.js'
import { ProviderRequestError } from './errors.js'
import { paginate } from './paginate.js'
import { createResource, getProperty, isUrl, providerRequest } from './resources.js'
import type {
  AuthSession,
  DownloadOptions,
  ListOptions,
  Page,
  PropertyValue,
  RemoteResource,
  ResourceClient,
} from './types.js'

/** OData $filter expression */
export type OneDriveFilter = string
/** OData $orderby expression */
export type OneDriveSort = string

export interface OneDriveListOptions extends ListOptions<OneDriveFilter, OneDriveSort> {
  /** Folder path relative to the drive root; defaults to the configured folder */
  folderPath?: string
}

const DriveItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number().optional(),
  file: z.object({ mimeType: z.string().optional() }).optional(),
  folder: z.object({}).passthrough().optional(),
  createdDateTime: z.string().optional(),
  lastModifiedDateTime: z.string().optional(),
  '@microsoft.graph.downloadUrl': z.string().optional(),
})

const DriveItemPageSchema = z.object({
  value: z.array(DriveItemSchema).default([]),
  '@odata.nextLink': z.string().optional(),
})

type DriveItem = z.infer<typeof DriveItemSchema>

const PAGE_SIZE = 200

/**
 * OneDrive / SharePoint document libraries through Microsoft Graph
 */
export class OneDriveClient implements ResourceClient<OneDriveFilter, OneDriveSort> {
  readonly provider = 'onedrive' as const
  private readonly client: Client
  private readonly driveBase: string

  constructor(
    private readonly credential: OneDriveCredential,
    session: AuthSession
  ) {
    // Graph asks for a token on every request, so each page gets a fresh one
    const authProvider: AuthenticationProvider = {
      getAccessToken: () => session.getBearer(),
    }
    this.client = Client.initWithMiddleware({ authProvider })
    this.driveBase = credential.driveId ? `/drives/${encodeURIComponent(credential.driveId)}` : '/me/drive'
  }

  list(options: OneDriveListOptions = {}): AsyncIterable<RemoteResource> {
    const endpoint = this.childrenEndpoint(options.folderPath ?? this.credential.folderPath)

    return paginate(
      async (cursor): Promise<Page<RemoteResource>> => {
        let request = this.client.api(cursor ?? endpoint)
        // nextLink already carries the original query options
        if (!cursor) {
          request = request.top(PAGE_SIZE)
          if (options.filter) request = request.filter(options.filter)
          if (options.sort) request = request.orderby(options.sort)
        }

        const page = this.toPage(await request.get())
        console.log(`[ONEDRIVE] Fetched ${page.items.length} files from ${cursor ?? endpoint}`)
        return page
      },
      { provider: this.provider, operation: 'list', identifier: endpoint }
    )
  }

  search(query: string): AsyncIterable<RemoteResource> {
    // OData string literals escape a single quote by doubling it
    const escaped = query.replace(/'/g, "''")
    const endpoint = `${this.driveBase}/root/search(q='${encodeURIComponent(escaped)}')`

    return paginate(
      async (cursor): Promise<Page<RemoteResource>> => this.toPage(await this.client.api(cursor ?? endpoint).get()),
      { provider: this.provider, operation: 'search', identifier: query }
    )
  }

  async getResource(id: string): Promise<RemoteResource> {
    const item = await this.fetchItem(id)
    if (!item.file) {
      throw new ProviderRequestError(`${item.name} is a folder, not a file`, {
        provider: this.provider,
        operation: 'getResource',
        identifier: id,
      })
    }
    return this.toResource(item)
  }

  /**
   * Accepts either a pre-authenticated download URL or a drive item id.
   * Download URLs expire after about an hour; item ids are resolved to a fresh one.
   */
  async download(handle: string, destinationPath: string, options?: DownloadOptions): Promise<number> {
    let url = handle
    if (!isUrl(handle)) {
      const item = await this.fetchItem(handle)
      const downloadUrl = item['@microsoft.graph.downloadUrl']
      if (!downloadUrl) {
        throw new ProviderRequestError('Download URL not found in file metadata', {
          provider: this.provider,
          operation: 'download',
          identifier: handle,
        })
      }
      url = downloadUrl
    }

    // Download URLs carry their own authorization; no bearer is sent
    return fetchToFile(url, destinationPath, { provider: this.provider, handle }, options)
  }

  getProperty(resource: RemoteResource, name: string): PropertyValue {
    return getProperty(resource, name)
  }

  private childrenEndpoint(folderPath: string): string {
    const trimmed = folderPath.replace(/^\/+|\/+$/g, '')
    if (!trimmed) {
      return `${this.driveBase}/root/children`
    }
    const encoded = trimmed.split('/').map(encodeURIComponent).join('/')
    return `${this.driveBase}/root:/${encoded}:/children`
  }

  private async fetchItem(id: string): Promise<DriveItem> {
    const raw: unknown = await providerRequest(this.provider, 'getResource', id, () =>
      this.client.api(`${this.driveBase}/items/${encodeURIComponent(id)}`).get()
    )
    const parsed = DriveItemSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ProviderRequestError(`Unexpected drive item payload for ${id}`, {
        provider: this.provider,
        operation: 'getResource',
        identifier: id,
      })
    }
    return parsed.data
  }

  private toPage(raw: unknown): Page<RemoteResource> {
    const response = DriveItemPageSchema.parse(raw)
    return {
      // Folders are skipped; only files are downloadable resources
      items: response.value.filter(item => item.file).map(item => this.toResource(item)),
      nextCursor: response['@odata.nextLink'] ?? null,
    }
  }

  private toResource(item: DriveItem): RemoteResource {
    return createResource({
      provider: this.provider,
      id: item.id,
      name: item.name,
      size: item.size ?? 0,
      mimeType: item.file?.mimeType ?? 'application/octet-stream',
      downloadHandle: item['@microsoft.graph.downloadUrl'] ?? item.id,
      createdAt: item.createdDateTime,
      modifiedAt: item.lastModifiedDateTime,
    })
  }
}
