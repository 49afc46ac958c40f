import { google } from 'googleapis'
import { z } from 'zod'
import type { GoogleDriveCredential } from './credentials.js'
import { expectedBodyLength, writeDownload, type DownloadContext } from './download.js'
import { DownloadError, ProviderRequestError, errorMessage, isLibraryError, providerStatus } from './errors.js'
import { paginate } from './paginate.js'
import { createResource, getProperty, providerRequest } from './resources.js'
import type {
  AuthSession,
  DownloadOptions,
  ListOptions,
  Page,
  PropertyValue,
  RemoteResource,
  ResourceClient,
} from './types.js'

/** Drive query-language clause, ANDed with the folder constraint */
export type GoogleDriveFilter = string
/** Drive orderBy, e.g. "modifiedTime desc" */
export type GoogleDriveSort = string

export interface GoogleDriveListOptions extends ListOptions<GoogleDriveFilter, GoogleDriveSort> {
  /** Folder to list; defaults to the configured folder */
  folderId?: string
}

const FOLDER_MIME = 'application/vnd.google-apps.folder'
const FILE_FIELDS = 'id, name, mimeType, size, createdTime, modifiedTime'
const PAGE_SIZE = 100

const DriveFileSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  mimeType: z.string().nullish(),
  // Drive reports sizes as decimal strings; Google Docs have none
  size: z.string().nullish(),
  createdTime: z.string().nullish(),
  modifiedTime: z.string().nullish(),
})

const DriveFileListSchema = z.object({
  files: z.array(DriveFileSchema).nullish(),
  nextPageToken: z.string().nullish(),
})

type DriveFile = z.infer<typeof DriveFileSchema>

/**
 * Escape a value for a single-quoted Drive query literal
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")
}

export class GoogleDriveClient implements ResourceClient<GoogleDriveFilter, GoogleDriveSort> {
  readonly provider = 'google-drive' as const
  private readonly auth: InstanceType<typeof google.auth.OAuth2>
  private readonly drive: ReturnType<typeof google.drive>

  constructor(
    private readonly credential: GoogleDriveCredential,
    private readonly session: AuthSession
  ) {
    this.auth = new google.auth.OAuth2(credential.clientId, credential.clientSecret)
    this.drive = google.drive({ version: 'v3', auth: this.auth })
  }

  list(options: GoogleDriveListOptions = {}): AsyncIterable<RemoteResource> {
    const folderId = options.folderId ?? this.credential.folderId
    let q = `'${escapeQueryValue(folderId)}' in parents and trashed = false and mimeType != '${FOLDER_MIME}'`
    if (options.filter) {
      q += ` and (${options.filter})`
    }

    return paginate(
      async (cursor): Promise<Page<RemoteResource>> => {
        await this.authorize()
        const response = await this.drive.files.list({
          q,
          fields: `nextPageToken, files(${FILE_FIELDS})`,
          pageSize: PAGE_SIZE,
          orderBy: options.sort,
          pageToken: cursor ?? undefined,
        })
        const page = this.toPage(response.data)
        console.log(`[GDRIVE] Fetched ${page.items.length} files from folder ${folderId}`)
        return page
      },
      { provider: this.provider, operation: 'list', identifier: folderId }
    )
  }

  /**
   * Matches file names and indexed content across everything the account can read
   */
  search(query: string): AsyncIterable<RemoteResource> {
    const value = escapeQueryValue(query)
    const q = `(name contains '${value}' or fullText contains '${value}') and trashed = false and mimeType != '${FOLDER_MIME}'`

    return paginate(
      async (cursor): Promise<Page<RemoteResource>> => {
        await this.authorize()
        const response = await this.drive.files.list({
          q,
          fields: `nextPageToken, files(${FILE_FIELDS})`,
          pageSize: PAGE_SIZE,
          pageToken: cursor ?? undefined,
        })
        return this.toPage(response.data)
      },
      { provider: this.provider, operation: 'search', identifier: query }
    )
  }

  async getResource(id: string): Promise<RemoteResource> {
    const response = await providerRequest(this.provider, 'getResource', id, async () => {
      await this.authorize()
      return this.drive.files.get({ fileId: id, fields: FILE_FIELDS })
    })
    const parsed = DriveFileSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new ProviderRequestError(`Unexpected file payload for ${id}`, {
        provider: this.provider,
        operation: 'getResource',
        identifier: id,
      })
    }
    return this.toResource(parsed.data)
  }

  async download(handle: string, destinationPath: string, options?: DownloadOptions): Promise<number> {
    const context: DownloadContext = { provider: this.provider, handle }

    const response = await this.openStream(handle)
    const contentLength: unknown = response.headers['content-length']
    const contentEncoding: unknown = response.headers['content-encoding']
    return writeDownload(
      {
        body: response.data,
        expectedLength: expectedBodyLength(
          typeof contentLength === 'string' ? contentLength : undefined,
          typeof contentEncoding === 'string' ? contentEncoding : undefined
        ),
      },
      destinationPath,
      context,
      options
    )
  }

  getProperty(resource: RemoteResource, name: string): PropertyValue {
    return getProperty(resource, name)
  }

  private async openStream(fileId: string) {
    try {
      await this.authorize()
      return await this.drive.files.get({ fileId, alt: 'media' }, { responseType: 'stream' })
    } catch (error) {
      // Nothing has been written yet, so a failed request leaves no file behind
      if (isLibraryError(error)) throw error
      const status = providerStatus(error)
      throw new DownloadError(
        `Download failed for ${fileId}: ${status ? `${status} - ` : ''}${errorMessage(error)}`,
        { provider: this.provider, operation: 'download', identifier: fileId, status },
        { cause: error }
      )
    }
  }

  private async authorize(): Promise<void> {
    this.auth.setCredentials({ access_token: await this.session.getBearer() })
  }

  private toPage(data: unknown): Page<RemoteResource> {
    const parsed = DriveFileListSchema.parse(data)
    return {
      items: (parsed.files ?? []).map(file => this.toResource(file)),
      nextCursor: parsed.nextPageToken ?? null,
    }
  }

  private toResource(file: DriveFile): RemoteResource {
    return createResource({
      provider: this.provider,
      id: file.id,
      name: file.name || 'unknown',
      size: parseInt(file.size || '0', 10),
      mimeType: file.mimeType || 'application/octet-stream',
      downloadHandle: file.id,
      createdAt: file.createdTime ?? undefined,
      modifiedAt: file.modifiedTime ?? undefined,
    })
  }
}
