import { Client } from '@notionhq/client'
import type { NotionCredential } from './credentials.js'
import { fetchToFile } from './download.js'
import { DownloadError, ProviderRequestError } from './errors.js'
import { decodeProperties, decodeProperty } from './notion-properties.js'
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

type QueryArgs = Parameters<Client['databases']['query']>[0]
type QueryResult = Awaited<ReturnType<Client['databases']['query']>>['results'][number]
type SearchResult = Awaited<ReturnType<Client['search']>>['results'][number]

export type NotionFilter = QueryArgs['filter']
export type NotionSorts = QueryArgs['sorts']

export interface NotionListOptions extends ListOptions<NotionFilter, NotionSorts> {
  /** Decode only these columns; all columns when omitted */
  properties?: string[]
}

export const NOTION_PAGE_MIME = 'application/vnd.notion.page'
const NOTION_VERSION = '2022-06-28'
const PAGE_SIZE = 100

type NotionPage = Extract<QueryResult | SearchResult, { object: 'page'; properties: unknown }>

function isFullPage(result: QueryResult | SearchResult): result is NotionPage {
  return result.object === 'page' && 'properties' in result
}

function normalizeId(id: string): string {
  return id.replace(/-/g, '')
}

/**
 * Reads rows of one Notion database as RemoteResources
 */
export class NotionClient implements ResourceClient<NotionFilter, NotionSorts> {
  readonly provider = 'notion' as const
  private readonly notion: Client

  constructor(
    private readonly credential: NotionCredential,
    private readonly session: AuthSession
  ) {
    this.notion = new Client({ notionVersion: NOTION_VERSION })
  }

  list(options: NotionListOptions = {}): AsyncIterable<RemoteResource> {
    const { databaseId } = this.credential

    return paginate(
      async (cursor): Promise<Page<RemoteResource>> => {
        const response = await this.notion.databases.query({
          database_id: databaseId,
          filter: options.filter,
          sorts: options.sort,
          start_cursor: cursor ?? undefined,
          page_size: PAGE_SIZE,
          auth: await this.session.getBearer(),
        })
        const items = response.results.filter(isFullPage).map(page => this.toResource(page, options.properties))
        console.log(`[NOTION] Fetched ${items.length} rows from database ${databaseId}`)
        return {
          items,
          nextCursor: response.has_more ? response.next_cursor : null,
        }
      },
      { provider: this.provider, operation: 'list', identifier: databaseId }
    )
  }

  /**
   * Workspace search narrowed to pages of the configured database
   */
  search(query: string): AsyncIterable<RemoteResource> {
    const databaseId = normalizeId(this.credential.databaseId)

    return paginate(
      async (cursor): Promise<Page<RemoteResource>> => {
        const response = await this.notion.search({
          query,
          filter: { property: 'object', value: 'page' },
          start_cursor: cursor ?? undefined,
          page_size: PAGE_SIZE,
          auth: await this.session.getBearer(),
        })
        return {
          items: response.results
            .filter(isFullPage)
            .filter(page => page.parent.type === 'database_id' && normalizeId(page.parent.database_id) === databaseId)
            .map(page => this.toResource(page)),
          nextCursor: response.has_more ? response.next_cursor : null,
        }
      },
      { provider: this.provider, operation: 'search', identifier: query }
    )
  }

  async getResource(id: string): Promise<RemoteResource> {
    const page = await providerRequest(this.provider, 'getResource', id, async () =>
      this.notion.pages.retrieve({ page_id: id, auth: await this.session.getBearer() })
    )
    if (!('properties' in page)) {
      throw new ProviderRequestError(`Notion returned a partial page for ${id}`, {
        provider: this.provider,
        operation: 'getResource',
        identifier: id,
      })
    }
    return this.toResource(page)
  }

  /**
   * Column name -> Notion property type, as declared on the database
   */
  async describeSchema(): Promise<Record<string, string>> {
    const { databaseId } = this.credential
    const database = await providerRequest(this.provider, 'describeSchema', databaseId, async () =>
      this.notion.databases.retrieve({ database_id: databaseId, auth: await this.session.getBearer() })
    )

    const schema: Record<string, string> = {}
    for (const [name, config] of Object.entries(database.properties)) {
      schema[name] = config.type
    }
    return schema
  }

  /**
   * Stream a file URL (typically from a "files" property) to disk.
   * Notion serves hosted files from signed URLs, so no bearer is sent.
   */
  async download(handle: string, destinationPath: string, options?: DownloadOptions): Promise<number> {
    if (!isUrl(handle)) {
      throw new DownloadError(`Notion download handles must be file URLs, got ${handle}`, {
        provider: this.provider,
        operation: 'download',
        identifier: handle,
      })
    }
    return fetchToFile(handle, destinationPath, { provider: this.provider, handle }, options)
  }

  getProperty(resource: RemoteResource, name: string): PropertyValue {
    return getProperty(resource, name)
  }

  private toResource(page: NotionPage, selection?: string[]): RemoteResource {
    const properties = decodeProperties(page.properties, selection)
    const titleName = Object.keys(page.properties).find(name => page.properties[name].type === 'title')
    const title = titleName ? decodeProperty(page.properties[titleName], titleName) : undefined

    return createResource({
      provider: this.provider,
      id: page.id,
      name: title?.kind === 'string' && title.value ? title.value : page.id,
      size: 0,
      mimeType: NOTION_PAGE_MIME,
      downloadHandle: page.url,
      createdAt: page.created_time,
      modifiedAt: page.last_edited_time,
      properties,
    })
  }
}
