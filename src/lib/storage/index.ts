import { createAuthSession, type AuthSessionOptions } from './auth/index.js'
import { CredentialStore } from './credentials.js'
import { GoogleDriveClient } from './google-drive.js'
import { NotionClient } from './notion.js'
import { OneDriveClient } from './onedrive.js'
import type { AuthSession, Provider } from './types.js'

export * from './types.js'
export * from './errors.js'
export * from './credentials.js'
export * from './token-cache.js'
export * from './paginate.js'
export * from './download.js'
export * from './resources.js'
export * from './notion-properties.js'
export * from './auth/index.js'
export { NotionClient, NOTION_PAGE_MIME } from './notion.js'
export type { NotionFilter, NotionSorts, NotionListOptions } from './notion.js'
export { OneDriveClient } from './onedrive.js'
export type { OneDriveFilter, OneDriveSort, OneDriveListOptions } from './onedrive.js'
export { GoogleDriveClient, escapeQueryValue } from './google-drive.js'
export type { GoogleDriveFilter, GoogleDriveSort, GoogleDriveListOptions } from './google-drive.js'

export interface ResourceClientMap {
  notion: NotionClient
  onedrive: OneDriveClient
  'google-drive': GoogleDriveClient
}

export interface ResourceClientOptions extends AuthSessionOptions {
  /** Defaults to a store over process.env */
  credentials?: CredentialStore
  /** Skip building a session from the credential, e.g. to share one between clients */
  session?: AuthSession
}

/**
 * Get the resource client for a given provider.
 * Credentials are validated here; no network call is made until the first request.
 */
export function createResourceClient<P extends Provider>(provider: P, options?: ResourceClientOptions): ResourceClientMap[P]
export function createResourceClient(
  provider: Provider,
  options: ResourceClientOptions = {}
): ResourceClientMap[Provider] {
  const store = options.credentials ?? new CredentialStore()

  switch (provider) {
    case 'notion': {
      const credential = store.load('notion')
      return new NotionClient(credential, options.session ?? createAuthSession(credential, options))
    }
    case 'onedrive': {
      const credential = store.load('onedrive')
      return new OneDriveClient(credential, options.session ?? createAuthSession(credential, options))
    }
    case 'google-drive': {
      const credential = store.load('google-drive')
      return new GoogleDriveClient(credential, options.session ?? createAuthSession(credential, options))
    }
    default:
      throw new Error(`Unknown storage provider: ${String(provider)}`)
  }
}

/**
 * Detect storage provider from URL
 */
export function detectProvider(url: string): Provider | null {
  if (url.includes('notion.so') || url.includes('notion.site')) {
    return 'notion'
  }
  if (
    url.includes('sharepoint.com') ||
    url.includes('onedrive.live.com') ||
    url.includes('onedrive.com') ||
    url.includes('1drv.ms')
  ) {
    return 'onedrive'
  }
  if (url.includes('drive.google.com')) {
    return 'google-drive'
  }
  return null
}
