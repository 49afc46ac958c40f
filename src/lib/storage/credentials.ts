import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { Provider } from './types.js'

export const ONEDRIVE_SCOPES: readonly string[] = ['Files.Read', 'Files.Read.All', 'offline_access']
export const GOOGLE_DRIVE_SCOPES: readonly string[] = ['https://www.googleapis.com/auth/drive.readonly']

export interface NotionCredential {
  readonly provider: 'notion'
  readonly apiKey: string
  readonly databaseId: string
  readonly scopes: readonly string[]
}

export interface OAuthClientSettings {
  readonly clientId: string
  readonly clientSecret: string
  readonly scopes: readonly string[]
  readonly tokenPath: string
  /** 0 picks an ephemeral port for the consent callback */
  readonly redirectPort: number
  readonly consentTimeoutMs: number
}

export interface OneDriveCredential extends OAuthClientSettings {
  readonly provider: 'onedrive'
  readonly tenantId: string
  readonly authMode: 'delegated' | 'application'
  readonly driveId?: string
  readonly folderPath: string
}

export interface GoogleDriveCredential extends OAuthClientSettings {
  readonly provider: 'google-drive'
  readonly credentialsPath: string
  readonly folderId: string
}

export interface CredentialMap {
  notion: NotionCredential
  onedrive: OneDriveCredential
  'google-drive': GoogleDriveCredential
}

export type Credential = CredentialMap[Provider]

export type Environment = Record<string, string | undefined>

const GUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
const NOTION_ID = /^[0-9a-f]{32}$/i
const TENANT_DOMAIN = /^[a-z0-9-]+(\.[a-z0-9-]+)+$/i

// Blank variables count as unset, the same as a missing line in .env
const optional = z
  .string()
  .optional()
  .transform(value => (value?.trim() ? value.trim() : undefined))

// Format checks sit behind a pipe so an unset variable reports one issue, not two
function required(name: string) {
  return z
    .string({ required_error: `${name} is not set` })
    .trim()
    .min(1, `${name} is not set`)
}

const sharedOAuthEnv = {
  OAUTH_REDIRECT_PORT: optional.pipe(
    z.coerce
      .number({ invalid_type_error: 'OAUTH_REDIRECT_PORT must be a port number' })
      .int()
      .min(0)
      .max(65535, 'OAUTH_REDIRECT_PORT must be a port number')
      .default(0)
  ),
  OAUTH_CONSENT_TIMEOUT_SECONDS: optional.pipe(
    z.coerce
      .number({ invalid_type_error: 'OAUTH_CONSENT_TIMEOUT_SECONDS must be a number of seconds' })
      .int()
      .positive('OAUTH_CONSENT_TIMEOUT_SECONDS must be positive')
      .default(300)
  ),
}

const NotionEnvSchema = z.object({
  NOTION_API_KEY: required('NOTION_API_KEY').pipe(
    z.string().regex(/^(secret_|ntn_)\S+$/, 'NOTION_API_KEY must be an integration token starting with "secret_" or "ntn_"')
  ),
  NOTION_DATABASE_ID: required('NOTION_DATABASE_ID').pipe(
    z
      .string()
      .transform(id => id.replace(/-/g, ''))
      .refine(id => NOTION_ID.test(id), 'NOTION_DATABASE_ID must be 32 hexadecimal characters')
  ),
})

const OneDriveEnvSchema = z
  .object({
    ONEDRIVE_CLIENT_ID: required('ONEDRIVE_CLIENT_ID').pipe(z.string().regex(GUID, 'ONEDRIVE_CLIENT_ID must be a GUID')),
    ONEDRIVE_CLIENT_SECRET: required('ONEDRIVE_CLIENT_SECRET'),
    ONEDRIVE_TENANT_ID: required('ONEDRIVE_TENANT_ID').pipe(
      z
        .string()
        .refine(
          tenant =>
            GUID.test(tenant) ||
            TENANT_DOMAIN.test(tenant) ||
            ['common', 'organizations', 'consumers'].includes(tenant),
          'ONEDRIVE_TENANT_ID must be a GUID, a domain name, or common/organizations/consumers'
        )
    ),
    ONEDRIVE_AUTH_MODE: optional.pipe(z.enum(['delegated', 'application']).default('delegated')),
    ONEDRIVE_DRIVE_ID: optional,
    ONEDRIVE_FOLDER_PATH: optional.pipe(z.string().default('/Videos')),
    ONEDRIVE_TOKEN_PATH: optional.pipe(z.string().default('onedrive_token.json')),
    ...sharedOAuthEnv,
  })
  .refine(env => env.ONEDRIVE_AUTH_MODE !== 'application' || env.ONEDRIVE_DRIVE_ID, {
    message: 'ONEDRIVE_DRIVE_ID is required when ONEDRIVE_AUTH_MODE is "application"',
  })

const GoogleDriveEnvSchema = z.object({
  GOOGLE_DRIVE_CREDENTIALS_PATH: optional.pipe(z.string().default('credentials.json')),
  GOOGLE_DRIVE_FOLDER_ID: required('GOOGLE_DRIVE_FOLDER_ID').pipe(
    z.string().regex(/^[a-zA-Z0-9_-]{10,}$/, 'GOOGLE_DRIVE_FOLDER_ID must be a Drive folder id')
  ),
  GOOGLE_DRIVE_TOKEN_PATH: optional.pipe(z.string().default('google_drive_token.json')),
  ...sharedOAuthEnv,
})

const ClientSecretsSection = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
})

// Downloaded from the Google Cloud console for "Desktop app" or "Web application" clients
const ClientSecretsSchema = z.union([
  z.object({ installed: ClientSecretsSection }).transform(file => file.installed),
  z.object({ web: ClientSecretsSection }).transform(file => file.web),
])

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => issue.message)
}

function readClientSecrets(path: string): { client_id: string; client_secret: string } | string {
  let content: string
  try {
    content = readFileSync(path, 'utf8')
  } catch {
    return `Credentials file not found: ${path}`
  }

  let json: unknown
  try {
    json = JSON.parse(content)
  } catch {
    return `Credentials file is not valid JSON: ${path}`
  }

  const parsed = ClientSecretsSchema.safeParse(json)
  if (!parsed.success) {
    return `Credentials file has no "installed" or "web" client section: ${path}`
  }
  return parsed.data
}

/**
 * Loads and validates provider credentials from an environment record.
 * Reads the local file system only; never touches the network.
 */
export class CredentialStore {
  constructor(private readonly env: Environment = process.env) {}

  load<P extends Provider>(provider: P): CredentialMap[P]
  load(provider: Provider): Credential {
    switch (provider) {
      case 'notion':
        return this.loadNotion()
      case 'onedrive':
        return this.loadOneDrive()
      case 'google-drive':
        return this.loadGoogleDrive()
      default:
        throw new Error(`Unknown storage provider: ${String(provider)}`)
    }
  }

  private loadNotion(): NotionCredential {
    const parsed = NotionEnvSchema.safeParse(this.env)
    if (!parsed.success) {
      throw new ConfigurationError('notion', formatIssues(parsed.error))
    }
    const credential: NotionCredential = {
      provider: 'notion',
      apiKey: parsed.data.NOTION_API_KEY,
      databaseId: parsed.data.NOTION_DATABASE_ID,
      scopes: [],
    }
    return Object.freeze(credential)
  }

  private loadOneDrive(): OneDriveCredential {
    const parsed = OneDriveEnvSchema.safeParse(this.env)
    if (!parsed.success) {
      throw new ConfigurationError('onedrive', formatIssues(parsed.error))
    }
    const env = parsed.data
    const credential: OneDriveCredential = {
      provider: 'onedrive',
      clientId: env.ONEDRIVE_CLIENT_ID,
      clientSecret: env.ONEDRIVE_CLIENT_SECRET,
      tenantId: env.ONEDRIVE_TENANT_ID,
      authMode: env.ONEDRIVE_AUTH_MODE,
      driveId: env.ONEDRIVE_DRIVE_ID,
      folderPath: env.ONEDRIVE_FOLDER_PATH,
      tokenPath: env.ONEDRIVE_TOKEN_PATH,
      scopes: ONEDRIVE_SCOPES,
      redirectPort: env.OAUTH_REDIRECT_PORT,
      consentTimeoutMs: env.OAUTH_CONSENT_TIMEOUT_SECONDS * 1000,
    }
    return Object.freeze(credential)
  }

  private loadGoogleDrive(): GoogleDriveCredential {
    const parsed = GoogleDriveEnvSchema.safeParse(this.env)
    const issues: string[] = parsed.success ? [] : formatIssues(parsed.error)

    const credentialsPath = parsed.success
      ? parsed.data.GOOGLE_DRIVE_CREDENTIALS_PATH
      : this.env.GOOGLE_DRIVE_CREDENTIALS_PATH?.trim() || 'credentials.json'
    const secrets = readClientSecrets(credentialsPath)
    if (typeof secrets === 'string') {
      issues.push(secrets)
    }

    if (!parsed.success || typeof secrets === 'string') {
      throw new ConfigurationError('google-drive', issues)
    }

    const env = parsed.data
    const credential: GoogleDriveCredential = {
      provider: 'google-drive',
      clientId: secrets.client_id,
      clientSecret: secrets.client_secret,
      credentialsPath,
      folderId: env.GOOGLE_DRIVE_FOLDER_ID,
      tokenPath: env.GOOGLE_DRIVE_TOKEN_PATH,
      scopes: GOOGLE_DRIVE_SCOPES,
      redirectPort: env.OAUTH_REDIRECT_PORT,
      consentTimeoutMs: env.OAUTH_CONSENT_TIMEOUT_SECONDS * 1000,
    }
    return Object.freeze(credential)
  }
}
