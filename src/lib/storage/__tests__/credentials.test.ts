import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createTempDir } from '../../../test/factories.js'
import { CredentialStore, GOOGLE_DRIVE_SCOPES, ONEDRIVE_SCOPES } from '../credentials.js'
import { ConfigurationError } from '../errors.js'

function loadError(store: CredentialStore, provider: 'notion' | 'onedrive' | 'google-drive'): ConfigurationError {
  try {
    store.load(provider)
  } catch (error) {
    if (error instanceof ConfigurationError) return error
    throw error
  }
  throw new Error(`expected ${provider} credentials to be rejected`)
}

describe('CredentialStore', () => {
  describe('notion', () => {
    it('loads the integration key and database id', () => {
      const store = new CredentialStore({
        NOTION_API_KEY: 'secret_test-notion-key',
        NOTION_DATABASE_ID: '01234567-89ab-cdef-0123-456789abcdef',
      })

      expect(store.load('notion')).toEqual({
        provider: 'notion',
        apiKey: 'secret_test-notion-key',
        databaseId: '0123456789abcdef0123456789abcdef',
        scopes: [],
      })
    })

    it('returns a frozen credential', () => {
      const store = new CredentialStore({
        NOTION_API_KEY: 'ntn_test-notion-key',
        NOTION_DATABASE_ID: '0123456789abcdef0123456789abcdef',
      })

      expect(Object.isFrozen(store.load('notion'))).toBe(true)
    })

    it('reports every missing variable at once', () => {
      const error = loadError(new CredentialStore({ NOTION_API_KEY: '  ' }), 'notion')

      expect(error.issues).toEqual(['NOTION_API_KEY is not set', 'NOTION_DATABASE_ID is not set'])
      expect(error.message).toBe(
        'notion configuration errors:\n  - NOTION_API_KEY is not set\n  - NOTION_DATABASE_ID is not set'
      )
    })

    it('rejects malformed values', () => {
      const error = loadError(
        new CredentialStore({ NOTION_API_KEY: 'not-a-token', NOTION_DATABASE_ID: 'abc' }),
        'notion'
      )

      expect(error.issues).toEqual([
        'NOTION_API_KEY must be an integration token starting with "secret_" or "ntn_"',
        'NOTION_DATABASE_ID must be 32 hexadecimal characters',
      ])
    })
  })

  describe('onedrive', () => {
    const baseEnv = {
      ONEDRIVE_CLIENT_ID: '11111111-2222-3333-4444-555555555555',
      ONEDRIVE_CLIENT_SECRET: 'test-secret',
      ONEDRIVE_TENANT_ID: 'contoso.onmicrosoft.com',
    }

    it('applies defaults for optional settings', () => {
      expect(new CredentialStore(baseEnv).load('onedrive')).toEqual({
        provider: 'onedrive',
        clientId: '11111111-2222-3333-4444-555555555555',
        clientSecret: 'test-secret',
        tenantId: 'contoso.onmicrosoft.com',
        authMode: 'delegated',
        driveId: undefined,
        folderPath: '/Videos',
        tokenPath: 'onedrive_token.json',
        scopes: ONEDRIVE_SCOPES,
        redirectPort: 0,
        consentTimeoutMs: 300_000,
      })
    })

    it('reads overrides', () => {
      const credential = new CredentialStore({
        ...baseEnv,
        ONEDRIVE_FOLDER_PATH: '/Lectures',
        ONEDRIVE_TOKEN_PATH: '/tmp/od.json',
        OAUTH_REDIRECT_PORT: '8765',
        OAUTH_CONSENT_TIMEOUT_SECONDS: '30',
      }).load('onedrive')

      expect(credential).toMatchObject({
        folderPath: '/Lectures',
        tokenPath: '/tmp/od.json',
        redirectPort: 8765,
        consentTimeoutMs: 30_000,
      })
    })

    it('requires a drive id in application mode', () => {
      const error = loadError(new CredentialStore({ ...baseEnv, ONEDRIVE_AUTH_MODE: 'application' }), 'onedrive')

      expect(error.issues).toEqual(['ONEDRIVE_DRIVE_ID is required when ONEDRIVE_AUTH_MODE is "application"'])
    })

    it('accepts application mode with a drive id', () => {
      const credential = new CredentialStore({
        ...baseEnv,
        ONEDRIVE_AUTH_MODE: 'application',
        ONEDRIVE_DRIVE_ID: 'b!drive-id',
      }).load('onedrive')

      expect(credential).toMatchObject({ authMode: 'application', driveId: 'b!drive-id' })
    })

    it('rejects a client id that is not a GUID', () => {
      const error = loadError(new CredentialStore({ ...baseEnv, ONEDRIVE_CLIENT_ID: 'my-app' }), 'onedrive')

      expect(error.issues).toEqual(['ONEDRIVE_CLIENT_ID must be a GUID'])
    })
  })

  describe('google-drive', () => {
    let dir: Awaited<ReturnType<typeof createTempDir>>

    beforeEach(async () => {
      dir = await createTempDir()
    })

    afterEach(async () => {
      await dir.cleanup()
    })

    it('reads the client id and secret from an installed-app credentials file', async () => {
      const credentialsPath = join(dir.path, 'credentials.json')
      await writeFile(
        credentialsPath,
        JSON.stringify({ installed: { client_id: 'test-client-id', client_secret: 'test-secret' } })
      )

      const credential = new CredentialStore({
        GOOGLE_DRIVE_CREDENTIALS_PATH: credentialsPath,
        GOOGLE_DRIVE_FOLDER_ID: 'folder_abc123xyz',
      }).load('google-drive')

      expect(credential).toEqual({
        provider: 'google-drive',
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        credentialsPath,
        folderId: 'folder_abc123xyz',
        tokenPath: 'google_drive_token.json',
        scopes: GOOGLE_DRIVE_SCOPES,
        redirectPort: 0,
        consentTimeoutMs: 300_000,
      })
    })

    it('accepts a web-application credentials file', async () => {
      const credentialsPath = join(dir.path, 'web.json')
      await writeFile(credentialsPath, JSON.stringify({ web: { client_id: 'web-client', client_secret: 'test-secret' } }))

      const credential = new CredentialStore({
        GOOGLE_DRIVE_CREDENTIALS_PATH: credentialsPath,
        GOOGLE_DRIVE_FOLDER_ID: 'folder_abc123xyz',
      }).load('google-drive')

      expect(credential.clientId).toBe('web-client')
    })

    it('reports a missing credentials file alongside missing variables', () => {
      const credentialsPath = join(dir.path, 'missing.json')
      const error = loadError(new CredentialStore({ GOOGLE_DRIVE_CREDENTIALS_PATH: credentialsPath }), 'google-drive')

      expect(error.issues).toEqual([
        'GOOGLE_DRIVE_FOLDER_ID is not set',
        `Credentials file not found: ${credentialsPath}`,
      ])
    })

    it('rejects a credentials file that is not JSON', async () => {
      const credentialsPath = join(dir.path, 'credentials.json')
      await writeFile(credentialsPath, 'client_id=abc')

      const error = loadError(
        new CredentialStore({ GOOGLE_DRIVE_CREDENTIALS_PATH: credentialsPath, GOOGLE_DRIVE_FOLDER_ID: 'folder_abc123xyz' }),
        'google-drive'
      )

      expect(error.issues).toEqual([`Credentials file is not valid JSON: ${credentialsPath}`])
    })

    it('rejects a credentials file without a client section', async () => {
      const credentialsPath = join(dir.path, 'credentials.json')
      await writeFile(credentialsPath, JSON.stringify({ type: 'service_account' }))

      const error = loadError(
        new CredentialStore({ GOOGLE_DRIVE_CREDENTIALS_PATH: credentialsPath, GOOGLE_DRIVE_FOLDER_ID: 'folder_abc123xyz' }),
        'google-drive'
      )

      expect(error.issues).toEqual([`Credentials file has no "installed" or "web" client section: ${credentialsPath}`])
    })
  })
})
