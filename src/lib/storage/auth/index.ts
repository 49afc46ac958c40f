import { ClientSecretCredential } from '@azure/identity'
import type { Credential } from '../credentials.js'
import { FileTokenCache, type TokenCache } from '../token-cache.js'
import type { AuthSession } from '../types.js'
import { LoopbackConsent } from './consent.js'
import { OAUTH_CONFIG, OAuthCodeGrant, type ConsentPrompt } from './oauth-grant.js'
import { OAuthSession, StaticKeySession, TokenCredentialSession } from './session.js'

export * from './session.js'
export * from './oauth-grant.js'
export * from './consent.js'

export interface AuthSessionOptions {
  /** Defaults to a FileTokenCache at the credential's tokenPath */
  cache?: TokenCache
  /** Defaults to a LoopbackConsent on the credential's redirectPort */
  consent?: ConsentPrompt
  onAuthUrl?: (url: string) => void
  now?: () => number
}

/**
 * Build the auth session matching a provider's credential type
 */
export function createAuthSession(credential: Credential, options: AuthSessionOptions = {}): AuthSession {
  switch (credential.provider) {
    case 'notion':
      return new StaticKeySession('notion', credential.apiKey)

    case 'onedrive': {
      if (credential.authMode === 'application') {
        const azureCredential = new ClientSecretCredential(
          credential.tenantId,
          credential.clientId,
          credential.clientSecret
        )
        return new TokenCredentialSession(
          'onedrive',
          azureCredential,
          ['https://graph.microsoft.com/.default'],
          options.now
        )
      }
      return new OAuthSession({
        provider: 'onedrive',
        grant: new OAuthCodeGrant({
          provider: 'onedrive',
          endpoints: OAUTH_CONFIG.onedrive(credential.tenantId, credential.scopes),
          clientId: credential.clientId,
          clientSecret: credential.clientSecret,
          consent: options.consent ?? loopback(credential.provider, credential.redirectPort, options),
          now: options.now,
        }),
        cache: options.cache ?? new FileTokenCache({ onedrive: credential.tokenPath }),
        consentTimeoutMs: credential.consentTimeoutMs,
        now: options.now,
      })
    }

    case 'google-drive':
      return new OAuthSession({
        provider: 'google-drive',
        grant: new OAuthCodeGrant({
          provider: 'google-drive',
          endpoints: OAUTH_CONFIG['google-drive'](credential.scopes),
          clientId: credential.clientId,
          clientSecret: credential.clientSecret,
          consent: options.consent ?? loopback(credential.provider, credential.redirectPort, options),
          now: options.now,
        }),
        cache: options.cache ?? new FileTokenCache({ 'google-drive': credential.tokenPath }),
        consentTimeoutMs: credential.consentTimeoutMs,
        now: options.now,
      })
  }
}

function loopback(provider: Credential['provider'], port: number, options: AuthSessionOptions): ConsentPrompt {
  return new LoopbackConsent({ provider, port, onAuthUrl: options.onAuthUrl })
}
