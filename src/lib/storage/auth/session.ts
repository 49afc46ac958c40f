import type { AccessToken, TokenCredential } from '@azure/identity'
import { AuthenticationError, errorMessage, isLibraryError } from '../errors.js'
import type { TokenCache } from '../token-cache.js'
import type { AuthSession, AuthState, CachedToken, Provider } from '../types.js'

/**
 * Obtains tokens from a provider's OAuth endpoints
 */
export interface OAuthGrant {
  refresh(refreshToken: string): Promise<CachedToken>

  /**
   * Run the interactive consent flow. Must reject once the signal aborts.
   */
  authorize(signal: AbortSignal): Promise<CachedToken>
}

// Tokens this close to expiry are treated as expired
export const EXPIRY_SKEW_MS = 60_000

/**
 * Integration tokens (Notion) never expire, so there is nothing to refresh
 */
export class StaticKeySession implements AuthSession {
  readonly state: AuthState = 'authenticated'

  constructor(
    readonly provider: Provider,
    private readonly apiKey: string
  ) {}

  async getBearer(): Promise<string> {
    return this.apiKey
  }
}

/**
 * App-only Graph access. @azure/identity keeps its own in-memory cache and refreshes it.
 */
export class TokenCredentialSession implements AuthSession {
  private current: { token: string; expiresAt: number } | null = null

  constructor(
    readonly provider: Provider,
    private readonly credential: TokenCredential,
    private readonly scopes: string[],
    private readonly now: () => number = Date.now
  ) {}

  get state(): AuthState {
    if (!this.current) return 'unauthenticated'
    return this.current.expiresAt - EXPIRY_SKEW_MS > this.now() ? 'authenticated' : 'expired'
  }

  async getBearer(): Promise<string> {
    let accessToken: AccessToken | null
    try {
      accessToken = await this.credential.getToken(this.scopes)
    } catch (error) {
      throw new AuthenticationError(
        `Client credential authentication failed: ${errorMessage(error)}`,
        { provider: this.provider, operation: 'getBearer' },
        { cause: error }
      )
    }
    if (!accessToken) {
      throw new AuthenticationError('Client credential returned no token', {
        provider: this.provider,
        operation: 'getBearer',
      })
    }
    this.current = { token: accessToken.token, expiresAt: accessToken.expiresOnTimestamp }
    return accessToken.token
  }
}

export interface OAuthSessionOptions {
  provider: Provider
  grant: OAuthGrant
  cache: TokenCache
  consentTimeoutMs: number
  now?: () => number
}

/**
 * Cached-token OAuth lifecycle:
 * unauthenticated -> authenticated -> expired -> authenticated ...
 *
 * A held token is served without I/O until it nears expiry. An expired token is
 * refreshed once; a failed or impossible refresh falls back to interactive consent.
 */
export class OAuthSession implements AuthSession {
  readonly provider: Provider
  private readonly grant: OAuthGrant
  private readonly cache: TokenCache
  private readonly consentTimeoutMs: number
  private readonly now: () => number
  private token: CachedToken | null = null
  private cacheLoaded = false

  constructor(options: OAuthSessionOptions) {
    this.provider = options.provider
    this.grant = options.grant
    this.cache = options.cache
    this.consentTimeoutMs = options.consentTimeoutMs
    this.now = options.now ?? Date.now
  }

  get state(): AuthState {
    if (!this.token) return 'unauthenticated'
    return this.isUsable(this.token) ? 'authenticated' : 'expired'
  }

  async getBearer(): Promise<string> {
    if (!this.cacheLoaded) {
      this.token = await this.cache.read(this.provider)
      this.cacheLoaded = true
    }

    if (this.token && this.isUsable(this.token)) {
      return this.token.accessToken
    }

    const refreshToken = this.token?.refreshToken
    if (refreshToken) {
      const refreshed = await this.tryRefresh(refreshToken)
      if (refreshed) {
        return refreshed.accessToken
      }
    }

    return (await this.authorize()).accessToken
  }

  private isUsable(token: CachedToken): boolean {
    return token.expiresAt - EXPIRY_SKEW_MS > this.now()
  }

  private async tryRefresh(refreshToken: string): Promise<CachedToken | null> {
    let refreshed: CachedToken
    try {
      refreshed = await this.grant.refresh(refreshToken)
    } catch (error) {
      console.warn(`[AUTH] ${this.provider} token refresh failed, falling back to consent: ${errorMessage(error)}`)
      return null
    }

    // Endpoints that do not rotate refresh tokens omit them from the response
    const token: CachedToken = { ...refreshed, refreshToken: refreshed.refreshToken ?? refreshToken }
    await this.accept(token, 'refresh')
    return token
  }

  private async authorize(): Promise<CachedToken> {
    console.log(`[AUTH] ${this.provider} requires interactive consent`)
    const signal = AbortSignal.timeout(this.consentTimeoutMs)

    let token: CachedToken
    try {
      token = await this.grant.authorize(signal)
    } catch (error) {
      if (isLibraryError(error)) {
        throw error
      }
      throw new AuthenticationError(
        signal.aborted
          ? `Interactive consent timed out after ${this.consentTimeoutMs}ms`
          : `Interactive consent failed: ${errorMessage(error)}`,
        { provider: this.provider, operation: 'authorize' },
        { cause: error }
      )
    }

    await this.accept(token, 'authorize')
    return token
  }

  private async accept(token: CachedToken, operation: string): Promise<void> {
    if (!this.isUsable(token)) {
      throw new AuthenticationError('Provider issued a token that is already expired', {
        provider: this.provider,
        operation,
      })
    }

    this.token = token
    try {
      await this.cache.write(this.provider, token)
    } catch (error) {
      console.error(`[AUTH] Failed to persist ${this.provider} token cache: ${errorMessage(error)}`)
    }
  }
}
