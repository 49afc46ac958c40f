import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import { AuthenticationError, errorMessage } from '../errors.js'
import type { CachedToken, Provider } from '../types.js'
import type { OAuthGrant } from './session.js'

export interface OAuthEndpoints {
  authUrl: string
  tokenUrl: string
  scopes: readonly string[]
  /** Provider-specific parameters added to the authorization URL */
  authParams?: Record<string, string>
}

/**
 * OAuth configuration for each provider with an interactive flow
 */
export const OAUTH_CONFIG = {
  onedrive: (tenantId: string, scopes: readonly string[]): OAuthEndpoints => ({
    authUrl: `https://login.microsoftonline.com/${tenantId}/oauth2/v2.0/authorize`,
    tokenUrl: `https://login.microsoftonline.com/${tenantId}/oauth2/v2.0/token`,
    scopes,
    authParams: { response_mode: 'query' },
  }),
  'google-drive': (scopes: readonly string[]): OAuthEndpoints => ({
    authUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    scopes,
    // Without these Google only issues a refresh token on the very first consent
    authParams: { access_type: 'offline', prompt: 'consent' },
  }),
}

/**
 * Hands the user an authorization URL and waits for the redirect carrying the code
 */
export interface ConsentPrompt {
  requestCode(
    buildAuthUrl: (redirectUri: string) => string,
    state: string,
    signal: AbortSignal
  ): Promise<{ code: string; redirectUri: string }>
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
})

export interface OAuthCodeGrantOptions {
  provider: Provider
  endpoints: OAuthEndpoints
  clientId: string
  clientSecret: string
  consent: ConsentPrompt
  now?: () => number
}

/**
 * Authorization-code grant against a standard OAuth 2.0 token endpoint
 */
export class OAuthCodeGrant implements OAuthGrant {
  private readonly now: () => number

  constructor(private readonly options: OAuthCodeGrantOptions) {
    this.now = options.now ?? Date.now
  }

  async refresh(refreshToken: string): Promise<CachedToken> {
    return this.requestToken('refresh', {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      scope: this.options.endpoints.scopes.join(' '),
    })
  }

  async authorize(signal: AbortSignal): Promise<CachedToken> {
    const { endpoints, clientId } = this.options
    const state = randomUUID()

    const { code, redirectUri } = await this.options.consent.requestCode(
      redirectUri => {
        const params = new URLSearchParams({
          client_id: clientId,
          redirect_uri: redirectUri,
          response_type: 'code',
          scope: endpoints.scopes.join(' '),
          state,
          ...endpoints.authParams,
        })
        return `${endpoints.authUrl}?${params.toString()}`
      },
      state,
      signal
    )

    return this.requestToken(
      'authorize',
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: redirectUri,
      },
      signal
    )
  }

  private async requestToken(
    operation: string,
    body: Record<string, string>,
    signal?: AbortSignal
  ): Promise<CachedToken> {
    const { provider, endpoints, clientId, clientSecret } = this.options
    const context = { provider, operation, identifier: endpoints.tokenUrl }

    let response: Response
    try {
      response = await fetch(endpoints.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          ...body,
          client_id: clientId,
          client_secret: clientSecret,
        }),
        signal,
      })
    } catch (error) {
      throw new AuthenticationError(`Token endpoint unreachable: ${errorMessage(error)}`, context, {
        cause: error,
      })
    }

    if (!response.ok) {
      const errorText = await response.text()
      console.error(`[AUTH] Token ${operation} failed for ${provider}: ${response.status}`)
      throw new AuthenticationError(
        `Token ${operation} failed: ${response.status} - ${errorText}`,
        { ...context, status: response.status }
      )
    }

    const parsed = TokenResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new AuthenticationError('Token endpoint returned an unexpected payload', context)
    }

    const tokens = parsed.data
    return {
      accessToken: tokens.access_token,
      expiresAt: this.now() + tokens.expires_in * 1000,
      refreshToken: tokens.refresh_token,
      scope: tokens.scope,
    }
  }
}
