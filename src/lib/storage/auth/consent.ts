import type { Server } from 'node:net'
import { serve } from '@hono/node-server'
import { Hono } from 'hono'
import { AuthenticationError } from '../errors.js'
import type { Provider } from '../types.js'
import type { ConsentPrompt } from './oauth-grant.js'

export type ConsentResult = { code: string } | { error: string; description?: string }

/**
 * Redirect target for the browser after the user grants (or denies) access.
 * Requests with a foreign state are rejected without settling the flow.
 */
export function createConsentCallbackApp(expectedState: string, settle: (result: ConsentResult) => void) {
  const app = new Hono()

  app.get('/', c => {
    const code = c.req.query('code')
    const state = c.req.query('state')
    const error = c.req.query('error')

    if (state !== expectedState) {
      return c.text('Invalid or expired authorization state.', 400)
    }

    if (error) {
      settle({ error, description: c.req.query('error_description') })
      return c.text('Access was not granted. You can close this window.', 403)
    }

    if (!code) {
      return c.text('Missing authorization code.', 400)
    }

    settle({ code })
    return c.text('Authorization complete. You can close this window.')
  })

  return app
}

export interface LoopbackConsentOptions {
  provider: Provider
  /** 0 lets the OS pick a free port */
  port?: number
  /** Called with the URL the user must open; logs it when omitted */
  onAuthUrl?: (url: string) => void
}

/**
 * Interactive consent through a short-lived HTTP listener on localhost
 */
export class LoopbackConsent implements ConsentPrompt {
  constructor(private readonly options: LoopbackConsentOptions) {}

  async requestCode(
    buildAuthUrl: (redirectUri: string) => string,
    state: string,
    signal: AbortSignal
  ): Promise<{ code: string; redirectUri: string }> {
    const { provider } = this.options
    const context = { provider, operation: 'authorize' }

    if (signal.aborted) {
      throw new AuthenticationError('Interactive consent was cancelled', context)
    }

    let settle: (result: ConsentResult) => void = () => {}
    const result = new Promise<ConsentResult>(resolve => {
      settle = resolve
    })
    const app = createConsentCallbackApp(state, settle)

    let listening: (port: number) => void = () => {}
    let listenFailed: (error: AuthenticationError) => void = () => {}
    const bound = new Promise<number>((resolve, reject) => {
      listening = resolve
      listenFailed = reject
    })

    const server: Server = serve({ fetch: app.fetch, port: this.options.port ?? 0, hostname: 'localhost' }, info => {
      listening(info.port)
    })
    // A taken redirect port fails the flow now instead of waiting out the timeout
    server.once('error', (error: Error) => {
      listenFailed(
        new AuthenticationError(`Could not listen for the consent callback: ${error.message}`, context, { cause: error })
      )
    })

    const aborted = new Promise<never>((_, reject) => {
      signal.addEventListener(
        'abort',
        () => reject(new AuthenticationError('Interactive consent timed out', context, { cause: signal.reason })),
        { once: true }
      )
    })
    // The races below may settle first; keep a late rejection from surfacing as unhandled
    aborted.catch(() => undefined)
    bound.catch(() => undefined)

    try {
      const port = await Promise.race([bound, aborted])
      const redirectUri = `http://localhost:${port}/`
      const authUrl = buildAuthUrl(redirectUri)

      if (this.options.onAuthUrl) {
        this.options.onAuthUrl(authUrl)
      } else {
        console.log(`[AUTH] Open this URL in a browser to authorize ${provider}:\n${authUrl}`)
      }

      const outcome = await Promise.race([result, aborted])
      if ('error' in outcome) {
        throw new AuthenticationError(
          `Authorization denied: ${outcome.error}${outcome.description ? ` - ${outcome.description}` : ''}`,
          context
        )
      }
      return { code: outcome.code, redirectUri }
    } finally {
      server.close()
    }
  }
}
