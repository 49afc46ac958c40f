import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { CachedToken, Provider } from './types.js'

export interface TokenCache {
  /**
   * Load the cached token for a provider. Missing or corrupt caches read as null.
   */
  read(provider: Provider): Promise<CachedToken | null>
  write(provider: Provider, token: CachedToken): Promise<void>
}

const CACHE_VERSION = 1

const CachedTokenSchema = z.object({
  accessToken: z.string().min(1),
  expiresAt: z.number().finite(),
  refreshToken: z.string().min(1).optional(),
  scope: z.string().optional(),
})

const CacheEnvelopeSchema = z.object({
  version: z.literal(CACHE_VERSION),
  provider: z.string(),
  savedAt: z.string(),
  token: CachedTokenSchema,
})

/**
 * One JSON file per provider. Writes go to a temp file that is renamed over the
 * target, so readers see either the previous cache or the new one.
 */
export class FileTokenCache implements TokenCache {
  constructor(private readonly paths: Partial<Record<Provider, string>>) {}

  async read(provider: Provider): Promise<CachedToken | null> {
    const path = this.paths[provider]
    if (!path) {
      return null
    }

    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch {
      return null
    }

    let json: unknown
    try {
      json = JSON.parse(content)
    } catch {
      console.warn(`[AUTH] Ignoring unreadable token cache for ${provider}: ${path}`)
      return null
    }

    const parsed = CacheEnvelopeSchema.safeParse(json)
    if (!parsed.success || parsed.data.provider !== provider) {
      console.warn(`[AUTH] Ignoring invalid token cache for ${provider}: ${path}`)
      return null
    }
    return parsed.data.token
  }

  async write(provider: Provider, token: CachedToken): Promise<void> {
    const path = this.paths[provider]
    if (!path) {
      throw new ConfigurationError(provider, [`No token cache path configured for ${provider}`])
    }

    const envelope = {
      version: CACHE_VERSION,
      provider,
      savedAt: new Date().toISOString(),
      token,
    }

    await mkdir(dirname(path), { recursive: true, mode: 0o700 })

    const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`
    try {
      await writeFile(tempPath, JSON.stringify(envelope, null, 2), { mode: 0o600 })
      await rename(tempPath, path)
    } catch (error) {
      await rm(tempPath, { force: true })
      throw error
    }
  }
}
