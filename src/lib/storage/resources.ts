import { PropertyNotFoundError, ProviderRequestError, errorMessage, isLibraryError, providerStatus } from './errors.js'
import type { PropertyValue, Provider, RemoteResource } from './types.js'

type ResourceFields = Omit<RemoteResource, 'properties'> & {
  properties?: Record<string, PropertyValue>
}

/**
 * Build an immutable RemoteResource
 */
export function createResource(fields: ResourceFields): RemoteResource {
  const properties = Object.freeze({ ...fields.properties })
  return Object.freeze({ ...fields, properties })
}

/**
 * Look up a decoded property, failing loudly when the schema no longer has it
 */
export function getProperty(resource: RemoteResource, name: string): PropertyValue {
  if (!Object.hasOwn(resource.properties, name)) {
    throw new PropertyNotFoundError(name, resource.id)
  }
  return resource.properties[name]
}

/**
 * Run a single provider call, attaching provider context to anything it throws
 */
export async function providerRequest<T>(
  provider: Provider,
  operation: string,
  identifier: string,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call()
  } catch (error) {
    if (isLibraryError(error)) {
      throw error
    }
    const status = providerStatus(error)
    throw new ProviderRequestError(
      `${operation} failed for ${identifier}: ${status ? `${status} - ` : ''}${errorMessage(error)}`,
      { provider, operation, identifier, status },
      { cause: error }
    )
  }
}

export function isUrl(handle: string): boolean {
  return /^https?:\/\//i.test(handle)
}
