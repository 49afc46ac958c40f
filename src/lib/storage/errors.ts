import type { Provider } from './types.js'

export interface ErrorContext {
  provider: Provider
  operation: string
  /** Resource, page or setting the failure is about */
  identifier?: string
  /** HTTP status reported by the provider */
  status?: number
}

/**
 * Base class for every error raised by the storage clients
 */
export class ConnectorError extends Error {
  readonly provider: Provider
  readonly operation: string
  readonly identifier?: string
  readonly status?: number

  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConnectorError'
    this.provider = context.provider
    this.operation = context.operation
    this.identifier = context.identifier
    this.status = context.status
  }
}

export class ConfigurationError extends ConnectorError {
  readonly issues: string[]

  constructor(provider: Provider, issues: string[]) {
    super(
      `${provider} configuration errors:\n` + issues.map(issue => `  - ${issue}`).join('\n'),
      { provider, operation: 'configure' }
    )
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

export class AuthenticationError extends ConnectorError {
  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options)
    this.name = 'AuthenticationError'
  }
}

export class PaginationError extends ConnectorError {
  readonly pageIndex: number

  constructor(message: string, context: ErrorContext & { pageIndex: number }, options?: { cause?: unknown }) {
    super(message, context, options)
    this.name = 'PaginationError'
    this.pageIndex = context.pageIndex
  }
}

export class DownloadError extends ConnectorError {
  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options)
    this.name = 'DownloadError'
  }
}

export class ProviderRequestError extends ConnectorError {
  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options)
    this.name = 'ProviderRequestError'
  }
}

export class UnsupportedPropertyTypeError extends Error {
  readonly tag: string

  constructor(tag: string, propertyName?: string) {
    super(
      propertyName
        ? `Unsupported Notion property type "${tag}" on property "${propertyName}"`
        : `Unsupported Notion property type "${tag}"`
    )
    this.name = 'UnsupportedPropertyTypeError'
    this.tag = tag
  }
}

export class PropertyDecodeError extends Error {
  readonly tag: string

  constructor(tag: string, detail: string) {
    super(`Malformed Notion "${tag}" property: ${detail}`)
    this.name = 'PropertyDecodeError'
    this.tag = tag
  }
}

export class PropertyNotFoundError extends Error {
  readonly propertyName: string
  readonly resourceId: string

  constructor(propertyName: string, resourceId: string) {
    super(`Property "${propertyName}" not found on resource ${resourceId}`)
    this.name = 'PropertyNotFoundError'
    this.propertyName = propertyName
    this.resourceId = resourceId
  }
}

/**
 * Errors that already describe a failure well enough to pass through unwrapped
 */
export function isLibraryError(error: unknown): boolean {
  return (
    error instanceof ConnectorError ||
    error instanceof UnsupportedPropertyTypeError ||
    error instanceof PropertyDecodeError ||
    error instanceof PropertyNotFoundError
  )
}

/**
 * Pull the HTTP status out of Graph, Notion and gaxios errors
 */
export function providerStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status
  }
  return undefined
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
