/**
 * Core - Error taxonomy
 *
 * Every failure surfaced by the XML API is one of four kinds. Callers branch on
 * `kind` (or `isXmlApiError(err, kind)`) instead of on transport internals.
 */

export type XmlApiErrorKind =
  | 'configuration'
  | 'connection'
  | 'protocol'
  | 'method_not_found'

export class XmlApiError extends Error {
  readonly kind: XmlApiErrorKind

  constructor(kind: XmlApiErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'XmlApiError'
    this.kind = kind
  }
}

/** Bad construction input. Not retryable. */
export class ConfigurationError extends XmlApiError {
  constructor(message: string) {
    super('configuration', message)
    this.name = 'ConfigurationError'
  }
}

/** The transport could not be opened, or failed while a call was in flight. */
export class ConnectionError extends XmlApiError {
  readonly address: string
  readonly detail: string

  constructor(address: string, detail: string, options?: { cause?: unknown }) {
    super('connection', `Unable to open "${address}": ${detail}`, options)
    this.name = 'ConnectionError'
    this.address = address
    this.detail = detail
  }
}

/** The CCU understood the request and answered with a fault. */
export class ProtocolError extends XmlApiError {
  readonly methodName: string
  readonly faultCode: number | null
  readonly faultString: string

  constructor(
    methodName: string,
    fault: { faultCode: number | null; faultString: string },
    options?: { cause?: unknown }
  ) {
    super('protocol', `Server error calling "${methodName}": ${fault.faultString}`, options)
    this.name = 'ProtocolError'
    this.methodName = methodName
    this.faultCode = fault.faultCode
    this.faultString = fault.faultString
  }
}

export class MethodNotFoundError extends XmlApiError {
  readonly methodName: string

  constructor(methodName: string) {
    super('method_not_found', `Method "${methodName}" is not a valid method.`)
    this.name = 'MethodNotFoundError'
    this.methodName = methodName
  }
}

export function isXmlApiError(error: unknown, kind?: XmlApiErrorKind): error is XmlApiError {
  if (!(error instanceof XmlApiError)) return false
  return kind === undefined || error.kind === kind
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
