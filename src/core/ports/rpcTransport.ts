/**
 * Domain Layer - Ports
 *
 * Point-to-point RPC channel to the CCU. The client only needs introspection
 * and positional calls keyed by the remote (untranslated) method name.
 */

export type RpcTransportOptions = {
  /** Upper bound for a single request, `null` leaves it to the transport. */
  connectTimeoutMs: number | null
  headers: Record<string, string>
  basicAuth: { user: string; pass: string } | null
}

export type RpcTransport = {
  /** Introspection call: names of every method the endpoint serves. */
  listMethods: () => Promise<string[]>
  call: (remoteName: string, params: unknown[]) => Promise<unknown>
}

/** Opens a transport to an already normalized endpoint address. */
export type RpcTransportFactory = (
  address: string,
  options: RpcTransportOptions
) => RpcTransport | Promise<RpcTransport>

/**
 * The endpoint answered with a fault response.
 *
 * Transports reject with this (or `RpcResponseError`) when the request reached
 * the CCU, and with any other error when it did not.
 */
export class RpcFault extends Error {
  readonly faultCode: number | null
  readonly faultString: string

  constructor(faultCode: number | null, faultString: string, options?: { cause?: unknown }) {
    super(`XML-RPC fault ${faultCode ?? '?'}: ${faultString}`, options)
    this.name = 'RpcFault'
    this.faultCode = faultCode
    this.faultString = faultString
  }
}

/** The endpoint answered, but not with the shape the call requires. */
export class RpcResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RpcResponseError'
  }
}
