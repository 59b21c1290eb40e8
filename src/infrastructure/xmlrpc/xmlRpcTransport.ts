import xmlrpc from 'xmlrpc'
import { z } from 'zod'
import {
  RpcFault,
  RpcResponseError,
  type RpcTransport,
  type RpcTransportOptions,
} from '../../core/ports/rpcTransport.js'

const LIST_METHODS = 'system.listMethods'

const MethodListSchema = z.array(z.string())

type XmlRpcClientOptions = {
  host: string
  port: number | undefined
  path: string
  headers: Record<string, string>
  basic_auth: { user: string; pass: string } | undefined
}

/**
 * XML-RPC transport backed by the `xmlrpc` package.
 *
 * Creating the transport opens no socket; every call is its own HTTP request.
 * With `connectTimeoutMs` set, a request that has not answered in time is
 * aborted and its socket destroyed before the call rejects.
 */
export function createXmlRpcTransport(address: string, options: RpcTransportOptions): RpcTransport {
  const clientOptions = xmlRpcClientOptions(address, options)
  const secure = new URL(address).protocol === 'https:'

  const call = (remoteName: string, params: unknown[]): Promise<unknown> =>
    methodCall(clientOptions, secure, remoteName, params, options.connectTimeoutMs)

  return {
    async listMethods(): Promise<string[]> {
      const result = MethodListSchema.safeParse(await call(LIST_METHODS, []))
      if (!result.success) {
        throw new RpcResponseError(`${LIST_METHODS} did not return a list of method names`)
      }
      return result.data
    },
    call,
  }
}

/** Options for `xmlrpc.createClient`; they are handed on to `http.request`. */
export function xmlRpcClientOptions(address: string, options: RpcTransportOptions): XmlRpcClientOptions {
  let url: URL
  try {
    url = new URL(address)
  } catch (error) {
    throw new Error(`Invalid XML-RPC address: ${address}`, { cause: error })
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Unsupported XML-RPC protocol: ${url.protocol}`)
  }

  return {
    // IPv6 literals keep their brackets in URL.hostname
    host: url.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: url.port ? Number(url.port) : undefined,
    path: url.pathname,
    headers: { ...options.headers },
    basic_auth: options.basicAuth ?? undefined,
  }
}

function methodCall(
  clientOptions: XmlRpcClientOptions,
  secure: boolean,
  remoteName: string,
  params: unknown[],
  timeoutMs: number | null,
): Promise<unknown> {
  const signal = timeoutMs !== null && timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined
  // xmlrpc keeps and mutates its options object, so every request gets a fresh one
  const requestOptions = { ...clientOptions, headers: { ...clientOptions.headers }, signal }
  const client = secure
    ? xmlrpc.createSecureClient(requestOptions)
    : xmlrpc.createClient(requestOptions)

  return new Promise((resolve, reject) => {
    const timedOut = () =>
      new Error(`XML-RPC request timed out after ${timeoutMs}ms (${remoteName})`, { cause: signal?.reason })

    client.methodCall(remoteName, params, (error: unknown, value: unknown) => {
      if (signal?.aborted) {
        reject(timedOut())
        return
      }
      if (error) {
        reject(toRpcFault(error) ?? error)
        return
      }
      resolve(value)
    })

    // Registered after the request exists, so http has destroyed the socket by the time this runs.
    signal?.addEventListener('abort', () => reject(timedOut()), { once: true })
  })
}

/**
 * Recognize the fault errors the `xmlrpc` deserializer produces.
 *
 * They are plain `Error`s carrying `faultCode` and `faultString`.
 */
export function toRpcFault(error: unknown): RpcFault | null {
  if (!error || typeof error !== 'object' || !('faultCode' in error)) {
    return null
  }

  const faultCode = typeof error.faultCode === 'number' ? error.faultCode : null
  const faultString = 'faultString' in error && typeof error.faultString === 'string'
    ? error.faultString
    : String(error.faultCode)

  return new RpcFault(faultCode, faultString, { cause: error })
}
