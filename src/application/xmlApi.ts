/**
 * Application - XML API client
 *
 * Low level access to the CCU's XML-RPC interface. The remote method catalog
 * is fetched lazily on first use; every remote method is then callable through
 * `invoke()` under its local (translated) name, e.g. `CCU.getSerial` as
 * `ccu_get_serial`.
 *
 * One client instance runs at most one remote call (or initialization) at a
 * time. Callers queue on a single mutex in arrival order.
 */

import { inspect } from 'node:util'
import { normalizeAddress } from '../core/address.js'
import {
  ConnectionError,
  MethodNotFoundError,
  ProtocolError,
  toErrorMessage,
  XmlApiError,
} from '../core/errors.js'
import type { Logger } from '../core/ports/logger.js'
import {
  RpcFault,
  RpcResponseError,
  type RpcTransport,
  type RpcTransportFactory,
  type RpcTransportOptions,
} from '../core/ports/rpcTransport.js'
import { parseXmlApiConfig } from '../config/xmlApiConfig.js'
import { createConsoleLogger } from '../infrastructure/logging/consoleLogger.js'
import { createXmlRpcTransport } from '../infrastructure/xmlrpc/xmlRpcTransport.js'
import { AsyncMutex } from '../shared/asyncMutex.js'
import { formatMethods, MethodCatalog, type MethodDescriptor } from './methodCatalog.js'

const LIST_METHODS_LOCAL_NAME = 'system_list_methods'

export type XmlApiDependencies = {
  transportFactory?: RpcTransportFactory
  logger?: Logger
}

/** One async function per remote method, keyed by local identifier. */
export type XmlApiFacade = Readonly<Record<string, (...args: unknown[]) => Promise<unknown>>>

export type OutputStream = { write: (text: string) => unknown }

export class XmlApi {
  readonly #address: string
  readonly #transportOptions: RpcTransportOptions
  readonly #transportFactory: RpcTransportFactory
  readonly #logger: Logger
  readonly #mutex = new AsyncMutex()

  #transport: RpcTransport | null = null
  #catalog = MethodCatalog.empty()
  #initialized = false
  #failReason: XmlApiError | null = null

  /**
   * @param options - Validated like `parseXmlApiConfig`; a missing or
   * non-string `address` throws `ConfigurationError`.
   */
  constructor(options: unknown, deps: XmlApiDependencies = {}) {
    const config = parseXmlApiConfig(options)

    this.#address = normalizeAddress(config.address)
    this.#transportOptions = {
      connectTimeoutMs: config.connectTimeoutMs,
      headers: config.headers,
      basicAuth: config.basicAuth,
    }
    this.#transportFactory = deps.transportFactory ?? createXmlRpcTransport
    this.#logger = deps.logger ?? createConsoleLogger({ level: 'warn' })
  }

  /** Normalized endpoint URL, e.g. `http://192.168.1.26:2001`. */
  get address(): string {
    return this.#address
  }

  /** Whether the catalog has been fetched. Never starts initialization. */
  get initialized(): boolean {
    return this.#initialized
  }

  /**
   * Error of the last failed initialization; `null` once initialization
   * succeeds or while it has never been attempted.
   */
  get failReason(): XmlApiError | null {
    return this.#failReason
  }

  /**
   * Connect and fetch the method catalog unless that already happened.
   *
   * Concurrent callers share one attempt. After a failure the next call tries
   * again from scratch.
   */
  async ensureReady(): Promise<void> {
    if (this.#initialized) return

    await this.#mutex.runExclusive(async () => {
      if (this.#initialized) return
      await this.#initialize()
    })
  }

  /**
   * Call a remote method by its local identifier with positional arguments and
   * return the raw result.
   */
  async invoke(localName: string, ...args: unknown[]): Promise<unknown> {
    await this.ensureReady()

    const queued = this.#mutex.pending
    if (queued > 0) {
      this.#logger.debug(`CALL ${localName} waiting behind ${queued} pending operation(s)`)
    }

    return this.#mutex.runExclusive(() => this.#doCall(localName, args))
  }

  /** Build callables for every method in the catalog. */
  async facade(): Promise<XmlApiFacade> {
    await this.ensureReady()

    // fromEntries defines own properties, so a name like `__proto__` never reaches the prototype setter
    const facade = Object.fromEntries(
      this.#catalog.localNames().map((localName) => [
        localName,
        (...args: unknown[]) => this.invoke(localName, ...args),
      ] as const)
    )
    return Object.freeze(facade)
  }

  /** Catalog entries sorted by local identifier. */
  async methods(): Promise<Array<[string, MethodDescriptor]>> {
    await this.ensureReady()
    return this.#catalog.entries()
  }

  /** Write a listing of all available methods, for interactive exploration. */
  async printMethods(out: OutputStream = process.stdout): Promise<void> {
    await this.ensureReady()
    for (const line of formatMethods(this.#catalog)) {
      out.write(`${line}\n`)
    }
  }

  // Runs under the mutex.
  async #initialize(): Promise<void> {
    this.#failReason = null
    this.#logger.debug('Initializing...')

    try {
      const transport = await this.#connect()
      const remoteNames = await this.#listMethods(transport)

      this.#transport = transport
      this.#catalog = MethodCatalog.fromRemoteNames(remoteNames)
      this.#initialized = true
      this.#logger.debug(`Initialized (${this.#catalog.size} methods)`)
    } catch (error) {
      const failure = error instanceof XmlApiError
        ? error
        : new ConnectionError(this.#address, toErrorMessage(error), { cause: error })
      this.#initialized = false
      this.#failReason = failure
      this.#logger.warn(`Initialization failed: ${failure.message}`)
      throw failure
    }
  }

  async #connect(): Promise<RpcTransport> {
    try {
      return await this.#transportFactory(this.#address, this.#transportOptions)
    } catch (error) {
      throw new ConnectionError(this.#address, toErrorMessage(error), { cause: error })
    }
  }

  async #listMethods(transport: RpcTransport): Promise<string[]> {
    try {
      return await transport.listMethods()
    } catch (error) {
      throw this.#translateCallError(LIST_METHODS_LOCAL_NAME, error)
    }
  }

  // Runs under the mutex.
  async #doCall(localName: string, args: unknown[]): Promise<unknown> {
    const method = this.#catalog.get(localName)
    if (!method || !this.#transport) {
      throw new MethodNotFoundError(localName)
    }

    this.#logger.debug(
      `CALL: ${this.#address} MODE: XML-RPC METHOD: ${method.remoteName} ARGS: ${formatValue(args)}`
    )

    let result: unknown
    try {
      result = await this.#transport.call(method.remoteName, args)
    } catch (error) {
      throw this.#translateCallError(localName, error)
    }

    this.#logger.debug(`  RESPONSE: ${formatValue(result)}`)
    return result
  }

  #translateCallError(localName: string, error: unknown): XmlApiError {
    if (error instanceof XmlApiError) return error
    if (error instanceof RpcFault) {
      return new ProtocolError(localName, error, { cause: error })
    }
    if (error instanceof RpcResponseError) {
      return new ProtocolError(localName, { faultCode: null, faultString: error.message }, { cause: error })
    }
    return new ConnectionError(this.#address, toErrorMessage(error), { cause: error })
  }
}

/**
 * Wrapper for creating the XML API client; any invalid options surface as
 * `ConfigurationError`.
 */
export function createXmlApi(options: unknown, deps?: XmlApiDependencies): XmlApi {
  return new XmlApi(options, deps)
}

function formatValue(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity })
}
