import { vi } from 'vitest'
import type { RpcTransport, RpcTransportFactory } from '../../src/core/ports/rpcTransport.js'

type Handler = (...params: unknown[]) => unknown

/**
 * In-process stand-in for the CCU. Records every interaction and tracks how
 * many transport operations overlap.
 */
export function createFakeCcu(opts: {
  methods: string[]
  handlers?: Record<string, Handler>
  delayMs?: number
}) {
  const calls: Array<{ remoteName: string; params: unknown[] }> = []
  let inFlight = 0
  let maxInFlight = 0

  const track = async <T>(task: () => T | Promise<T>): Promise<T> => {
    inFlight += 1
    maxInFlight = Math.max(maxInFlight, inFlight)
    try {
      if (opts.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, opts.delayMs))
      }
      return await task()
    } finally {
      inFlight -= 1
    }
  }

  const transport: RpcTransport = {
    listMethods: vi.fn(() => track(() => [...opts.methods])),
    call: vi.fn((remoteName: string, params: unknown[]) =>
      track(() => {
        calls.push({ remoteName, params })
        const handler = opts.handlers?.[remoteName]
        if (!handler) throw new Error(`no handler for ${remoteName}`)
        return handler(...params)
      })
    ),
  }

  const factory = vi.fn<RpcTransportFactory>(() => transport)

  return {
    transport,
    factory,
    calls,
    get maxInFlight() {
      return maxInFlight
    },
  }
}

/** Logger that keeps messages per level. */
export function createMemoryLogger() {
  const lines: Array<{ level: string; message: string }> = []
  const record = (level: string) => (message: string) => {
    lines.push({ level, message })
  }
  return {
    lines,
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
  }
}
