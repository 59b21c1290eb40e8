export * from './logger.js'
export * from './rpcTransport.js'
