/**
 * ccu-xml-api: public API surface.
 */

export * from './core/index.js'

export { XmlApi, createXmlApi } from './application/xmlApi.js'
export type { XmlApiDependencies, XmlApiFacade, OutputStream } from './application/xmlApi.js'
export { MethodCatalog, formatMethods } from './application/methodCatalog.js'
export type { MethodDescriptor } from './application/methodCatalog.js'

export { parseXmlApiConfig, loadXmlApiConfig, LOG_LEVELS } from './config/xmlApiConfig.js'
export type { XmlApiConfig, EnvXmlApiConfig, ConfiguredLogLevel } from './config/xmlApiConfig.js'

export { createConsoleLogger } from './infrastructure/logging/consoleLogger.js'
export type { LogSink } from './infrastructure/logging/consoleLogger.js'
export { createXmlRpcTransport, toRpcFault } from './infrastructure/xmlrpc/xmlRpcTransport.js'
