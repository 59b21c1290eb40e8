/**
 * Core Layer Index
 *
 * Re-exports name translation, addressing, the error taxonomy and ports.
 */

export * from './methodName.js'
export * from './address.js'
export * from './errors.js'

// Ports
export * from './ports/index.js'
