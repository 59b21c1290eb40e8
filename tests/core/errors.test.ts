import { describe, expect, it } from 'vitest'
import {
  ConfigurationError,
  ConnectionError,
  MethodNotFoundError,
  ProtocolError,
  XmlApiError,
  isXmlApiError,
  toErrorMessage,
} from '../../src/core/errors.js'

describe('error taxonomy', () => {
  it('gives every error a kind and a readable message', () => {
    const errors = [
      new ConfigurationError('Please specify the address of the CCU.'),
      new ConnectionError('http://ccu:2001', 'connect ECONNREFUSED'),
      new ProtocolError('ccu_get_serial', { faultCode: -1, faultString: 'Failure' }),
      new MethodNotFoundError('ccu_get_serail'),
    ]

    expect(errors.map((error) => [error.kind, error.name, error.message])).toEqual([
      ['configuration', 'ConfigurationError', 'Please specify the address of the CCU.'],
      ['connection', 'ConnectionError', 'Unable to open "http://ccu:2001": connect ECONNREFUSED'],
      ['protocol', 'ProtocolError', 'Server error calling "ccu_get_serial": Failure'],
      ['method_not_found', 'MethodNotFoundError', 'Method "ccu_get_serail" is not a valid method.'],
    ])
    expect(errors.every((error) => error instanceof XmlApiError)).toBe(true)
  })

  it('keeps the underlying error as cause', () => {
    const cause = new Error('socket hang up')
    expect(new ConnectionError('http://ccu:2001', cause.message, { cause }).cause).toBe(cause)
  })

  it('narrows by kind', () => {
    const error: unknown = new MethodNotFoundError('x')
    expect(isXmlApiError(error)).toBe(true)
    expect(isXmlApiError(error, 'method_not_found')).toBe(true)
    expect(isXmlApiError(error, 'protocol')).toBe(false)
    expect(isXmlApiError(new Error('x'))).toBe(false)
  })

  it('formats unknown thrown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom')
    expect(toErrorMessage('plain')).toBe('plain')
  })
})
