import { describe, expect, it } from 'vitest'
import { formatMethods, MethodCatalog } from '../../src/application/methodCatalog.js'

describe('MethodCatalog', () => {
  it('keys descriptors by local identifier', () => {
    const catalog = MethodCatalog.fromRemoteNames(['CCU.getSerial', 'system.listMethods'])

    expect(catalog.size).toBe(2)
    expect(catalog.get('ccu_get_serial')).toEqual({
      remoteName: 'CCU.getSerial',
      description: '',
      declaredArguments: [],
      internalArguments: [],
    })
    expect(catalog.has('system_list_methods')).toBe(true)
    expect(catalog.get('CCU.getSerial')).toBeUndefined()
  })

  it('keeps the first of colliding remote names', () => {
    const catalog = MethodCatalog.fromRemoteNames(['ReGa.runScript', 'rega.runScript', 'ReGa_runScript'])

    expect(catalog.size).toBe(1)
    expect(catalog.get('rega_run_script')?.remoteName).toBe('ReGa.runScript')
  })

  it('lists names and entries sorted', () => {
    const catalog = MethodCatalog.fromRemoteNames(['system.listMethods', 'CCU.getSerial', 'BidCoS.getVersion'])

    expect(catalog.localNames()).toEqual(['bidcos_get_version', 'ccu_get_serial', 'system_list_methods'])
    expect(catalog.entries().map(([name]) => name)).toEqual(catalog.localNames())
  })

  it('freezes descriptors', () => {
    const descriptor = MethodCatalog.fromRemoteNames(['CCU.getSerial']).get('ccu_get_serial')
    expect(Object.isFrozen(descriptor)).toBe(true)
    expect(Object.isFrozen(descriptor?.internalArguments)).toBe(true)
  })

  it('starts empty', () => {
    expect(MethodCatalog.empty().size).toBe(0)
  })
})

describe('formatMethods', () => {
  it('pads the call column to 60 characters', () => {
    const lines = formatMethods(MethodCatalog.fromRemoteNames(['CCU.getSerial']))

    expect(lines).toEqual([
      'Method' + ' '.repeat(54) + ' Description',
      'api.ccu_get_serial()' + ' '.repeat(40) + ' ',
    ])
  })
})
