/**
 * Core - Method name translation
 *
 * Remote method names are dotted camel case (`Interface.activateLinkParamset`).
 * Locally they are exposed in lowercase underscore notation
 * (`interface_activate_link_paramset`).
 */

const LEXICAL_FIXES: ReadonlyArray<readonly [string, string]> = [
  ['bid_co_s', 'bidcos'],
  ['re_ga', 'rega'],
]

/**
 * Split camel case into lowercase underscore-separated segments.
 *
 * A capital followed by lowercase letters starts a new segment and a run of
 * capitals stays together, so `getLGWStatus` becomes `get_lgw_status`.
 */
export function decamel(value: string): string {
  return value
    .replace(/(.)([A-Z][a-z]+)/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
}

/**
 * Translate a raw remote method name to its local identifier.
 *
 * Not a round trip: translating an already local name may change it again.
 */
export function toLocalMethodName(remoteName: string): string {
  let name = decamel(remoteName.replaceAll('.', '_'))
  for (const [from, to] of LEXICAL_FIXES) {
    name = name.replaceAll(from, to)
  }
  return name.replaceAll('__', '_')
}
