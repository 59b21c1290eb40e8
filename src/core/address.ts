/** Port the CCU serves its BidCoS-RF XML-RPC interface on. */
export const XML_RPC_PORT = 2001

/**
 * Turn a user supplied CCU address into the XML-RPC endpoint URL.
 *
 * A bare host gets the `http://` scheme. The port is always appended.
 */
export function normalizeAddress(address: string): string {
  if (address.startsWith('https://') || address.startsWith('http://')) {
    return `${address}:${XML_RPC_PORT}`
  }
  return `http://${address}:${XML_RPC_PORT}`
}
