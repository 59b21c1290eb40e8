import { toLocalMethodName } from '../core/methodName.js'

export type MethodDescriptor = {
  readonly remoteName: string
  readonly description: string
  readonly declaredArguments: readonly string[]
  readonly internalArguments: readonly string[]
}

/**
 * Local identifier → remote method descriptor, built from one introspection
 * listing. Immutable once built; re-initialization builds a new catalog.
 */
export class MethodCatalog {
  readonly #methods: ReadonlyMap<string, MethodDescriptor>

  private constructor(methods: ReadonlyMap<string, MethodDescriptor>) {
    this.#methods = methods
  }

  static empty(): MethodCatalog {
    return new MethodCatalog(new Map())
  }

  /**
   * First listed wins: when two remote names translate to the same local
   * identifier, the later one is dropped without error.
   */
  static fromRemoteNames(remoteNames: Iterable<string>): MethodCatalog {
    const methods = new Map<string, MethodDescriptor>()

    for (const remoteName of remoteNames) {
      const localName = toLocalMethodName(remoteName)
      if (methods.has(localName)) continue

      methods.set(localName, Object.freeze({
        remoteName,
        description: '',
        declaredArguments: Object.freeze([]),
        internalArguments: Object.freeze([]),
      }))
    }

    return new MethodCatalog(methods)
  }

  get size(): number {
    return this.#methods.size
  }

  has(localName: string): boolean {
    return this.#methods.has(localName)
  }

  get(localName: string): MethodDescriptor | undefined {
    return this.#methods.get(localName)
  }

  localNames(): string[] {
    return [...this.#methods.keys()].sort(compareNames)
  }

  entries(): Array<[string, MethodDescriptor]> {
    return [...this.#methods.entries()].sort(([left], [right]) => compareNames(left, right))
  }
}

/** Code unit order, so the listing does not depend on the host locale. */
function compareNames(left: string, right: string): number {
  if (left === right) return 0
  return left < right ? -1 : 1
}

const LISTING_COLUMN_WIDTH = 60

/**
 * Human readable listing of the catalog, one line per method, sorted by local
 * identifier and preceded by a header line.
 */
export function formatMethods(catalog: MethodCatalog): string[] {
  const lines = [`${'Method'.padEnd(LISTING_COLUMN_WIDTH)} Description`]

  for (const [localName, method] of catalog.entries()) {
    const callText = `api.${localName}(${method.internalArguments.join(', ')})`
    lines.push(`${callText.padEnd(LISTING_COLUMN_WIDTH)} ${method.description}`)
  }

  return lines
}
