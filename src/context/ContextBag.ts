/**
 * ContextBag
 *
 * Ordered, immutable request-scoped key/value map passed explicitly along
 * every call boundary (dispatcher → worker → tool → renderer). Values here
 * are structured data and are never interpolated into prompts.
 */

export type ContextValue = string | number | boolean;

/**
 * Well-known context keys.
 */
export const ContextKeys = {
  requesterId: "requesterId",
  sessionId: "sessionId",
  applicationDate: "applicationDate",
  workerType: "workerType",
  outputDirectory: "outputDirectory",
} as const;

export class ContextBag {
  private readonly entries: ReadonlyMap<string, ContextValue>;

  private constructor(entries: Iterable<readonly [string, ContextValue]>) {
    this.entries = new Map(entries);
  }

  static empty(): ContextBag {
    return new ContextBag([]);
  }

  static from(values: Record<string, ContextValue | undefined>): ContextBag {
    return ContextBag.empty().with(values);
  }

  /**
   * Derive a new bag; additions override existing keys, `undefined` skips a key.
   */
  with(additions: Record<string, ContextValue | undefined>): ContextBag {
    const next = new Map(this.entries);
    for (const [key, value] of Object.entries(additions)) {
      if (value !== undefined) {
        next.set(key, value);
      }
    }
    return new ContextBag(next);
  }

  get(key: string): ContextValue | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): Record<string, ContextValue> {
    return Object.fromEntries(this.entries);
  }
}

/**
 * Derive a child bag from a parent without mutating it.
 */
export function propagate(
  parent: ContextBag | undefined,
  additions: Record<string, ContextValue | undefined>
): ContextBag {
  return (parent ?? ContextBag.empty()).with(additions);
}

/**
 * Read a value with a fallback. A missing bag or key is not an error.
 */
export function readContext(
  bag: ContextBag | undefined,
  key: string,
  fallback: ContextValue
): ContextValue {
  return bag?.get(key) ?? fallback;
}

/**
 * String-typed read; non-string values are stringified.
 */
export function readContextString(bag: ContextBag | undefined, key: string, fallback: string): string {
  const value = bag?.get(key);
  return value === undefined ? fallback : String(value);
}
