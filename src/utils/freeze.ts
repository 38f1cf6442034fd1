// Deep freezing for shared read-only values (config, action snapshots)

/**
 * Recursively freeze a value in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  freezeValue(value);
  return value;
}

function freezeValue(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    freezeValue(child);
  }
}

/**
 * Structured clone followed by a deep freeze.
 */
export function frozenSnapshot<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
