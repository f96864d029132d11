/**
 * Canonical JSON encoding for deterministic hashing.
 *
 * Object keys are sorted, undefined members dropped and no whitespace emitted.
 * Maps encode as objects keyed by their stringified keys and Sets as sorted
 * arrays of their encoded members, so two equal positions always produce the
 * same string regardless of insertion order.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (value instanceof Map) {
      return sortKeys(
        Object.fromEntries(
          Array.from(value.entries(), ([k, v]) => [String(k), v])
        )
      );
    }
    if (value instanceof Set) {
      return Array.from(value, (member: unknown) => ({
        key: canonicalEncode(member),
        member,
      }))
        .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
        .map(({ member }) => member);
    }
    if (isPlainRecord(value)) {
      return sortKeys(value);
    }
    return value;
  });
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sortKeys(value: Record<string, unknown>): Record<string, unknown> {
  return Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((sorted, key) => {
      if (value[key] !== undefined) {
        sorted[key] = value[key];
      }
      return sorted;
    }, {});
}
