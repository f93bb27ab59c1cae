/**
 * Deterministic serialization of wire values
 *
 * Snapshots of persisted field values are kept in this canonical form so that
 * in-place mutations of lists, dicts and embedded documents can be detected.
 */

/**
 * Stable, deterministic JSON stringification with alphabetical key order.
 * Dates are written as `{"$date": "<iso>"}` so they never collide with strings.
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 */
export function stableStringify(obj: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (value: unknown): unknown => {
    if (value instanceof Date) {
      return { $date: value.toISOString() };
    }
    if (value && typeof value === "object") {
      // Detect cycles
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        // Objects: sort keys and normalize values, dropping undefined members
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
          if (v !== undefined) {
            out[k] = normalize(v);
          }
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent);
}

/**
 * Canonical single-line form of a wire value, used for change detection
 */
export function canonical(value: unknown): string {
  return value === undefined ? "undefined" : stableStringify(value, 0);
}

/**
 * Check if two wire values are semantically equivalent (ignoring key order)
 */
export function wireEqual(a: unknown, b: unknown): boolean {
  return canonical(a) === canonical(b);
}
