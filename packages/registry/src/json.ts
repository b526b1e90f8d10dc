export type SafeJsonParseResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stableNormalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stableNormalize)
  }

  if (isPlainObject(value)) {
    const next: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      next[key] = stableNormalize(value[key])
    }
    return next
  }

  return value
}

/**
 * JSON text with object keys sorted at every depth. Array order is kept, so
 * two values are equal exactly when their canonical forms are.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(stableNormalize(value))
}

export function jsonEqual(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b)
}
