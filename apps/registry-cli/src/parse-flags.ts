import { ERROR_CODES, RegistryError } from '@toil-registry/core'

export type Flags = Record<string, string | boolean>

/**
 * `--key value...` (multi-token values are joined with spaces),
 * `--key=value`, or a bare `--key` for `true`. Positional tokens are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq !== -1) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[body] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[body] = true
    }
  }

  return flags
}

/**
 * Value of a flag that takes an argument. A bare `--key` is a usage error.
 */
export function stringFlag(flags: Flags, key: string): string | undefined {
  const value = flags[key]
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new RegistryError(ERROR_CODES.USAGE_ERROR, `--${key} requires a value`)
  }
  return value
}

/**
 * A switch flag: bare `--key`, `--key=true` or `--key=` turn it on,
 * `--key=false` turns it off. Any other value is a usage error.
 */
export function booleanFlag(flags: Flags, key: string): boolean {
  const value = flags[key]
  if (value === undefined || value === false || value === 'false') {
    return false
  }
  if (value === true || value === '' || value === 'true') {
    return true
  }
  throw new RegistryError(ERROR_CODES.USAGE_ERROR, `--${key} takes no value (got "${value}")`)
}
