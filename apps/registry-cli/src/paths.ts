import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { INDEX_PATH } from '@toil-registry/core'

function hasRegistryMarker(path: string): boolean {
  return existsSync(resolve(path, INDEX_PATH))
}

function findRegistryRoot(startPath: string): string | null {
  let current = resolve(startPath)
  for (;;) {
    if (hasRegistryMarker(current)) {
      return current
    }

    const parent = resolve(current, '..')
    if (parent === current) {
      return null
    }
    current = parent
  }
}

export interface ResolveRootOptions {
  /** From --root or REGISTRY_ROOT */
  explicit?: string
  cwd: string
}

/**
 * The explicit root when given; otherwise the nearest ancestor of `cwd` that
 * holds the canonical index; otherwise `cwd` itself (a registry not yet
 * synced).
 */
export function resolveRegistryRoot(options: ResolveRootOptions): string {
  if (options.explicit) {
    return resolve(options.cwd, options.explicit)
  }
  return findRegistryRoot(options.cwd) ?? resolve(options.cwd)
}

/** Resolve a flag path against the registry root. */
export function resolveFromRoot(root: string, path: string): string {
  return resolve(root, path)
}
