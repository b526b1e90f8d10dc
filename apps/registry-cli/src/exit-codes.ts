import type { ClassifiedError } from '@toil-registry/core'

export const EXIT_CODES = {
  OK: 0,
  /** Validation failure, drift, or `build --check` mismatch */
  FAILED: 1,
  USAGE: 2,
  /** Missing files, bad configuration, git or pack failures */
  ENVIRONMENT: 3,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export function exitCodeFor(classified: ClassifiedError): ExitCode {
  switch (classified.category) {
    case 'usage':
      return EXIT_CODES.USAGE
    case 'environment':
      return EXIT_CODES.ENVIRONMENT
    case 'validation':
    case 'internal':
      return EXIT_CODES.FAILED
  }
}
