/**
 * Error classification for registry tooling.
 *
 * Pure modules throw RegistryError with one of ERROR_CODES; the CLI turns
 * classified errors into exit codes in a single place.
 */

import { ZodError } from 'zod'

export const ERROR_CODES = {
  // Index table
  TABLE_NOT_FOUND: 'TABLE_NOT_FOUND',
  MALFORMED_ROW: 'MALFORMED_ROW',

  // Records
  INVALID_TOIL_ID: 'INVALID_TOIL_ID',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  DUPLICATE_TOIL_ID: 'DUPLICATE_TOIL_ID',

  // Exports
  INVALID_JSON: 'INVALID_JSON',
  INVALID_EXPORT: 'INVALID_EXPORT',

  // Product packs
  INVALID_PACK: 'INVALID_PACK',

  // Environment
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  EXTERNAL_COMMAND_FAILED: 'EXTERNAL_COMMAND_FAILED',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  USAGE_ERROR: 'USAGE_ERROR',

  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export type ErrorCategory =
  | 'validation' // The registry data is wrong
  | 'usage' // The command was invoked wrongly
  | 'environment' // Files, config or external tools
  | 'internal' // Bugs

export class RegistryError extends Error {
  readonly code: ErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'RegistryError'
    this.code = code
    this.details = details
  }
}

export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  details?: Record<string, unknown>
  originalError?: Error
}

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  TABLE_NOT_FOUND: 'validation',
  MALFORMED_ROW: 'validation',
  INVALID_TOIL_ID: 'validation',
  MISSING_REQUIRED_FIELD: 'validation',
  DUPLICATE_TOIL_ID: 'validation',
  INVALID_JSON: 'validation',
  INVALID_EXPORT: 'validation',
  INVALID_PACK: 'environment',
  CONFIGURATION_ERROR: 'environment',
  EXTERNAL_COMMAND_FAILED: 'environment',
  FILE_NOT_FOUND: 'environment',
  USAGE_ERROR: 'usage',
  UNEXPECTED_ERROR: 'internal',
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError
}

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

export function classifyError(error: unknown): ClassifiedError {
  if (isRegistryError(error)) {
    return {
      category: CATEGORY_BY_CODE[error.code],
      code: error.code,
      message: error.message,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.INVALID_EXPORT,
      message: 'Validation failed',
      details: { issues: formatZodIssues(error) },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    if ('code' in error && error.code === 'ENOENT') {
      return {
        category: 'environment',
        code: ERROR_CODES.FILE_NOT_FOUND,
        message: error.message,
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
  }
}

/**
 * Flat fields for structured log entries
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    ...(classified.details && { error_details: classified.details }),
  }
}
