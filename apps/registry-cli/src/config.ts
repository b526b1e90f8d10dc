/**
 * Environment configuration for the registry CLI.
 *
 * `.env` is loaded by the entry point (dotenv); this module only validates
 * what ends up in the environment. Flags override every value here.
 */

import { z } from 'zod'
import type { LogFormat, LogLevel } from '@toil-registry/logger'
import { ERROR_CODES, RegistryError, formatZodIssues } from '@toil-registry/core'

export const DEFAULT_PRODUCTS_REPO_URL = 'https://github.com/tech4life-beyond/products.git'

const envSchema = z.object({
  REGISTRY_ROOT: z.string().optional(),
  PRODUCTS_REPO_URL: z.string().min(1).default(DEFAULT_PRODUCTS_REPO_URL),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
})

export interface RegistryConfig {
  registryRoot?: string
  productsRepoUrl: string
  logLevel?: LogLevel
  logFormat?: LogFormat
}

/** Blank variables count as unset. */
function pick(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const parsed = envSchema.safeParse({
    REGISTRY_ROOT: pick(env, 'REGISTRY_ROOT'),
    PRODUCTS_REPO_URL: pick(env, 'PRODUCTS_REPO_URL'),
    LOG_LEVEL: pick(env, 'LOG_LEVEL')?.toLowerCase(),
    LOG_FORMAT: pick(env, 'LOG_FORMAT')?.toLowerCase(),
  })

  if (!parsed.success) {
    throw new RegistryError(
      ERROR_CODES.CONFIGURATION_ERROR,
      `Invalid environment: ${formatZodIssues(parsed.error).join('; ')}`
    )
  }

  return {
    registryRoot: parsed.data.REGISTRY_ROOT,
    productsRepoUrl: parsed.data.PRODUCTS_REPO_URL,
    logLevel: parsed.data.LOG_LEVEL,
    logFormat: parsed.data.LOG_FORMAT,
  }
}
