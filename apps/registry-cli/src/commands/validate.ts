import { resolve } from 'node:path'
import {
  ERROR_CODES,
  RegistryError,
  checkRegistryConsistency,
  formatConsistencyReport,
} from '@toil-registry/core'
import type { ILogger } from '@toil-registry/logger'
import { EXIT_CODES, type ExitCode } from '../exit-codes.js'
import { loadRegistrySnapshot } from '../snapshot.js'

export interface ValidateCommandArgs {
  root: string
  logger: ILogger
  /** Receives the human-readable report */
  write: (text: string) => void
}

export async function runValidateCommand(args: ValidateCommandArgs): Promise<ExitCode> {
  const snapshot = loadRegistrySnapshot(args.root)
  if (snapshot.index.text === null) {
    throw new RegistryError(
      ERROR_CODES.FILE_NOT_FOUND,
      `Index not found: ${resolve(args.root, snapshot.index.path)}`
    )
  }
  const report = checkRegistryConsistency(snapshot)

  for (const warning of report.warnings) {
    args.logger.warn(warning.message)
  }

  args.write(formatConsistencyReport(report))
  args.logger.debug('Validation finished', {
    root: args.root,
    products: report.products.length,
    errors: report.errors.length,
    warnings: report.warnings.length,
  })

  return report.errors.length > 0 ? EXIT_CODES.FAILED : EXIT_CODES.OK
}
