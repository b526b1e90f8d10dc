import { classifyError, formatErrorForLog } from '@toil-registry/core'
import type { ILogger } from '@toil-registry/logger'
import { runBuildCommand } from './commands/build.js'
import { runSyncCommand } from './commands/sync.js'
import { runValidateCommand } from './commands/validate.js'
import { loadConfig } from './config.js'
import { EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes.js'
import { createCommandLoggers, loggersFrom } from './logger.js'
import { booleanFlag, parseFlags, stringFlag } from './parse-flags.js'
import { resolveRegistryRoot } from './paths.js'
import type { GitRunner } from './products-repo.js'

export interface CliDeps {
  env?: NodeJS.ProcessEnv
  cwd?: string
  /** Replaces the configured root logger */
  logger?: ILogger
  /** Receives reports and help text */
  write?: (text: string) => void
  git?: GitRunner
  tempParent?: string
}

const HELP = [
  'Product registry CLI',
  '',
  'Commands:',
  '  build [--root <dir>] [--source <md>] [--legacy-output <json>] [--v1-output <json>] [--check]',
  '  validate [--root <dir>]',
  '  sync [--root <dir>] [--products <dir>] [--repo-url <url>] [--json-output <json>]',
  '       [--v1-output <json>] [--markdown-output <md>] [--records-dir <dir>] [--no-records]',
  '',
  'Exit codes: 0 ok, 1 validation failed or drift, 2 usage error, 3 environment error',
  '',
].join('\n')

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<ExitCode> {
  const write = deps.write ?? ((text: string) => void process.stdout.write(text))
  const [command, ...rest] = argv

  if (!command || command === '--help' || command === '-h') {
    write(HELP)
    return EXIT_CODES.OK
  }

  const flags = parseFlags(rest)
  if (flags.help === true || rest.includes('-h')) {
    write(HELP)
    return EXIT_CODES.OK
  }

  let loggers = deps.logger ? loggersFrom(deps.logger) : createCommandLoggers()

  try {
    const config = loadConfig(deps.env ?? process.env)
    if (!deps.logger) {
      loggers = createCommandLoggers({ level: config.logLevel, format: config.logFormat })
    }

    const cwd = deps.cwd ?? process.cwd()
    const root = resolveRegistryRoot({ explicit: stringFlag(flags, 'root') ?? config.registryRoot, cwd })

    switch (command) {
      case 'build':
        return await runBuildCommand({
          root,
          source: stringFlag(flags, 'source'),
          legacyOutput: stringFlag(flags, 'legacy-output'),
          v1Output: stringFlag(flags, 'v1-output'),
          check: booleanFlag(flags, 'check'),
          logger: loggers.build,
        })
      case 'validate':
        return await runValidateCommand({ root, logger: loggers.validate, write })
      case 'sync':
        return await runSyncCommand({
          root,
          products: stringFlag(flags, 'products'),
          repoUrl: stringFlag(flags, 'repo-url') ?? config.productsRepoUrl,
          jsonOutput: stringFlag(flags, 'json-output'),
          v1Output: stringFlag(flags, 'v1-output'),
          markdownOutput: stringFlag(flags, 'markdown-output'),
          recordsDir: stringFlag(flags, 'records-dir'),
          writeRecords: !booleanFlag(flags, 'no-records'),
          git: deps.git,
          tempParent: deps.tempParent,
          logger: loggers.sync,
        })
      default:
        loggers.root.error(`Unknown command: ${command}`)
        write(HELP)
        return EXIT_CODES.USAGE
    }
  } catch (error) {
    const classified = classifyError(error)
    const stackSource = classified.category === 'internal' ? classified.originalError : undefined
    loggers.root.error(classified.message, formatErrorForLog(classified), stackSource)
    return exitCodeFor(classified)
  }
}
