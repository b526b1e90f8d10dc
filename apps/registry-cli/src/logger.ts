import { createLogger, type ILogger, type LoggerOptions } from '@toil-registry/logger'

export const SERVICE_NAME = 'registry'

export interface CommandLoggers {
  root: ILogger
  build: ILogger
  validate: ILogger
  sync: ILogger
}

export function createCommandLoggers(options: LoggerOptions = {}): CommandLoggers {
  return loggersFrom(createLogger(SERVICE_NAME, options))
}

export function loggersFrom(root: ILogger): CommandLoggers {
  return {
    root,
    build: root.child('build'),
    validate: root.child('validate'),
    sync: root.child('sync'),
  }
}
