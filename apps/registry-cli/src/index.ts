#!/usr/bin/env tsx
import 'dotenv/config'
import { runCli } from './cli.js'

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode)
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  })
