#!/usr/bin/env node
import { Command } from 'commander'
import { registerDeployCommand } from './commands/deploy'
import { registerStatusCommand } from './commands/status'
import { registerSchemaCommand } from './commands/schema'
import { logger } from './utils/logger'
import { parseColorMode, setColorMode } from './utils/colors'

const VERSION: string = '0.1.0'

function argValue(flag: string): string | undefined {
  const ix: number = process.argv.findIndex((a) => a === flag)
  if (ix === -1) return undefined
  const v: string | undefined = process.argv[ix + 1]
  return v !== undefined && !v.startsWith('-') ? v : undefined
}

function main(): void {
  const program: Command = new Command()
  program.name('deploy-all')
  program.description('Provision and deploy a three-tier app (Postgres, API, frontend) on Railway, then verify it')
  program.version(VERSION)
  // Global options (parsed by Commander, but applied pre-parse so early logs honour them)
  program.option('--verbose', 'Verbose output')
  program.option('--json', 'JSON-only output (suppresses non-JSON logs)')
  program.option('--quiet', 'Error-only output (suppresses info/warn/success)')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--compact-json', 'Compact JSON (one line)')
  program.option('--ndjson', 'Newline-delimited JSON streaming (implies --json)')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--summary-only', 'Only print final JSON summary objects (objects with { final: true })')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  program.option('--json-file [path]', 'Also write JSON output lines to file (appends)')
  program.enablePositionalOptions()
  if (process.argv.includes('--verbose')) logger.setLevel('debug')
  if (process.argv.includes('--json')) {
    logger.setJsonOnly(true)
    process.env.TD_JSON = '1'
  }
  if (process.argv.includes('--quiet')) logger.setLevel('error')
  if (process.argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (process.argv.includes('--compact-json')) logger.setJsonCompact(true)
  if (process.argv.includes('--ndjson')) {
    logger.setNdjson(true)
    process.env.TD_JSON = '1'
  }
  if (process.argv.includes('--timestamps')) logger.setTimestamps(true)
  if (process.argv.includes('--summary-only')) logger.setSummaryOnly(true)
  if (process.argv.includes('--json-file')) {
    const ts: string = new Date().toISOString().replace(/[:.]/g, '-')
    logger.setJsonFile(argValue('--json-file') ?? `./.artifacts/deploy-all-${ts}.json`)
  }
  setColorMode(parseColorMode(argValue('--color') ?? process.env.TD_COLOR))
  registerStatusCommand(program)
  registerSchemaCommand(program)
  registerDeployCommand(program)
  program.parseAsync(process.argv)
    .then(() => {})
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      // eslint-disable-next-line no-console
      console.error(`Error: ${message}`)
      process.exitCode = 1
    })
}

main()
