/**
 * @loopsheet/node - Configuration
 *
 * Command line flags and the secrets file, both validated with zod.
 */

import * as fs from 'fs'
import { parseArgs } from 'util'
import { z } from 'zod'
import {
  ConfigError,
  DEFAULT_CHANNEL,
  DEFAULT_RECEIVE_INTERVAL,
  DEFAULT_SEND_INTERVAL
} from '@loopsheet/core'
import { DEFAULT_RANGE, parseSpreadsheetId } from './sources/GoogleSheetSource'
import type { SheetCredentials } from './sources/GoogleSheetSource'

// =============================================================================
// Schemas
// =============================================================================

export const DEFAULT_SECRETS_FILE = 'client_secret.json'

const interval = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be a number')
  .positive('must be greater than zero')

const text = z.string().trim().min(1, 'must not be empty')

/**
 * Validated settings for one run.
 */
export const LoopConfigSchema = z
  .object({
    sheet: text.transform(parseSpreadsheetId).optional(),
    range: text.default(DEFAULT_RANGE),
    secretsFile: text.default(DEFAULT_SECRETS_FILE),
    csv: text.optional(),
    watch: z.boolean().default(false),
    receive: interval.default(DEFAULT_RECEIVE_INTERVAL),
    send: interval.default(DEFAULT_SEND_INTERVAL),
    channel: z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .min(1, 'must be between 1 and 16')
      .max(16, 'must be between 1 and 16')
      .default(DEFAULT_CHANNEL),
    output: text.optional(),
    listOutputs: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    debug: z.boolean().default(false),
    help: z.boolean().default(false)
  })
  .superRefine((config, ctx) => {
    if (config.help || config.listOutputs) return

    if (config.sheet && config.csv) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'use either --sheet or --csv, not both' })
    } else if (!config.sheet && !config.csv) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'one of --sheet or --csv is required' })
    }

    if (config.watch && !config.csv) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'only applies to --csv', path: ['watch'] })
    }
  })

export type LoopConfig = z.infer<typeof LoopConfigSchema>

/**
 * Contents of the secrets file.
 */
export const SheetCredentialsSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    accessToken: z.string().min(1).optional()
  })
  .refine(
    credentials => credentials.apiKey !== undefined || credentials.accessToken !== undefined,
    { message: 'must contain "apiKey" or "accessToken"' }
  )

// =============================================================================
// Usage
// =============================================================================

export const USAGE = `Usage: loopsheet (--sheet <id> | --csv <file>) [options]

Plays every row of a table as a looping MIDI note.

Table:
  -n, --sheet <id>          Google Sheets spreadsheet id or URL
      --range <a1>          Range to read, header row first (default: ${DEFAULT_RANGE})
  -f, --secrets-file <file> JSON file with "apiKey" or "accessToken" (default: ${DEFAULT_SECRETS_FILE})
  -c, --csv <file>          Local CSV file instead of a spreadsheet
  -w, --watch               Refresh as soon as the CSV file changes

Timing:
  -r, --receive <seconds>   Table refresh interval (default: ${DEFAULT_RECEIVE_INTERVAL})
  -s, --send <seconds>      Dispatcher poll interval (default: ${DEFAULT_SEND_INTERVAL})

MIDI:
      --channel <1-16>      Channel for rows without one (default: ${DEFAULT_CHANNEL})
  -o, --output <name|index> MIDI output to open (default: first output)
      --list-outputs        Print the available MIDI outputs and exit
      --dry-run             Log messages instead of sending them

  -d, --debug               Verbose logging
  -h, --help                Show this help`

// =============================================================================
// Parsing
// =============================================================================

/**
 * Flag name for a config key, e.g. `secretsFile` -> `--secrets-file`.
 */
function flagName(key: string): string {
  return `--${key.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`)}`
}

function formatIssue(issue: z.ZodIssue): string {
  const [key] = issue.path
  return key === undefined ? issue.message : `${flagName(String(key))}: ${issue.message}`
}

const CLI_OPTIONS = {
  sheet: { type: 'string', short: 'n' },
  range: { type: 'string' },
  'secrets-file': { type: 'string', short: 'f' },
  csv: { type: 'string', short: 'c' },
  watch: { type: 'boolean', short: 'w' },
  receive: { type: 'string', short: 'r' },
  send: { type: 'string', short: 's' },
  channel: { type: 'string' },
  output: { type: 'string', short: 'o' },
  'list-outputs': { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  debug: { type: 'boolean', short: 'd' },
  help: { type: 'boolean', short: 'h' }
} as const

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false }).values
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(message)
  }
}

/**
 * Parse and validate command line arguments (without the node and script paths).
 * Throws ConfigError on unknown flags, missing values or invalid settings.
 */
export function parseCliArgs(argv: string[]): LoopConfig {
  const values = readFlags(argv)

  const result = LoopConfigSchema.safeParse({
    sheet: values.sheet,
    range: values.range,
    secretsFile: values['secrets-file'],
    csv: values.csv,
    watch: values.watch,
    receive: values.receive,
    send: values.send,
    channel: values.channel,
    output: values.output,
    listOutputs: values['list-outputs'],
    dryRun: values['dry-run'],
    debug: values.debug,
    help: values.help
  })

  if (!result.success) {
    throw new ConfigError(formatIssue(result.error.issues[0]))
  }
  return result.data
}

/**
 * Read API credentials from a JSON secrets file.
 */
export function loadCredentials(filePath: string): SheetCredentials {
  let text: string
  try {
    text = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Cannot read secrets file ${filePath}: ${message}`)
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    throw new ConfigError(`Secrets file ${filePath} is not valid JSON`)
  }

  const result = SheetCredentialsSchema.safeParse(json)
  if (!result.success) {
    throw new ConfigError(`Secrets file ${filePath} ${result.error.issues[0].message}`)
  }
  return result.data
}
