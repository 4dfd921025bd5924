/**
 * @loopsheet/node - Command Line Entry
 *
 * Plays a Google Sheet or CSV file as looping MIDI notes until interrupted.
 */

import {
  ConfigError,
  LoopSession,
  createConsoleLogger,
  createLoggingSink
} from '@loopsheet/core'
import type { Logger, MidiSink, TableSource } from '@loopsheet/core'
import { NodeMIDISink } from '@loopsheet/midi-backend-node'
import { USAGE, loadCredentials, parseCliArgs } from './config'
import type { LoopConfig } from './config'
import { CsvFileSource } from './sources/CsvFileSource'
import { GoogleSheetSource } from './sources/GoogleSheetSource'
import { TableWatcher } from './TableWatcher'

/** Exit codes */
export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

/**
 * Build the table source a config asks for.
 */
export function createSource(config: LoopConfig): TableSource {
  if (config.csv) {
    return new CsvFileSource(config.csv)
  }
  if (config.sheet) {
    return new GoogleSheetSource({
      spreadsheetId: config.sheet,
      range: config.range,
      credentials: loadCredentials(config.secretsFile)
    })
  }
  throw new ConfigError('one of --sheet or --csv is required')
}

/**
 * Print the MIDI outputs jzz can see.
 */
export async function listOutputs(logger: Logger): Promise<void> {
  const sink = new NodeMIDISink({ logger })
  const outputs = await sink.listOutputs()

  if (outputs.length === 0) {
    console.log('No MIDI outputs available')
  }
  for (const output of outputs) {
    const manufacturer = output.manufacturer ? ` (${output.manufacturer})` : ''
    console.log(`${output.id}: ${output.name}${manufacturer}`)
  }
  sink.dispose()
}

function usageError(error: ConfigError): number {
  console.error(`Error: ${error.message}\n`)
  console.error(USAGE)
  return EXIT_USAGE
}

/**
 * Run the CLI and resolve with its exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let config: LoopConfig
  let source: TableSource | null = null
  try {
    config = parseCliArgs(argv)
    if (!config.help && !config.listOutputs) {
      source = createSource(config)
    }
  } catch (error) {
    if (error instanceof ConfigError) return usageError(error)
    throw error
  }

  if (config.help) {
    console.log(USAGE)
    return EXIT_OK
  }

  const logger = createConsoleLogger({ verbose: config.debug })

  if (config.listOutputs || !source) {
    await listOutputs(logger.child('MIDI'))
    return EXIT_OK
  }

  let sink: MidiSink
  let midi: NodeMIDISink | null = null
  if (config.dryRun) {
    sink = createLoggingSink(logger.child('MIDI'))
  } else {
    midi = new NodeMIDISink({ logger: logger.child('MIDI') })
    if (!(await midi.init(config.output))) {
      logger.error('No MIDI output to send to; see --list-outputs, or use --dry-run')
      midi.dispose()
      return EXIT_FAILURE
    }
    sink = midi
  }

  const session = new LoopSession({
    source,
    sink,
    receiveInterval: config.receive,
    sendInterval: config.send,
    defaultChannel: config.channel,
    logger
  })

  let watcher: TableWatcher | null = null
  if (config.watch && config.csv) {
    watcher = new TableWatcher(config.csv, { logger: logger.child('TableWatcher') })
    watcher.on('change', () => session.getFetcher().requestRefresh())
    watcher.start()
  }

  const shutdown = (): void => {
    logger.info('Stopping...')
    session.stop()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  try {
    await session.run()
    return EXIT_OK
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error(message)
    return EXIT_FAILURE
  } finally {
    process.off('SIGINT', shutdown)
    process.off('SIGTERM', shutdown)
    if (watcher) await watcher.stop()
    midi?.dispose()
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(error)
      process.exitCode = EXIT_FAILURE
    }
  )
}
