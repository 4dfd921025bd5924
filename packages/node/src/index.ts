/**
 * @loopsheet/node
 *
 * Node.js entry points: table sources, file watching, configuration and CLI.
 */

export { parseCsv } from './csv'
export { recordsFromGrid } from './table'
export { CsvFileSource } from './sources/CsvFileSource'
export {
  GoogleSheetSource,
  parseSpreadsheetId,
  DEFAULT_RANGE
} from './sources/GoogleSheetSource'
export type {
  GoogleSheetSourceOptions,
  SheetCredentials,
  FetchLike,
  FetchResponseLike
} from './sources/GoogleSheetSource'
export { TableWatcher } from './TableWatcher'
export type { TableWatcherOptions } from './TableWatcher'
export {
  LoopConfigSchema,
  SheetCredentialsSchema,
  DEFAULT_SECRETS_FILE,
  USAGE,
  parseCliArgs,
  loadCredentials
} from './config'
export type { LoopConfig } from './config'
export { main, createSource, listOutputs, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './cli'
