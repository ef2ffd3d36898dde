/**
 * @klinevault/candle-store
 *
 * CSV persistence for candle records
 */

export {
  CSV_COLUMNS,
  CSV_HEADER,
  CsvFormatError,
  decodeCandles,
  encodeCandles,
  parseCsv,
  parseTimestampCell,
  type CsvColumn,
} from './csv/csv-codec';
export { coverageOf, estimateMissing, filterWindow, mergeRecords } from './store/records';
export {
  CsvCandleStore,
  defaultSlicePath,
  resolveStorePath,
  type CsvCandleStoreOptions,
  type StoreErrorScope,
} from './store/csv-candle-store';
