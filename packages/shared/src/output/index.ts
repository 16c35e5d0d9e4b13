export {
  CsvSink,
  XlsxSink,
  createSink,
  parseCsv,
  readCsvFile,
  toCsv,
  toWorksheet,
  type CellValue,
  type CsvTable,
  type Sheet,
  type TableRow,
  type TabularFormat,
  type TabularSink,
} from './tabular';
export {
  ResultAggregator,
  writeExplanations,
  resultsBaseName,
  LONG_COLUMNS,
  WIDE_DOCUMENT_COLUMN,
} from './aggregator';
export { CumulativeTable, REFINEMENT_COLUMNS } from './cumulative-table';
