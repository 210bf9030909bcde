export { runBench } from './bench/runner.js';
export {
  SILENT_LOGGER,
  type BenchLogger,
  type BenchRunOptions,
  type BenchRunResult,
  type BenchRunSummary,
} from './bench/types.js';
export {
  escapeCsvField,
  formatFixed,
  renderCsv,
  type CsvValue,
} from './csv/format.js';
export { RUNS_CSV_HEADER, renderRunsCsv } from './csv/runs.js';
export {
  COMPLEXITY_CSV_HEADER,
  SUMMARY_CSV_HEADER,
  renderComplexityCsv,
  renderSummaryCsv,
  type AlgorithmComplexity,
} from './csv/summary.js';
export { writeArtifact } from './export.js';
export { renderMarkdownReport } from './render/markdown.js';
export { formatComplexityTable, formatSummaryTable } from './render/text.js';
export { renderTable, type ColumnAlign, type TableColumn } from './render/table.js';
