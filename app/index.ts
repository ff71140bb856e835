export {
  Table,
  numericColumn,
  stringColumn,
  tableFromRecords,
  type CellValue,
  type Column,
  type ColumnRef,
  type IndicatorOrigin,
  type NumericColumn,
  type StorageType,
  type StringColumn,
} from "./lib/table";
export { classify, classifyColumn, columnsOfType, type ColumnType } from "./lib/typeInference";
export { impute, type ImputeResult } from "./lib/impute";
export { encode, indicatorName, type EncodeOptions } from "./lib/encode";
export { scale, type ScaleResult } from "./lib/scale";
export {
  preprocess,
  runPreprocessing,
  type ColumnIssue,
  type PreprocessOptions,
  type PreprocessResult,
} from "./lib/preprocess";
export {
  resolveVisualization,
  strategyTable,
  type ChartSpec,
  type ChartStrategy,
  type DataPoint,
  type PairedMode,
  type SeriesData,
  type VisualizationRequest,
} from "./lib/charts";
export { DEFAULT_CONFIG, resolveConfig, type ColumnPolicy, type PipelineConfig } from "./lib/config";
export * from "./lib/errors";
export { createSession, type DatasetSession, type Meta, type TableView } from "./session/session";
export { loadTable, parseCsv, parseWorkbook, type LoadedTable } from "./io/load";
