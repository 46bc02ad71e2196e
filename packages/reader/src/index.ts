export { LazyField, loadColumns, type ColumnData } from "./lazy-field.js";
export { RunRecord, type FieldSlot } from "./run-record.js";
export { RunCollection, groupLabel, type RunTable } from "./run-collection.js";
export {
  GroupedRuns,
  aggregateRuns,
  type GroupKey,
  type GroupedRow,
  type GroupedTable,
  type NestedGroups,
} from "./grouped-runs.js";
export {
  AggregationMap,
  Min,
  Max,
  Last,
  AvgStd,
  aggregationMaps,
  argBest,
  finalValue,
  meanAndStd,
  requiredKeys,
  toSequence,
  type AggregateResult,
  type AggregationKind,
  type FieldValues,
  type MeanStd,
} from "./aggregation.js";
export { formatCell, renderGrid, renderTable, renderGroupedTable, type RenderOptions } from "./table.js";
export { scanRuns, type ScanResult } from "./scan.js";
export { Reader, DATABASE_FILE, type ReaderOptions } from "./reader.js";
