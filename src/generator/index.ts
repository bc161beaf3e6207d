export type {
  TableName,
  SchoolType,
  YesNo,
  EnrollmentRow,
  GraduatesRow,
  OsyRow,
  PovertyRow,
  InfrastructureRow,
  IncidentsRow,
  PerformanceRow,
  TableRowMap,
  CityYearRow,
  Table,
  Datasets,
  ColumnKind,
  ColumnDef,
} from "./types.js";
export { TABLE_NAMES } from "./types.js";

export { TABLE_COLUMNS, columnNames } from "./schema.js";

export { SeededRandom } from "./random.js";

export { generateAllData, DEFAULT_SEED } from "./generate.js";

export { estimateTableRows, estimateAllRows } from "./estimate.js";
export type { RowEstimate } from "./estimate.js";

export { createDatasetCache } from "./cache.js";
export type { DatasetCache } from "./cache.js";
