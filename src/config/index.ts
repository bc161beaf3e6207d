export type {
  EducationConfig,
  YearRange,
  CityConfig,
  Share,
  YearTable,
  SublevelShares,
  EnrollmentConfig,
  GraduatesConfig,
  OsyConfig,
  InfrastructureConfig,
  IncidentType,
  IncidentsConfig,
  Subject,
  PerformanceConfig,
} from "./types.js";

export { validateConfig, validateShape, assertValidConfig } from "./validate.js";
export type { ValidationError } from "./validate.js";

export { ConfigError } from "./errors.js";

export {
  listYears,
  requireYearValue,
  findCity,
  totalSchools,
  isMapping,
} from "./helpers.js";

export { DEFAULT_CONFIG } from "./defaults.js";

export {
  parseConfig,
  serializeConfig,
  loadConfig,
  saveConfig,
} from "./yaml.js";
