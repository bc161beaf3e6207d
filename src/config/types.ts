/** Inclusive, contiguous range of calendar years. */
export interface YearRange {
  start: number;
  end: number;
}

export interface CityConfig {
  name: string;
  /** Short uppercase code used to build school identifiers. */
  code: string;
  population: number;
  schools_public: number;
  schools_private: number;
  base_enrollment: number;
  poverty_rate: number;
  barangays: number;
}

/** A category label and its share of the parent total. */
export interface Share {
  name: string;
  share: number;
}

/**
 * Year-keyed constant table. YAML mapping keys always load as strings,
 * so lookups go through String(year).
 */
export type YearTable = Record<string, number>;

export interface SublevelShares {
  elementary: number;
  junior_high: number;
  senior_high: number;
}

export interface EnrollmentConfig {
  year_factors: YearTable;
  month_factors: number[];
  sublevel_shares: SublevelShares;
}

export interface GraduatesConfig {
  year_factors: YearTable;
  tracks: Share[];
}

export interface OsyConfig {
  year_factors: YearTable;
  age_groups: Share[];
  reasons: Share[];
}

export interface InfrastructureConfig {
  building_conditions: string[];
}

export interface IncidentType {
  name: string;
  /** Expected cases per enrolled student per year. */
  annual_rate: number;
}

export interface IncidentsConfig {
  year_factors: YearTable;
  types: IncidentType[];
}

export interface Subject {
  name: string;
  /** Points added to the city's base score. */
  offset: number;
}

export interface PerformanceConfig {
  grade_levels: number;
  year_adjustments: YearTable;
  subjects: Subject[];
}

/**
 * Every constant the generator reads. Cities, categories and year tables
 * are iterated in declaration order.
 */
export interface EducationConfig {
  years: YearRange;
  cities: CityConfig[];
  enrollment: EnrollmentConfig;
  graduates: GraduatesConfig;
  osy: OsyConfig;
  infrastructure: InfrastructureConfig;
  incidents: IncidentsConfig;
  performance: PerformanceConfig;
}

export const CONFIG_SECTIONS = [
  "years",
  "cities",
  "enrollment",
  "graduates",
  "osy",
  "infrastructure",
  "incidents",
  "performance",
] as const satisfies readonly (keyof EducationConfig)[];
