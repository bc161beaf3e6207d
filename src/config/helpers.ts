import { ConfigError } from "./errors.js";
import type { CityConfig, EducationConfig, YearRange, YearTable } from "./types.js";

/** Every year of the range, ascending. */
export function listYears(range: YearRange): number[] {
  const years: number[] = [];
  for (let year = range.start; year <= range.end; year++) {
    years.push(year);
  }
  return years;
}

/**
 * Look up a year in a year-keyed table. A missing year is a configuration
 * error, never a silent default.
 */
export function requireYearValue(
  table: YearTable,
  year: number,
  tablePath: string
): number {
  const value = table[String(year)];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError([
      {
        rule: "year-coverage",
        message: `No value for year ${year}`,
        path: tablePath,
      },
    ]);
  }
  return value;
}

/** Find a city by name. */
export function findCity(
  config: EducationConfig,
  name: string
): CityConfig | undefined {
  return config.cities.find((c) => c.name === name);
}

export function totalSchools(city: CityConfig): number {
  return city.schools_public + city.schools_private;
}

/** A plain key/value object, as YAML mappings load. */
export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
