import type { CityConfig, EducationConfig } from "../config/types.js";
import { listYears, totalSchools } from "../config/helpers.js";
import type { TableName } from "./types.js";

export interface RowEstimate {
  rows: number;
  breakdown: string[];
}

const MONTHS = 12;
const SCHOOL_TYPES = 2;

/**
 * Expected row count for one table: the product of its dimension sizes.
 * Poverty and infrastructure have a per-city dimension (barangays, schools),
 * so those sum over cities before multiplying by years.
 */
export function estimateTableRows(
  config: EducationConfig,
  table: TableName
): RowEstimate {
  const cities = config.cities.length;
  const years = listYears(config.years).length;
  const base = `${cities} cities × ${years} years`;

  switch (table) {
    case "enrollment":
      return product([cities, years, MONTHS], `${base} × ${MONTHS} months`);
    case "graduates": {
      const tracks = config.graduates.tracks.length;
      return product(
        [cities, years, tracks, SCHOOL_TYPES],
        `${base} × ${tracks} tracks × ${SCHOOL_TYPES} school types`
      );
    }
    case "osy": {
      const ages = config.osy.age_groups.length;
      const reasons = config.osy.reasons.length;
      return product(
        [cities, years, ages, reasons],
        `${base} × ${ages} age groups × ${reasons} reasons`
      );
    }
    case "poverty":
      return perCity(config, years, "barangays", (c) => c.barangays);
    case "infrastructure":
      return perCity(config, years, "schools", totalSchools);
    case "incidents": {
      const types = config.incidents.types.length;
      return product(
        [cities, years, MONTHS, types],
        `${base} × ${MONTHS} months × ${types} incident types`
      );
    }
    case "performance": {
      const grades = config.performance.grade_levels;
      const subjects = config.performance.subjects.length;
      return product(
        [cities, years, grades, subjects],
        `${base} × ${grades} grades × ${subjects} subjects`
      );
    }
  }
}

/** Row estimates for every table, in generation order. */
export function estimateAllRows(
  config: EducationConfig
): Record<TableName, RowEstimate> {
  return {
    enrollment: estimateTableRows(config, "enrollment"),
    graduates: estimateTableRows(config, "graduates"),
    osy: estimateTableRows(config, "osy"),
    poverty: estimateTableRows(config, "poverty"),
    infrastructure: estimateTableRows(config, "infrastructure"),
    incidents: estimateTableRows(config, "incidents"),
    performance: estimateTableRows(config, "performance"),
  };
}

function product(sizes: number[], description: string): RowEstimate {
  const rows = sizes.reduce((acc, n) => acc * n, 1);
  return { rows, breakdown: [`${description} = ${rows} rows`] };
}

function perCity(
  config: EducationConfig,
  years: number,
  unit: string,
  size: (city: CityConfig) => number
): RowEstimate {
  const breakdown: string[] = [];
  let rows = 0;
  for (const city of config.cities) {
    const cityRows = size(city) * years;
    rows += cityRows;
    breakdown.push(`${city.name}: ${size(city)} ${unit} × ${years} years = ${cityRows} rows`);
  }
  return { rows, breakdown };
}
