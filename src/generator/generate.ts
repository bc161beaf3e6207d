import type { EducationConfig } from "../config/types.js";
import { assertValidConfig } from "../config/validate.js";
import { listYears } from "../config/helpers.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { SeededRandom } from "./random.js";
import {
  buildEnrollment,
  buildGraduates,
  buildIncidents,
  buildInfrastructure,
  buildOsy,
  buildPerformance,
  buildPoverty,
} from "./tables.js";
import type { Datasets, Table } from "./types.js";

export const DEFAULT_SEED = 42;

/**
 * Generate all seven tables. Pure in (seed, config): the same pair always
 * yields identical rows in identical order, and nothing is read from disk.
 *
 * Tables are built from one random stream in TABLE_NAMES order, so
 * reordering the builders changes every table after the first moved one.
 *
 * @throws ConfigError when the config is invalid or the seed is not an integer
 */
export function generateAllData(
  seed: number,
  config: EducationConfig = DEFAULT_CONFIG
): Datasets {
  assertValidConfig(config);
  const rng = new SeededRandom(seed);
  const years = listYears(config.years);

  return Object.freeze({
    enrollment: freezeTable(buildEnrollment(config, years, rng)),
    graduates: freezeTable(buildGraduates(config, years, rng)),
    osy: freezeTable(buildOsy(config, years, rng)),
    poverty: freezeTable(buildPoverty(config, years, rng)),
    infrastructure: freezeTable(buildInfrastructure(config, years, rng)),
    incidents: freezeTable(buildIncidents(config, years, rng)),
    performance: freezeTable(buildPerformance(config, years, rng)),
  });
}

function freezeTable<T extends object>(rows: T[]): Table<T> {
  for (const row of rows) Object.freeze(row);
  return Object.freeze(rows);
}
