import { DEFAULT_CONFIG } from "../config/defaults.js";
import type { EducationConfig } from "../config/types.js";
import { generateAllData } from "./generate.js";
import type { Datasets } from "./types.js";

export interface DatasetCache {
  /** Datasets for the seed; regenerated only when the seed changes. */
  get(seed: number): Datasets;
  invalidate(): void;
  /** Number of generation runs so far. */
  readonly generations: number;
}

/**
 * Memoize generation on the seed. Holds a single entry: asking for a new
 * seed replaces it.
 */
export function createDatasetCache(
  config: EducationConfig = DEFAULT_CONFIG
): DatasetCache {
  let entry: { seed: number; datasets: Datasets } | undefined;
  let generations = 0;

  return {
    get(seed: number): Datasets {
      if (entry && entry.seed === seed) return entry.datasets;
      const datasets = generateAllData(seed, config);
      generations++;
      entry = { seed, datasets };
      return datasets;
    },
    invalidate(): void {
      entry = undefined;
    },
    get generations(): number {
      return generations;
    },
  };
}
