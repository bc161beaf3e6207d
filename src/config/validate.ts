import { CONFIG_SECTIONS } from "./types.js";
import type { EducationConfig, Share, YearTable } from "./types.js";
import { ConfigError } from "./errors.js";
import { isMapping, listYears } from "./helpers.js";

export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

const SHARE_TOLERANCE = 0.001;
const MONTHS_PER_YEAR = 12;

export function validateConfig(config: EducationConfig): ValidationError[] {
  const errors = validateShape(config);
  // Value rules walk into every section; stop at a broken skeleton
  if (errors.length > 0) return errors;

  checkYearRange(config, errors);
  checkCities(config, errors);
  checkYearTables(config, errors);
  checkEnrollment(config, errors);
  checkShareList(config.graduates.tracks, "graduates.tracks", errors);
  checkShareList(config.osy.age_groups, "osy.age_groups", errors);
  checkShareList(config.osy.reasons, "osy.reasons", errors);
  checkInfrastructure(config, errors);
  checkIncidents(config, errors);
  checkPerformance(config, errors);

  return errors;
}

/**
 * Check that a loaded document has every section, each a mapping (a list
 * for `cities`). Runs before any value rule, so configs built outside the
 * YAML loader get the same errors as parsed ones.
 */
export function validateShape(raw: unknown): ValidationError[] {
  const errors: ValidationError[] = [];
  if (!isMapping(raw)) {
    errors.push({
      rule: "shape",
      message: `Expected a YAML object, got ${describeValue(raw)}`,
    });
    return errors;
  }

  for (const section of CONFIG_SECTIONS) {
    const value = raw[section];
    if (value === undefined) {
      errors.push({
        rule: "missing-section",
        message: `Missing section "${section}"`,
        path: section,
      });
    } else if (section === "cities") {
      if (!Array.isArray(value)) {
        errors.push({
          rule: "shape",
          message: `Expected a list, got ${describeValue(value)}`,
          path: section,
        });
      }
    } else {
      checkMapping(value, section, errors);
    }
  }
  return errors;
}

/** Throw a ConfigError listing every violation, if there are any. */
export function assertValidConfig(config: EducationConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

// Rule: The year range is a non-empty run of integer years
function checkYearRange(
  config: EducationConfig,
  errors: ValidationError[]
): void {
  const { start, end } = config.years;
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    errors.push({
      rule: "year-range",
      message: `Year range bounds must be integers, got ${start}..${end}`,
      path: "years",
    });
  } else if (start > end) {
    errors.push({
      rule: "year-range",
      message: `Year range starts after it ends: ${start}..${end}`,
      path: "years",
    });
  }
}

// Rule: Cities are unique, carry positive integer cardinalities and a rate in [0,1]
function checkCities(config: EducationConfig, errors: ValidationError[]): void {
  if (!Array.isArray(config.cities) || config.cities.length === 0) {
    errors.push({
      rule: "non-empty",
      message: "At least one city is required",
      path: "cities",
    });
    return;
  }

  const cities = config.cities.filter((city, i) =>
    checkMapping(city, `cities[${i}]`, errors)
  );
  checkDuplicates(cities.map((c) => c.name), "cities", "city", errors);
  checkDuplicates(cities.map((c) => c.code), "cities", "city code", errors);

  for (const city of cities) {
    const path = `cities.${city.name}`;
    checkLabel(city.name, "cities", errors);
    if (typeof city.code !== "string" || !/^[A-Z]{3}$/.test(city.code)) {
      errors.push({
        rule: "city-code",
        message: `City "${city.name}" has invalid code ${JSON.stringify(city.code)} (must be three uppercase letters)`,
        path: `${path}.code`,
      });
    }
    checkPositiveInteger(city.population, `${path}.population`, errors);
    checkPositiveInteger(city.base_enrollment, `${path}.base_enrollment`, errors);
    checkPositiveInteger(city.barangays, `${path}.barangays`, errors);
    checkPositiveInteger(city.schools_public, `${path}.schools_public`, errors);
    if (!Number.isInteger(city.schools_private) || city.schools_private < 0) {
      errors.push({
        rule: "non-negative-count",
        message: `Invalid value ${city.schools_private} (must be a non-negative integer)`,
        path: `${path}.schools_private`,
      });
    }
    checkRate(city.poverty_rate, `${path}.poverty_rate`, errors);
  }
}

// Rule: Every year-keyed table covers every year of the range
function checkYearTables(
  config: EducationConfig,
  errors: ValidationError[]
): void {
  const { start, end } = config.years;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start > end) return;
  const years = listYears(config.years);

  const factorTables: [YearTable, string][] = [
    [config.enrollment.year_factors, "enrollment.year_factors"],
    [config.graduates.year_factors, "graduates.year_factors"],
    [config.osy.year_factors, "osy.year_factors"],
    [config.incidents.year_factors, "incidents.year_factors"],
  ];
  for (const [table, path] of factorTables) {
    checkYearCoverage(table, path, years, errors);
    for (const year of years) {
      const value = table?.[String(year)];
      if (typeof value === "number" && value < 0) {
        errors.push({
          rule: "non-negative-factor",
          message: `Factor for year ${year} is negative: ${value}`,
          path,
        });
      }
    }
  }

  // Adjustments are additive and may be negative
  checkYearCoverage(
    config.performance.year_adjustments,
    "performance.year_adjustments",
    years,
    errors
  );
}

function checkYearCoverage(
  table: YearTable | undefined,
  path: string,
  years: number[],
  errors: ValidationError[]
): void {
  for (const year of years) {
    const value = table?.[String(year)];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      errors.push({
        rule: "year-coverage",
        message: `Missing value for year ${year}`,
        path,
      });
    }
  }
}

// Rule: Twelve month factors; sublevel shares partition the total
function checkEnrollment(
  config: EducationConfig,
  errors: ValidationError[]
): void {
  const months = config.enrollment.month_factors;
  if (!Array.isArray(months) || months.length !== MONTHS_PER_YEAR) {
    errors.push({
      rule: "month-factors",
      message: `Expected ${MONTHS_PER_YEAR} month factors, got ${Array.isArray(months) ? months.length : typeof months}`,
      path: "enrollment.month_factors",
    });
  } else {
    months.forEach((factor, i) => {
      if (typeof factor !== "number" || !Number.isFinite(factor) || factor < 0) {
        errors.push({
          rule: "non-negative-factor",
          message: `Month ${i + 1} has invalid factor ${factor}`,
          path: "enrollment.month_factors",
        });
      }
    });
  }

  const shares = config.enrollment.sublevel_shares;
  if (!checkMapping(shares, "enrollment.sublevel_shares", errors)) return;
  const entries: [string, number][] = [
    ["elementary", shares.elementary],
    ["junior_high", shares.junior_high],
    ["senior_high", shares.senior_high],
  ];
  for (const [name, share] of entries) {
    checkRate(share, `enrollment.sublevel_shares.${name}`, errors);
  }
  checkShareSum(
    entries.map(([, share]) => share),
    "enrollment.sublevel_shares",
    errors
  );
}

// Rule: Category lists are non-empty, unique, and their shares sum to 1
function checkShareList(
  list: Share[],
  path: string,
  errors: ValidationError[]
): void {
  if (!checkNonEmptyList(list, path, errors)) return;
  const items = list.filter((item, i) => checkMapping(item, `${path}[${i}]`, errors));
  checkDuplicates(items.map((s) => s.name), path, "category", errors);
  for (const item of items) {
    checkLabel(item.name, path, errors);
    checkRate(item.share, `${path}.${item.name}`, errors);
  }
  // A malformed entry already failed; its share cannot count toward the sum
  if (items.length === list.length) {
    checkShareSum(items.map((s) => s.share), path, errors);
  }
}

function checkInfrastructure(
  config: EducationConfig,
  errors: ValidationError[]
): void {
  const path = "infrastructure.building_conditions";
  const conditions = config.infrastructure.building_conditions;
  if (!checkNonEmptyList(conditions, path, errors)) return;
  checkDuplicates(conditions, path, "building condition", errors);
  for (const condition of conditions) {
    checkLabel(condition, path, errors);
  }
}

function checkIncidents(
  config: EducationConfig,
  errors: ValidationError[]
): void {
  const path = "incidents.types";
  const types = config.incidents.types;
  if (!checkNonEmptyList(types, path, errors)) return;
  const entries = types.filter((type, i) => checkMapping(type, `${path}[${i}]`, errors));
  checkDuplicates(entries.map((t) => t.name), path, "incident type", errors);
  for (const type of entries) {
    checkLabel(type.name, path, errors);
    checkRate(type.annual_rate, `${path}.${type.name}.annual_rate`, errors);
  }
}

function checkPerformance(
  config: EducationConfig,
  errors: ValidationError[]
): void {
  checkPositiveInteger(
    config.performance.grade_levels,
    "performance.grade_levels",
    errors
  );

  const path = "performance.subjects";
  const subjects = config.performance.subjects;
  if (!checkNonEmptyList(subjects, path, errors)) return;
  const entries = subjects.filter((subject, i) =>
    checkMapping(subject, `${path}[${i}]`, errors)
  );
  checkDuplicates(entries.map((s) => s.name), path, "subject", errors);
  for (const subject of entries) {
    checkLabel(subject.name, path, errors);
    if (typeof subject.offset !== "number" || !Number.isFinite(subject.offset)) {
      errors.push({
        rule: "finite-number",
        message: `Subject "${subject.name}" has invalid offset ${subject.offset}`,
        path: `${path}.${subject.name}.offset`,
      });
    }
  }
}

function checkMapping(
  value: unknown,
  path: string,
  errors: ValidationError[]
): boolean {
  if (isMapping(value)) return true;
  errors.push({
    rule: "shape",
    message: `Expected a mapping, got ${describeValue(value)}`,
    path,
  });
  return false;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "a list";
  return typeof value;
}

function checkNonEmptyList(
  list: unknown,
  path: string,
  errors: ValidationError[]
): boolean {
  if (!Array.isArray(list) || list.length === 0) {
    errors.push({
      rule: "non-empty",
      message: "Expected a non-empty list",
      path,
    });
    return false;
  }
  return true;
}

function checkDuplicates(
  names: string[],
  path: string,
  kind: string,
  errors: ValidationError[]
): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      errors.push({
        rule: "no-duplicates",
        message: `Duplicate ${kind}: "${name}"`,
        path,
      });
    }
    seen.add(name);
  }
}

// Labels end up unescaped in CSV output
function checkLabel(
  label: unknown,
  path: string,
  errors: ValidationError[]
): void {
  if (typeof label !== "string" || label.trim() === "") {
    errors.push({
      rule: "label",
      message: `Invalid label ${JSON.stringify(label)} (must be a non-empty string)`,
      path,
    });
  } else if (/[,"\r\n]/.test(label)) {
    errors.push({
      rule: "label",
      message: `Label "${label}" contains a comma, quote or line break`,
      path,
    });
  }
}

function checkPositiveInteger(
  value: number,
  path: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value <= 0) {
    errors.push({
      rule: "positive-cardinality",
      message: `Invalid value ${value} (must be a positive integer)`,
      path,
    });
  }
}

function checkRate(value: number, path: string, errors: ValidationError[]): void {
  if (typeof value !== "number" || !(value >= 0 && value <= 1)) {
    errors.push({
      rule: "rate-range",
      message: `Invalid rate ${value} (must be within [0, 1])`,
      path,
    });
  }
}

function checkShareSum(
  shares: number[],
  path: string,
  errors: ValidationError[]
): void {
  const sum = shares.reduce((acc, s) => acc + (typeof s === "number" ? s : 0), 0);
  if (Math.abs(sum - 1) > SHARE_TOLERANCE) {
    errors.push({
      rule: "share-sum",
      message: `Shares sum to ${sum.toFixed(3)}, expected 1`,
      path,
    });
  }
}
