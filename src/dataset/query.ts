import type { EducationConfig } from "../config/types.js";
import { findCity } from "../config/helpers.js";
import type {
  CityYearRow,
  Datasets,
  EnrollmentRow,
} from "../generator/types.js";

export interface TableFilter {
  city?: string;
  year?: number;
}

export interface Page<T> {
  rows: T[];
  /** 1-based, clamped into [1, totalPages]. */
  page: number;
  pageSize: number;
  totalRows: number;
  totalPages: number;
}

export interface CityEnrollment {
  city: string;
  enrollment: number;
}

export interface RegionalOverview {
  year: number;
  totalStudents: number;
  totalSchools: number;
  totalGraduates: number;
  averageScore: number;
  cities: CityEnrollment[];
}

export interface CitySnapshot {
  city: string;
  year: number;
  enrollment: number;
  graduationRate: number;
  averageScore: number;
  totalSchools: number;
}

/**
 * Rows matching every given criterion, as a new array. The source table is
 * never touched, so later unfiltered reads still see every row.
 */
export function filterTable<T extends CityYearRow>(
  rows: readonly T[],
  filter: TableFilter
): T[] {
  return rows.filter(
    (row) =>
      (filter.city === undefined || row.City === filter.city) &&
      (filter.year === undefined || row.Year === filter.year)
  );
}

/**
 * Reject a filter naming a city or year the config does not generate, which
 * would otherwise select nothing from every table.
 *
 * @throws RangeError naming the unknown city or the out-of-range year
 */
export function assertFilterInRange(
  config: EducationConfig,
  filter: TableFilter
): void {
  if (filter.city !== undefined && !findCity(config, filter.city)) {
    throw new RangeError(
      `Unknown city "${filter.city}" (expected one of: ${config.cities.map((c) => c.name).join(", ")})`
    );
  }
  const { start, end } = config.years;
  if (filter.year !== undefined && (filter.year < start || filter.year > end)) {
    throw new RangeError(`Year ${filter.year} is outside ${start}-${end}`);
  }
}

/** Apply one filter to every table. */
export function filterDatasets(datasets: Datasets, filter: TableFilter): Datasets {
  return {
    enrollment: filterTable(datasets.enrollment, filter),
    graduates: filterTable(datasets.graduates, filter),
    osy: filterTable(datasets.osy, filter),
    poverty: filterTable(datasets.poverty, filter),
    infrastructure: filterTable(datasets.infrastructure, filter),
    incidents: filterTable(datasets.incidents, filter),
    performance: filterTable(datasets.performance, filter),
  };
}

export function paginate<T>(
  rows: readonly T[],
  page: number,
  pageSize: number
): Page<T> {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }
  if (!Number.isInteger(page)) {
    throw new RangeError(`Page must be an integer, got ${page}`);
  }
  const totalRows = rows.length;
  const totalPages = Math.max(1, Math.ceil(totalRows / pageSize));
  const current = Math.min(totalPages, Math.max(1, page));
  const start = (current - 1) * pageSize;

  return {
    rows: rows.slice(start, start + pageSize),
    page: current,
    pageSize,
    totalRows,
    totalPages,
  };
}

/** Cities in the order they first appear. */
export function listCities(rows: readonly CityYearRow[]): string[] {
  return [...new Set(rows.map((r) => r.City))];
}

/** Years present in the table, ascending. */
export function listTableYears(rows: readonly CityYearRow[]): number[] {
  return [...new Set(rows.map((r) => r.Year))].sort((a, b) => a - b);
}

/**
 * Region-wide figures for the latest year. Enrollment is monthly, so a
 * city's figure is its mean monthly total for that year.
 */
export function summarizeRegion(datasets: Datasets): RegionalOverview {
  const years = listTableYears(datasets.enrollment);
  if (years.length === 0) {
    throw new Error("Cannot summarize: the enrollment table is empty");
  }
  const year = years[years.length - 1];

  const cities = listCities(datasets.enrollment).map((city) => ({
    city,
    enrollment: meanEnrollment(filterTable(datasets.enrollment, { city, year })),
  }));

  return {
    year,
    totalStudents: cities.reduce((acc, c) => acc + c.enrollment, 0),
    totalSchools: filterTable(datasets.infrastructure, { year }).length,
    totalGraduates: sum(
      filterTable(datasets.graduates, { year }).map((r) => r.Total_Graduates)
    ),
    averageScore: mean(
      filterTable(datasets.performance, { year }).map((r) => r.Average_Score)
    ),
    cities,
  };
}

/** Key metrics for one city and year, or undefined when there is no data. */
export function citySnapshot(
  datasets: Datasets,
  city: string,
  year: number
): CitySnapshot | undefined {
  const enrollment = filterTable(datasets.enrollment, { city, year });
  if (enrollment.length === 0) return undefined;

  const graduates = filterTable(datasets.graduates, { city, year });
  const candidates = sum(graduates.map((r) => r.Candidates));
  const graduated = sum(graduates.map((r) => r.Total_Graduates));

  return {
    city,
    year,
    enrollment: meanEnrollment(enrollment),
    graduationRate:
      candidates > 0 ? Math.round((graduated / candidates) * 1000) / 1000 : 0,
    averageScore: mean(
      filterTable(datasets.performance, { city, year }).map((r) => r.Average_Score)
    ),
    totalSchools: filterTable(datasets.infrastructure, { city, year }).length,
  };
}

function meanEnrollment(rows: readonly Readonly<EnrollmentRow>[]): number {
  if (rows.length === 0) return 0;
  return Math.round(sum(rows.map((r) => r.Total_Enrollment)) / rows.length);
}

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

/** Mean rounded to two decimals; 0 for no values. */
function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round((sum(values) / values.length) * 100) / 100;
}
