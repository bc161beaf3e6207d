import type { CityConfig, EducationConfig } from "../config/types.js";
import { requireYearValue, totalSchools } from "../config/helpers.js";
import type { SeededRandom } from "./random.js";
import type {
  EnrollmentRow,
  GraduatesRow,
  IncidentsRow,
  InfrastructureRow,
  OsyRow,
  PerformanceRow,
  PovertyRow,
  SchoolType,
  YesNo,
} from "./types.js";

const MONTHS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
const SCHOOL_TYPES: readonly SchoolType[] = ["Public", "Private"];

const GRADUATING_COHORT_SHARE = 0.08;
const OSY_POPULATION_SHARE = 0.03;
const MIN_SCORE = 40;
const MAX_SCORE = 100;

/** Truncate toward zero, as every sub-count does. */
function int(value: number): number {
  return Math.max(0, Math.trunc(value));
}

function round(value: number, digits: number): number {
  const scale = 10 ** digits;
  return Math.round(value * scale) / scale;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? round(part / whole, 3) : 0;
}

function yesNo(rng: SeededRandom, probability: number): YesNo {
  return rng.next() < probability ? "Yes" : "No";
}

/** Normal jitter proportional to the value, floored at zero. */
function addNoise(
  rng: SeededRandom,
  value: number,
  noiseLevel: number
): number {
  return Math.max(0, value + rng.normal(0, noiseLevel * value));
}

/** Share of a city's students in public schools; poorer cities lean public. */
function publicShare(city: CityConfig): number {
  return Math.min(0.95, 0.78 + city.poverty_rate * 0.3);
}

function quarterOf(month: number): string {
  return `Q${Math.ceil(month / 3)}`;
}

export function buildEnrollment(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): EnrollmentRow[] {
  const rows: EnrollmentRow[] = [];
  const { sublevel_shares: sublevels, month_factors: monthFactors } =
    config.enrollment;

  for (const city of config.cities) {
    const publicPart = publicShare(city);
    for (const year of years) {
      const yearFactor = requireYearValue(
        config.enrollment.year_factors,
        year,
        "enrollment.year_factors"
      );
      for (const month of MONTHS) {
        const expected = city.base_enrollment * yearFactor * monthFactors[month - 1];
        const total = int(addNoise(rng, expected, 0.03));
        const male = int(total * rng.uniform(0.48, 0.5));
        const publicCount = int(total * publicPart);

        rows.push({
          City: city.name,
          Year: year,
          Month: month,
          Quarter: quarterOf(month),
          Total_Enrollment: total,
          Elementary: int(total * sublevels.elementary),
          Junior_High: int(total * sublevels.junior_high),
          Senior_High: int(total * sublevels.senior_high),
          Male: male,
          Female: total - male,
          Public_School_Enrollment: publicCount,
          Private_School_Enrollment: total - publicCount,
          Enrollment_Rate: round(rng.uniform(0.91, 0.97), 3),
        });
      }
    }
  }
  return rows;
}

export function buildGraduates(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): GraduatesRow[] {
  const rows: GraduatesRow[] = [];

  for (const city of config.cities) {
    const cohort = city.base_enrollment * GRADUATING_COHORT_SHARE;
    const publicPart = publicShare(city);
    for (const year of years) {
      const yearFactor = requireYearValue(
        config.graduates.year_factors,
        year,
        "graduates.year_factors"
      );
      for (const track of config.graduates.tracks) {
        for (const schoolType of SCHOOL_TYPES) {
          const typeShare = schoolType === "Public" ? publicPart : 1 - publicPart;
          const candidates = int(
            addNoise(rng, cohort * track.share * typeShare * yearFactor, 0.05)
          );
          const graduationRate = round(
            clamp(0.95 - city.poverty_rate * 0.15 + rng.uniform(-0.02, 0.02), 0, 1),
            3
          );
          const graduates = int(candidates * graduationRate);
          const toCollege = int(graduates * rng.uniform(0.55, 0.68));

          rows.push({
            City: city.name,
            Year: year,
            Track: track.name,
            School_Type: schoolType,
            Candidates: candidates,
            Total_Graduates: graduates,
            Graduation_Rate: graduationRate,
            To_College: toCollege,
            To_Employment: int(graduates * rng.uniform(0.15, 0.25)),
            NEET: int(graduates * rng.uniform(0.1, 0.2)),
            College_Rate: ratio(toCollege, graduates),
          });
        }
      }
    }
  }
  return rows;
}

export function buildOsy(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): OsyRow[] {
  const rows: OsyRow[] = [];

  for (const city of config.cities) {
    const baseOsy = city.population * OSY_POPULATION_SHARE * (1 + city.poverty_rate);
    for (const year of years) {
      const yearFactor = requireYearValue(
        config.osy.year_factors,
        year,
        "osy.year_factors"
      );
      for (const ageGroup of config.osy.age_groups) {
        for (const reason of config.osy.reasons) {
          const count = int(
            addNoise(rng, baseOsy * yearFactor * ageGroup.share * reason.share, 0.06)
          );
          const alsEnrolled = int(count * rng.uniform(0.18, 0.28));

          rows.push({
            City: city.name,
            Year: year,
            Age_Group: ageGroup.name,
            Reason: reason.name,
            OSY_Count: count,
            ALS_Enrolled: alsEnrolled,
            ALS_Enrollment_Rate: ratio(alsEnrolled, count),
          });
        }
      }
    }
  }
  return rows;
}

function barangayLabel(index: number): string {
  return `Barangay ${String(index).padStart(2, "0")}`;
}

export function buildPoverty(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): PovertyRow[] {
  const rows: PovertyRow[] = [];

  for (const city of config.cities) {
    const studentsPerBarangay = city.base_enrollment / city.barangays;
    for (const year of years) {
      for (let b = 1; b <= city.barangays; b++) {
        const students = int(studentsPerBarangay * rng.uniform(0.6, 1.4));
        const povertyRate = round(
          clamp(city.poverty_rate + rng.normal(0, 0.05), 0, 1),
          3
        );

        rows.push({
          City: city.name,
          Year: year,
          Barangay: barangayLabel(b),
          Total_Students: students,
          Poverty_Rate: povertyRate,
          FourPs_Beneficiaries: int(students * povertyRate * 0.9),
          Scholarship_Recipients: int(students * rng.uniform(0.12, 0.18)),
          Feeding_Program: int(students * rng.uniform(0.25, 0.35)),
          Financial_Assistance: int(students * rng.uniform(0.15, 0.22)),
        });
      }
    }
  }
  return rows;
}

/** e.g. TAC-PUB-001 for Tacurong's first public school. */
function schoolId(city: CityConfig, type: SchoolType, ordinal: number): string {
  const kind = type === "Public" ? "PUB" : "PRV";
  return `${city.code}-${kind}-${String(ordinal).padStart(3, "0")}`;
}

export function buildInfrastructure(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): InfrastructureRow[] {
  const rows: InfrastructureRow[] = [];
  const conditions = config.infrastructure.building_conditions;

  for (const city of config.cities) {
    const schools = totalSchools(city);
    for (const year of years) {
      const elapsed = year - config.years.start;
      const shortageRate = Math.max(0.05, 0.18 - elapsed * 0.015);
      const computerOdds = Math.min(0.85, 0.35 + elapsed * 0.05);
      const internetOdds = Math.min(0.75, 0.2 + elapsed * 0.06);

      for (let i = 0; i < schools; i++) {
        const isPublic = i < city.schools_public;
        const type: SchoolType = isPublic ? "Public" : "Private";
        const ordinal = isPublic ? i + 1 : i - city.schools_public + 1;
        const classrooms = isPublic ? rng.int(10, 45) : rng.int(6, 25);

        rows.push({
          City: city.name,
          Year: year,
          School_ID: schoolId(city, type, ordinal),
          School_Type: type,
          Classrooms: classrooms,
          Classroom_Shortage: int(classrooms * shortageRate * rng.uniform(0.5, 1.5)),
          Teacher_Student_Ratio: round(1 / rng.uniform(28, 35), 4),
          Has_Computers: yesNo(rng, computerOdds),
          Has_Internet: yesNo(rng, internetOdds),
          Has_Library: yesNo(rng, 0.72),
          Has_Science_Lab: yesNo(rng, 0.52),
          Building_Condition: rng.pick(conditions),
        });
      }
    }
  }
  return rows;
}

export function buildIncidents(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): IncidentsRow[] {
  const rows: IncidentsRow[] = [];

  for (const city of config.cities) {
    for (const year of years) {
      const yearFactor = requireYearValue(
        config.incidents.year_factors,
        year,
        "incidents.year_factors"
      );
      for (const month of MONTHS) {
        for (const type of config.incidents.types) {
          const expected = (city.base_enrollment * type.annual_rate) / 12;
          const cases = int(expected * yearFactor * rng.uniform(0.7, 1.3));
          const resolved = int(cases * rng.uniform(0.55, 0.8));

          rows.push({
            City: city.name,
            Year: year,
            Month: month,
            Incident_Type: type.name,
            Reported_Cases: cases,
            Resolved: resolved,
            Pending: int(cases * rng.uniform(0.05, 0.2)),
            Referred: int(cases * rng.uniform(0.05, 0.15)),
            Resolution_Rate: ratio(resolved, cases),
          });
        }
      }
    }
  }
  return rows;
}

/** A rising rate capped at `ceiling`, with a little jitter. */
function proficiency(
  rng: SeededRandom,
  trend: number,
  ceiling: number,
  jitter: number
): number {
  return round(clamp(Math.min(ceiling, trend) + rng.uniform(-jitter, jitter), 0, 1), 3);
}

export function buildPerformance(
  config: EducationConfig,
  years: number[],
  rng: SeededRandom
): PerformanceRow[] {
  const rows: PerformanceRow[] = [];
  const { grade_levels: gradeLevels, subjects } = config.performance;

  for (const city of config.cities) {
    const baseScore = 75 - city.poverty_rate * 30;
    const testedPerGrade = city.base_enrollment / gradeLevels;
    for (const year of years) {
      const adjustment = requireYearValue(
        config.performance.year_adjustments,
        year,
        "performance.year_adjustments"
      );
      const elapsed = year - config.years.start;
      const trend = elapsed * 0.5 + adjustment;
      const literacy = proficiency(rng, 0.8 + elapsed * 0.02, 0.98, 0.02);
      const numeracy = proficiency(rng, 0.72 + elapsed * 0.025, 0.95, 0.02);
      const ict = proficiency(rng, 0.3 + elapsed * 0.07, 0.92, 0.03);
      for (let grade = 1; grade <= gradeLevels; grade++) {
        const gradeDrift = -(grade - 1) * 0.4;
        for (const subject of subjects) {
          const score = round(
            clamp(
              baseScore + trend + gradeDrift + subject.offset + rng.normal(0, 3),
              MIN_SCORE,
              MAX_SCORE
            ),
            2
          );

          rows.push({
            City: city.name,
            Year: year,
            Grade_Level: grade,
            Subject: subject.name,
            Students_Tested: int(testedPerGrade * rng.uniform(0.85, 0.98)),
            Average_Score: score,
            Passing_Rate: round(
              clamp((score - MIN_SCORE) / (MAX_SCORE - MIN_SCORE) + rng.uniform(-0.05, 0.05), 0, 1),
              3
            ),
            Literacy_Rate: literacy,
            Numeracy_Rate: numeracy,
            ICT_Proficiency_Rate: ict,
          });
        }
      }
    }
  }
  return rows;
}
