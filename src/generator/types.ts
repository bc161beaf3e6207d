export const TABLE_NAMES = [
  "enrollment",
  "graduates",
  "osy",
  "poverty",
  "infrastructure",
  "incidents",
  "performance",
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export type SchoolType = "Public" | "Private";
export type YesNo = "Yes" | "No";

export interface EnrollmentRow {
  City: string;
  Year: number;
  Month: number;
  Quarter: string;
  Total_Enrollment: number;
  Elementary: number;
  Junior_High: number;
  Senior_High: number;
  Male: number;
  Female: number;
  Public_School_Enrollment: number;
  Private_School_Enrollment: number;
  Enrollment_Rate: number;
}

export interface GraduatesRow {
  City: string;
  Year: number;
  Track: string;
  School_Type: SchoolType;
  Candidates: number;
  Total_Graduates: number;
  Graduation_Rate: number;
  To_College: number;
  To_Employment: number;
  NEET: number;
  College_Rate: number;
}

export interface OsyRow {
  City: string;
  Year: number;
  Age_Group: string;
  Reason: string;
  OSY_Count: number;
  ALS_Enrolled: number;
  ALS_Enrollment_Rate: number;
}

export interface PovertyRow {
  City: string;
  Year: number;
  Barangay: string;
  Total_Students: number;
  Poverty_Rate: number;
  FourPs_Beneficiaries: number;
  Scholarship_Recipients: number;
  Feeding_Program: number;
  Financial_Assistance: number;
}

export interface InfrastructureRow {
  City: string;
  Year: number;
  School_ID: string;
  School_Type: SchoolType;
  Classrooms: number;
  Classroom_Shortage: number;
  Teacher_Student_Ratio: number;
  Has_Computers: YesNo;
  Has_Internet: YesNo;
  Has_Library: YesNo;
  Has_Science_Lab: YesNo;
  Building_Condition: string;
}

export interface IncidentsRow {
  City: string;
  Year: number;
  Month: number;
  Incident_Type: string;
  Reported_Cases: number;
  Resolved: number;
  Pending: number;
  Referred: number;
  Resolution_Rate: number;
}

export interface PerformanceRow {
  City: string;
  Year: number;
  Grade_Level: number;
  Subject: string;
  Students_Tested: number;
  Average_Score: number;
  Passing_Rate: number;
  /** Literacy, numeracy and ICT rates are city-wide, repeated on each grade and subject. */
  Literacy_Rate: number;
  Numeracy_Rate: number;
  ICT_Proficiency_Rate: number;
}

export interface TableRowMap {
  enrollment: EnrollmentRow;
  graduates: GraduatesRow;
  osy: OsyRow;
  poverty: PovertyRow;
  infrastructure: InfrastructureRow;
  incidents: IncidentsRow;
  performance: PerformanceRow;
}

/** Rows shared by every table: the join key is (City, Year[, ...]). */
export interface CityYearRow {
  City: string;
  Year: number;
}

export type Table<T> = readonly Readonly<T>[];

/** All seven generated tables. Frozen once generated. */
export type Datasets = { readonly [K in TableName]: Table<TableRowMap[K]> };

/**
 * label: category string; integer: count, never negative;
 * rate: fraction in [0, 1]; score: test score in [40, 100].
 */
export type ColumnKind = "label" | "integer" | "rate" | "score";

export interface ColumnDef<T> {
  name: keyof T & string;
  kind: ColumnKind;
}
