import type { ColumnDef, TableName, TableRowMap } from "./types.js";

/** Column order and kind per table. This is also the CSV header order. */
export const TABLE_COLUMNS: {
  readonly [K in TableName]: readonly ColumnDef<TableRowMap[K]>[];
} = {
  enrollment: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "Month", kind: "integer" },
    { name: "Quarter", kind: "label" },
    { name: "Total_Enrollment", kind: "integer" },
    { name: "Elementary", kind: "integer" },
    { name: "Junior_High", kind: "integer" },
    { name: "Senior_High", kind: "integer" },
    { name: "Male", kind: "integer" },
    { name: "Female", kind: "integer" },
    { name: "Public_School_Enrollment", kind: "integer" },
    { name: "Private_School_Enrollment", kind: "integer" },
    { name: "Enrollment_Rate", kind: "rate" },
  ],
  graduates: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "Track", kind: "label" },
    { name: "School_Type", kind: "label" },
    { name: "Candidates", kind: "integer" },
    { name: "Total_Graduates", kind: "integer" },
    { name: "Graduation_Rate", kind: "rate" },
    { name: "To_College", kind: "integer" },
    { name: "To_Employment", kind: "integer" },
    { name: "NEET", kind: "integer" },
    { name: "College_Rate", kind: "rate" },
  ],
  osy: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "Age_Group", kind: "label" },
    { name: "Reason", kind: "label" },
    { name: "OSY_Count", kind: "integer" },
    { name: "ALS_Enrolled", kind: "integer" },
    { name: "ALS_Enrollment_Rate", kind: "rate" },
  ],
  poverty: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "Barangay", kind: "label" },
    { name: "Total_Students", kind: "integer" },
    { name: "Poverty_Rate", kind: "rate" },
    { name: "FourPs_Beneficiaries", kind: "integer" },
    { name: "Scholarship_Recipients", kind: "integer" },
    { name: "Feeding_Program", kind: "integer" },
    { name: "Financial_Assistance", kind: "integer" },
  ],
  infrastructure: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "School_ID", kind: "label" },
    { name: "School_Type", kind: "label" },
    { name: "Classrooms", kind: "integer" },
    { name: "Classroom_Shortage", kind: "integer" },
    { name: "Teacher_Student_Ratio", kind: "rate" },
    { name: "Has_Computers", kind: "label" },
    { name: "Has_Internet", kind: "label" },
    { name: "Has_Library", kind: "label" },
    { name: "Has_Science_Lab", kind: "label" },
    { name: "Building_Condition", kind: "label" },
  ],
  incidents: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "Month", kind: "integer" },
    { name: "Incident_Type", kind: "label" },
    { name: "Reported_Cases", kind: "integer" },
    { name: "Resolved", kind: "integer" },
    { name: "Pending", kind: "integer" },
    { name: "Referred", kind: "integer" },
    { name: "Resolution_Rate", kind: "rate" },
  ],
  performance: [
    { name: "City", kind: "label" },
    { name: "Year", kind: "integer" },
    { name: "Grade_Level", kind: "integer" },
    { name: "Subject", kind: "label" },
    { name: "Students_Tested", kind: "integer" },
    { name: "Average_Score", kind: "score" },
    { name: "Passing_Rate", kind: "rate" },
    { name: "Literacy_Rate", kind: "rate" },
    { name: "Numeracy_Rate", kind: "rate" },
    { name: "ICT_Proficiency_Rate", kind: "rate" },
  ],
};

export function columnNames<K extends TableName>(
  table: K
): (keyof TableRowMap[K] & string)[] {
  const columns: readonly ColumnDef<TableRowMap[K]>[] = TABLE_COLUMNS[table];
  return columns.map((c) => c.name);
}
