import type { EducationConfig } from "./types.js";

/**
 * The constant tables behind the default dataset: five cities, 2015–2024.
 * `data/education/config.yaml` is the same document in YAML form.
 *
 * Shared by every default generation run. Clone it (structuredClone) before
 * editing a copy.
 */
export const DEFAULT_CONFIG: EducationConfig = {
  years: { start: 2015, end: 2024 },
  cities: [
    {
      name: "General Santos",
      code: "GSC",
      population: 697315,
      schools_public: 245,
      schools_private: 89,
      base_enrollment: 185000,
      poverty_rate: 0.24,
      barangays: 26,
    },
    {
      name: "Tacurong",
      code: "TAC",
      population: 109319,
      schools_public: 78,
      schools_private: 23,
      base_enrollment: 28000,
      poverty_rate: 0.31,
      barangays: 20,
    },
    {
      name: "Isulan",
      code: "ISU",
      population: 97490,
      schools_public: 65,
      schools_private: 18,
      base_enrollment: 24000,
      poverty_rate: 0.29,
      barangays: 17,
    },
    {
      name: "Koronadal",
      code: "KOR",
      population: 184573,
      schools_public: 142,
      schools_private: 54,
      base_enrollment: 48000,
      poverty_rate: 0.26,
      barangays: 27,
    },
    {
      name: "Kidapawan",
      code: "KID",
      population: 160791,
      schools_public: 128,
      schools_private: 41,
      base_enrollment: 42000,
      poverty_rate: 0.28,
      barangays: 40,
    },
  ],
  enrollment: {
    // Dip during the 2020-2021 school closures, rebound after
    year_factors: {
      "2015": 0.95,
      "2016": 0.96,
      "2017": 0.97,
      "2018": 0.98,
      "2019": 1.0,
      "2020": 0.92,
      "2021": 0.88,
      "2022": 0.95,
      "2023": 0.98,
      "2024": 1.02,
    },
    // January through December; the school year opens in June
    month_factors: [1.0, 1.0, 0.97, 0.85, 0.8, 1.05, 1.1, 1.08, 1.05, 1.02, 1.0, 0.98],
    sublevel_shares: { elementary: 0.48, junior_high: 0.32, senior_high: 0.2 },
  },
  graduates: {
    year_factors: {
      "2015": 1.0,
      "2016": 1.0,
      "2017": 1.0,
      "2018": 1.0,
      "2019": 1.0,
      "2020": 0.7,
      "2021": 0.7,
      "2022": 1.0,
      "2023": 1.0,
      "2024": 1.0,
    },
    tracks: [
      { name: "STEM", share: 0.22 },
      { name: "ABM", share: 0.18 },
      { name: "HUMSS", share: 0.25 },
      { name: "TVL", share: 0.2 },
      { name: "GAS", share: 0.15 },
    ],
  },
  osy: {
    year_factors: {
      "2015": 1.12,
      "2016": 1.1,
      "2017": 1.08,
      "2018": 1.06,
      "2019": 1.04,
      "2020": 1.15,
      "2021": 1.22,
      "2022": 1.14,
      "2023": 1.06,
      "2024": 1.0,
    },
    age_groups: [
      { name: "Age_6_11", share: 0.15 },
      { name: "Age_12_15", share: 0.28 },
      { name: "Age_16_18", share: 0.35 },
      { name: "Age_19_24", share: 0.22 },
    ],
    reasons: [
      { name: "Financial", share: 0.42 },
      { name: "Family_Obligations", share: 0.23 },
      { name: "Distance_to_School", share: 0.12 },
      { name: "Lack_of_Interest", share: 0.15 },
      { name: "Health_Issues", share: 0.08 },
    ],
  },
  infrastructure: {
    building_conditions: ["Good", "Fair", "Poor", "Needs_Major_Repair"],
  },
  incidents: {
    year_factors: {
      "2015": 1.0,
      "2016": 1.0,
      "2017": 1.0,
      "2018": 1.0,
      "2019": 1.0,
      "2020": 0.6,
      "2021": 0.6,
      "2022": 1.0,
      "2023": 1.0,
      "2024": 1.0,
    },
    types: [
      { name: "Bullying", annual_rate: 0.012 },
      { name: "Fighting", annual_rate: 0.0065 },
      { name: "Truancy", annual_rate: 0.018 },
      { name: "Substance_Related", annual_rate: 0.004 },
      { name: "Vandalism", annual_rate: 0.005 },
      { name: "Suspension", annual_rate: 0.0075 },
      { name: "Counseling_Referral", annual_rate: 0.02 },
      { name: "Mental_Health_Referral", annual_rate: 0.0225 },
    ],
  },
  performance: {
    grade_levels: 12,
    year_adjustments: {
      "2015": 0,
      "2016": 0,
      "2017": 0,
      "2018": 0,
      "2019": 0,
      "2020": -2.5,
      "2021": -3.5,
      "2022": -1.5,
      "2023": 0,
      "2024": 0,
    },
    subjects: [
      { name: "Math", offset: -2.5 },
      { name: "Science", offset: -1.5 },
      { name: "English", offset: 0.5 },
      { name: "Filipino", offset: 1.5 },
      { name: "Araling_Panlipunan", offset: 1.0 },
      { name: "MAPEH", offset: 2.5 },
    ],
  },
};
