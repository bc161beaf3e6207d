import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  filterTable,
  filterDatasets,
  assertFilterInRange,
  paginate,
  listCities,
  listTableYears,
  summarizeRegion,
  citySnapshot,
} from "../../src/dataset/query.js";
import { generateAllData } from "../../src/generator/generate.js";
import type {
  Datasets,
  EnrollmentRow,
  GraduatesRow,
  InfrastructureRow,
  PerformanceRow,
} from "../../src/generator/types.js";
import { smallConfig } from "../fixtures/config.js";

const generated = generateAllData(7, smallConfig());

function enrollment(city: string, year: number, month: number, total: number): EnrollmentRow {
  return {
    City: city,
    Year: year,
    Month: month,
    Quarter: `Q${Math.ceil(month / 3)}`,
    Total_Enrollment: total,
    Elementary: 0,
    Junior_High: 0,
    Senior_High: 0,
    Male: 0,
    Female: total,
    Public_School_Enrollment: total,
    Private_School_Enrollment: 0,
    Enrollment_Rate: 0.95,
  };
}

function graduates(city: string, year: number, candidates: number, graduated: number): GraduatesRow {
  return {
    City: city,
    Year: year,
    Track: "STEM",
    School_Type: "Public",
    Candidates: candidates,
    Total_Graduates: graduated,
    Graduation_Rate: 0.9,
    To_College: 0,
    To_Employment: 0,
    NEET: 0,
    College_Rate: 0,
  };
}

function performance(city: string, year: number, score: number): PerformanceRow {
  return {
    City: city,
    Year: year,
    Grade_Level: 1,
    Subject: "Math",
    Students_Tested: 10,
    Average_Score: score,
    Passing_Rate: 0.5,
    Literacy_Rate: 0.9,
    Numeracy_Rate: 0.8,
    ICT_Proficiency_Rate: 0.6,
  };
}

function school(city: string, year: number, id: string): InfrastructureRow {
  return {
    City: city,
    Year: year,
    School_ID: id,
    School_Type: "Public",
    Classrooms: 10,
    Classroom_Shortage: 1,
    Teacher_Student_Ratio: 0.03,
    Has_Computers: "Yes",
    Has_Internet: "No",
    Has_Library: "Yes",
    Has_Science_Lab: "No",
    Building_Condition: "Good",
  };
}

function handmade(): Datasets {
  return {
    enrollment: [
      enrollment("Alpha", 2020, 1, 100),
      enrollment("Alpha", 2020, 2, 201),
      enrollment("Beta", 2020, 1, 50),
      enrollment("Alpha", 2021, 1, 300),
      enrollment("Beta", 2021, 1, 60),
      enrollment("Beta", 2021, 2, 70),
    ],
    graduates: [
      graduates("Alpha", 2020, 50, 45),
      graduates("Alpha", 2020, 30, 27),
      graduates("Alpha", 2021, 40, 30),
      graduates("Beta", 2021, 20, 18),
    ],
    osy: [],
    poverty: [],
    infrastructure: [
      school("Alpha", 2020, "ALP-PUB-001"),
      school("Alpha", 2020, "ALP-PUB-002"),
      school("Alpha", 2020, "ALP-PRV-001"),
      school("Alpha", 2021, "ALP-PUB-001"),
      school("Beta", 2021, "BET-PUB-001"),
    ],
    incidents: [],
    performance: [
      performance("Alpha", 2020, 70),
      performance("Alpha", 2020, 80.5),
      performance("Alpha", 2021, 60),
      performance("Beta", 2021, 90),
      performance("Beta", 2021, 75),
    ],
  };
}

describe("filterTable", () => {
  it("filters by city", () => {
    const rows = filterTable(generated.enrollment, { city: "Alpha" });
    assert.equal(rows.length, 24);
    assert.ok(rows.every((r) => r.City === "Alpha"));
  });

  it("filters by city and year", () => {
    const rows = filterTable(generated.enrollment, { city: "Beta", year: 2021 });
    assert.deepStrictEqual(
      rows.map((r) => r.Month),
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]
    );
  });

  it("returns every row for an empty filter, as a new array", () => {
    const rows = filterTable(generated.poverty, {});
    assert.notStrictEqual(rows, generated.poverty);
    assert.deepStrictEqual(rows, [...generated.poverty]);
  });

  it("returns nothing for an unknown city", () => {
    assert.deepStrictEqual(filterTable(generated.osy, { city: "Gamma" }), []);
  });

  it("leaves the canonical table intact", () => {
    const before = JSON.stringify(generated.incidents);
    const rows = filterTable(generated.incidents, { city: "Alpha", year: 2020 });
    rows.length = 0;
    assert.equal(generated.incidents.length, 96);
    assert.equal(JSON.stringify(generated.incidents), before);
  });
});

describe("filterDatasets", () => {
  it("applies the filter to every table", () => {
    const view = filterDatasets(generated, { city: "Alpha", year: 2020 });
    assert.equal(view.enrollment.length, 12);
    assert.equal(view.graduates.length, 4);
    assert.equal(view.osy.length, 4);
    assert.equal(view.poverty.length, 4);
    assert.equal(view.infrastructure.length, 4);
    assert.equal(view.incidents.length, 24);
    assert.equal(view.performance.length, 6);
    assert.equal(generated.enrollment.length, 48);
  });
});

describe("assertFilterInRange", () => {
  const config = smallConfig();

  it("accepts a known city and a year inside the range", () => {
    assert.doesNotThrow(() => assertFilterInRange(config, {}));
    assert.doesNotThrow(() => assertFilterInRange(config, { city: "Beta", year: 2020 }));
  });

  it("rejects an unknown city", () => {
    assert.throws(() => assertFilterInRange(config, { city: "Gamma" }), {
      name: "RangeError",
      message: 'Unknown city "Gamma" (expected one of: Alpha, Beta)',
    });
  });

  it("rejects a year outside the generated range", () => {
    assert.throws(() => assertFilterInRange(config, { year: 2030 }), {
      name: "RangeError",
      message: "Year 2030 is outside 2020-2021",
    });
    assert.throws(() => assertFilterInRange(config, { city: "Alpha", year: 2019 }), {
      message: "Year 2019 is outside 2020-2021",
    });
  });
});

describe("paginate", () => {
  const rows = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

  it("slices the requested page", () => {
    assert.deepStrictEqual(paginate(rows, 2, 3), {
      rows: [4, 5, 6],
      page: 2,
      pageSize: 3,
      totalRows: 10,
      totalPages: 4,
    });
  });

  it("returns a short last page", () => {
    assert.deepStrictEqual(paginate(rows, 4, 3).rows, [10]);
  });

  it("clamps pages outside the range", () => {
    assert.equal(paginate(rows, 9, 3).page, 4);
    assert.equal(paginate(rows, 0, 3).page, 1);
    assert.deepStrictEqual(paginate(rows, -2, 3).rows, [1, 2, 3]);
  });

  it("treats an empty table as one empty page", () => {
    assert.deepStrictEqual(paginate([], 1, 25), {
      rows: [],
      page: 1,
      pageSize: 25,
      totalRows: 0,
      totalPages: 1,
    });
  });

  it("rejects a bad page size or page", () => {
    assert.throws(() => paginate(rows, 1, 0), RangeError);
    assert.throws(() => paginate(rows, 1, 2.5), RangeError);
    assert.throws(() => paginate(rows, 1.5, 3), RangeError);
  });
});

describe("listCities / listTableYears", () => {
  it("lists cities in order of appearance", () => {
    assert.deepStrictEqual(listCities(generated.performance), ["Alpha", "Beta"]);
  });

  it("lists years ascending", () => {
    assert.deepStrictEqual(listTableYears(handmade().graduates), [2020, 2021]);
  });
});

describe("summarizeRegion", () => {
  it("summarizes the latest year", () => {
    assert.deepStrictEqual(summarizeRegion(handmade()), {
      year: 2021,
      totalStudents: 300 + 65,
      totalSchools: 2,
      totalGraduates: 48,
      averageScore: 75,
      cities: [
        { city: "Alpha", enrollment: 300 },
        { city: "Beta", enrollment: 65 },
      ],
    });
  });

  it("covers every generated city", () => {
    const overview = summarizeRegion(generated);
    assert.equal(overview.year, 2021);
    assert.deepStrictEqual(overview.cities.map((c) => c.city), ["Alpha", "Beta"]);
    assert.equal(overview.totalSchools, 6);
  });

  it("rejects empty datasets", () => {
    const empty: Datasets = { ...handmade(), enrollment: [] };
    assert.throws(() => summarizeRegion(empty), { message: /enrollment table is empty/ });
  });
});

describe("citySnapshot", () => {
  it("computes key metrics for a city and year", () => {
    assert.deepStrictEqual(citySnapshot(handmade(), "Alpha", 2020), {
      city: "Alpha",
      year: 2020,
      enrollment: 151,
      graduationRate: 0.9,
      averageScore: 75.25,
      totalSchools: 3,
    });
  });

  it("returns undefined when the city has no data for the year", () => {
    assert.equal(citySnapshot(handmade(), "Gamma", 2020), undefined);
    assert.equal(citySnapshot(handmade(), "Alpha", 2019), undefined);
  });

  it("reports zero graduation rate without candidates", () => {
    const snapshot = citySnapshot(handmade(), "Beta", 2020);
    assert.equal(snapshot?.graduationRate, 0);
    assert.equal(snapshot?.totalSchools, 0);
    assert.equal(snapshot?.averageScore, 0);
  });
});
