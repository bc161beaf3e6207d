import { describe, it } from "node:test";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as assert from "node:assert/strict";
import { toCsv, tableToCsv, csvFileName, writeTableCsv } from "../../src/dataset/csv.js";
import { columnNames } from "../../src/generator/schema.js";
import { generateAllData } from "../../src/generator/generate.js";
import { filterDatasets } from "../../src/dataset/query.js";
import { smallConfig } from "../fixtures/config.js";

interface Pair {
  a: number;
  b: string;
}

const datasets = generateAllData(7, smallConfig());

describe("toCsv", () => {
  it("writes a header line and one line per row", () => {
    const rows: Pair[] = [
      { a: 1, b: "x" },
      { a: 2.5, b: "y z" },
    ];
    assert.equal(toCsv<Pair>(["a", "b"], rows), "a,b\n1,x\n2.5,y z\n");
  });

  it("follows the header order, not the key order", () => {
    assert.equal(toCsv<Pair>(["b", "a"], [{ a: 1, b: "x" }]), "b,a\nx,1\n");
  });

  it("writes only the header for an empty table", () => {
    assert.equal(toCsv<Pair>(["a", "b"], []), "a,b\n");
  });
});

describe("tableToCsv", () => {
  it("uses the table's columns as the header", () => {
    const lines = tableToCsv(datasets, "poverty").split("\n");
    assert.equal(lines[0], columnNames("poverty").join(","));
    assert.equal(
      lines[0],
      "City,Year,Barangay,Total_Students,Poverty_Rate,FourPs_Beneficiaries,Scholarship_Recipients,Feeding_Program,Financial_Assistance"
    );
    // header + 12 rows + trailing newline
    assert.equal(lines.length, 14);
    assert.equal(lines[13], "");
  });

  it("writes each row's values in column order", () => {
    const row = datasets.poverty[0];
    const line = tableToCsv(datasets, "poverty").split("\n")[1];
    assert.equal(
      line,
      [
        "Alpha",
        "2020",
        "Barangay 01",
        row.Total_Students,
        row.Poverty_Rate,
        row.FourPs_Beneficiaries,
        row.Scholarship_Recipients,
        row.Feeding_Program,
        row.Financial_Assistance,
      ].join(",")
    );
  });

  it("exports a filtered view", () => {
    const view = filterDatasets(datasets, { city: "Beta", year: 2021 });
    const lines = tableToCsv(view, "infrastructure").trimEnd().split("\n");
    assert.equal(lines.length, 3);
    assert.ok(lines[1].startsWith("Beta,2021,BET-PUB-001,Public,"));
    assert.ok(lines[2].startsWith("Beta,2021,BET-PUB-002,Public,"));
  });
});

describe("writeTableCsv", () => {
  it("names files after the table", () => {
    assert.equal(csvFileName("osy"), "osy_data.csv");
  });

  it("writes the table into the directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "edu-csv-"));
    try {
      const filePath = writeTableCsv(datasets, "incidents", dir);
      assert.equal(filePath, path.join(dir, "incidents_data.csv"));
      assert.equal(fs.readFileSync(filePath, "utf-8"), tableToCsv(datasets, "incidents"));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
