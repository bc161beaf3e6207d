import * as fs from "node:fs";
import * as path from "node:path";
import { columnNames } from "../generator/schema.js";
import type { Datasets, TableName, TableRowMap } from "../generator/types.js";

/**
 * Header line of field names, then one comma-joined line per row.
 * Values are written as-is: labels are validated to hold no delimiter.
 */
export function toCsv<T>(
  headers: readonly (keyof T & string)[],
  rows: readonly Readonly<T>[]
): string {
  const lines = [headers.join(",")];
  for (const row of rows) {
    lines.push(headers.map((h) => String(row[h])).join(","));
  }
  return lines.join("\n") + "\n";
}

export function tableToCsv<K extends TableName>(
  datasets: Datasets,
  table: K
): string {
  return toCsv<TableRowMap[K]>(columnNames(table), datasets[table]);
}

/** File name a table is exported under, e.g. "enrollment_data.csv". */
export function csvFileName(table: TableName): string {
  return `${table}_data.csv`;
}

/** Write one table into dir and return the file's path. */
export function writeTableCsv(
  datasets: Datasets,
  table: TableName,
  dir: string
): string {
  const filePath = path.join(dir, csvFileName(table));
  fs.writeFileSync(filePath, tableToCsv(datasets, table), "utf-8");
  return filePath;
}
