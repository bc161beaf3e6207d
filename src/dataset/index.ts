export {
  filterTable,
  filterDatasets,
  assertFilterInRange,
  paginate,
  listCities,
  listTableYears,
  summarizeRegion,
  citySnapshot,
} from "./query.js";
export type {
  TableFilter,
  Page,
  CityEnrollment,
  RegionalOverview,
  CitySnapshot,
} from "./query.js";

export { toCsv, tableToCsv, csvFileName, writeTableCsv } from "./csv.js";
