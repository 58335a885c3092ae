export { BarSeries, loadBarSeries, validateRows, type LoadBarSeriesOptions } from "./BarSeries.js";
export { CsvSource, parseCsv, type CsvRow } from "./CsvSource.js";
export { filterByRange, type DateRange } from "./internalUtils.js";
