import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";

import { MalformedDataError, PRICE_FIELDS, type PriceField } from "@steptrade/sdk";

import { filterByRange, type DateRange } from "./internalUtils.js";

const TIMESTAMP_HEADERS = ["timestamp", "date", "time", "datetime"];

/**
 * Row as read from disk. Numbers are not checked here; a cell that does not
 * parse comes through as `NaN` for the bar series loader to reject.
 */
export interface CsvRow {
  readonly timestamp: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

type ColumnIndex = Record<PriceField | "timestamp", number>;

/**
 * CSV-backed data collaborator. Reads `timestamp,open,high,low,close,volume`
 * files (columns located by header name) and returns rows in file order.
 */
export class CsvSource {
  /** Relative paths resolve against the working directory. */
  public async loadFile(path: string, range: DateRange = {}): Promise<ReadonlyArray<CsvRow>> {
    const resolved = isAbsolute(path) ? path : join(process.cwd(), path);
    const content = await readFile(resolved, { encoding: "utf-8" });
    return filterByRange(parseCsv(content), range);
  }
}

const locateColumns = (header: string): ColumnIndex => {
  const names = header.split(",").map((part) => part.trim().toLowerCase());
  const find = (candidates: ReadonlyArray<string>, label: string): number => {
    const index = names.findIndex((name) => candidates.includes(name));
    if (index === -1) {
      throw new MalformedDataError(`CSV header is missing a "${label}" column`);
    }
    return index;
  };

  const columns: ColumnIndex = {
    timestamp: find(TIMESTAMP_HEADERS, "timestamp"),
    open: 0,
    high: 0,
    low: 0,
    close: 0,
    volume: 0,
  };
  for (const field of PRICE_FIELDS) {
    columns[field] = find([field], field);
  }
  return columns;
};

/**
 * Parses CSV text with a header row. Blank lines are skipped.
 */
export const parseCsv = (content: string): CsvRow[] => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    return [];
  }

  const [header, ...rows] = lines;
  const columns = locateColumns(header);
  const width = Math.max(...Object.values(columns)) + 1;

  return rows.map((row, index) => {
    const cells = row.split(",").map((part) => part.trim());
    if (cells.length < width) {
      throw new MalformedDataError(`CSV row ${index + 1} has ${cells.length} column(s)`, { index });
    }
    return {
      timestamp: cells[columns.timestamp],
      open: Number(cells[columns.open]),
      high: Number(cells[columns.high]),
      low: Number(cells[columns.low]),
      close: Number(cells[columns.close]),
      volume: Number(cells[columns.volume]),
    };
  });
};
