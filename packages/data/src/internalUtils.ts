import type { ISODate } from "@steptrade/sdk";

export interface DateRange {
  /** Inclusive lower bound. */
  readonly start?: ISODate;
  /** Inclusive upper bound. */
  readonly end?: ISODate;
}

const parseTimestamp = (value: string | undefined): number | null => {
  if (!value) {
    return null;
  }
  const epoch = Date.parse(value);
  return Number.isNaN(epoch) ? null : epoch;
};

/**
 * Keeps rows whose timestamp falls inside `range`. Rows with an unparseable
 * timestamp are kept so that validation can report them.
 */
export const filterByRange = <T extends { readonly timestamp: string }>(
  rows: ReadonlyArray<T>,
  range: DateRange,
): T[] => {
  const startEpoch = parseTimestamp(range.start);
  const endEpoch = parseTimestamp(range.end);
  if (startEpoch === null && endEpoch === null) {
    return [...rows];
  }

  return rows.filter((row) => {
    const epoch = parseTimestamp(row.timestamp);
    if (epoch === null) {
      return true;
    }
    const afterStart = startEpoch === null ? true : epoch >= startEpoch;
    const beforeEnd = endEpoch === null ? true : epoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};
