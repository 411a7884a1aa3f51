import Big from "big.js";

/**
 * Wire shape exchanged with the redaction service: ordered headers plus
 * positional string rows.
 */
export type TabularPayload = {
  headers: string[];
  rows: string[][];
};

/** Rows as the warehouse returns them, keyed by column name. */
export type RawRowSet = {
  columns: string[];
  rows: Record<string, unknown>[];
};

function hasStringValue(v: object): v is { value: string } {
  return "value" in v && typeof v.value === "string";
}

export function cellToString(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (typeof v === "string") return v;
  if (Buffer.isBuffer(v)) return v.toString("base64");
  if (v instanceof Date) return v.toISOString();
  if (Array.isArray(v)) return JSON.stringify(v);
  // NUMERIC and BIGNUMERIC; toFixed() never switches to exponent notation
  if (v instanceof Big) return v.toFixed();
  if (typeof v === "object") {
    // BigQueryDate, BigQueryTimestamp, BigQueryInt and friends
    if (hasStringValue(v)) return v.value;
    return JSON.stringify(v);
  }
  return String(v);
}

export function toTabularPayload(raw: RawRowSet): TabularPayload {
  return {
    headers: [...raw.columns],
    rows: raw.rows.map((row) => raw.columns.map((c) => cellToString(row[c]))),
  };
}

/**
 * Fails when the table is not rectangular. Alignment is by position, so a
 * short or long row would shift values into the wrong columns.
 */
export function assertRectangular(payload: TabularPayload, label: string) {
  const width = payload.headers.length;
  payload.rows.forEach((row, i) => {
    if (row.length !== width) {
      throw new Error(
        `${label}: row ${i} has ${row.length} values, expected ${width}`
      );
    }
  });
}

export function sameHeaders(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((h, i) => h === b[i]);
}
