import { addDays, format, isValid, parse, parseISO } from "date-fns";
import * as XLSX from "xlsx";
import { SourceError, type Booking, type CalendarDate } from "@stay-lock/core";

export type BookingColumns = {
  arrival: string;
  departure: string;
};

const EXCEL_EPOCH = "1899-12-30";
const MAX_EXCEL_SERIAL = 2_958_465;

const DAY_FIRST_PATTERNS: Array<{ test: RegExp; pattern: string }> = [
  { test: /^\d{1,2}\.\d{1,2}\.\d{4}$/, pattern: "d.M.yyyy" },
  { test: /^\d{1,2}-\d{1,2}-\d{4}$/, pattern: "d-M-yyyy" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: "d/M/yyyy" },
  { test: /^\d{1,2}\.\d{1,2}\.\d{2}$/, pattern: "d.M.yy" },
  { test: /^\d{1,2}-\d{1,2}-\d{2}$/, pattern: "d-M-yy" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{2}$/, pattern: "d/M/yy" },
  { test: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: "yyyy-M-d" }
];

function headerKey(value: unknown): string {
  return value === null || value === undefined ? "" : String(value).trim().toLowerCase();
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

function fromText(text: string): CalendarDate | null {
  // Drop a trailing time of day ("10.06.2025 00:00", "2025-06-10T00:00:00").
  const datePart = text.trim().split(/[\sT]/)[0] ?? "";
  const match = DAY_FIRST_PATTERNS.find((candidate) => candidate.test.test(datePart));
  if (!match) {
    return null;
  }
  const parsed = parse(datePart, match.pattern, new Date());
  return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : null;
}

/** Reads a spreadsheet cell as a calendar day, day-first for text cells. */
export function parseCellDate(value: unknown): CalendarDate | null {
  if (value instanceof Date) {
    return isValid(value) ? format(value, "yyyy-MM-dd") : null;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 1 || value > MAX_EXCEL_SERIAL) {
      return null;
    }
    return format(addDays(parseISO(EXCEL_EPOCH), Math.floor(value)), "yyyy-MM-dd");
  }
  if (typeof value === "string") {
    return fromText(value);
  }
  return null;
}

export function findHeaderRow(
  rows: unknown[][],
  columns: BookingColumns,
  scanRows: number
): { index: number; arrival: number; departure: number } | null {
  const arrivalKey = headerKey(columns.arrival);
  const departureKey = headerKey(columns.departure);

  for (const [index, row] of rows.slice(0, scanRows).entries()) {
    const keys = row.map(headerKey);
    const arrival = keys.indexOf(arrivalKey);
    const departure = keys.indexOf(departureKey);
    if (arrival >= 0 && departure >= 0) {
      return { index, arrival, departure };
    }
  }
  return null;
}

export function parseBookingRows(rows: unknown[][], columns: BookingColumns, scanRows: number): Booking[] {
  const header = findHeaderRow(rows, columns, scanRows);
  if (!header) {
    throw new SourceError(`Header row with columns '${columns.arrival}' and '${columns.departure}' not found`);
  }

  const bookings: Booking[] = [];
  for (const row of rows.slice(header.index + 1)) {
    if (row.every(isBlank)) {
      continue;
    }
    const arrival = parseCellDate(row[header.arrival]);
    const departure = parseCellDate(row[header.departure]);
    if (!arrival || !departure || departure <= arrival) {
      continue;
    }
    bookings.push({ arrival, departure });
  }
  return bookings;
}

export function readFirstSheet(data: Buffer): unknown[][] {
  const workbook = XLSX.read(data, { type: "buffer", cellDates: true });
  const firstName = workbook.SheetNames[0];
  const sheet = firstName === undefined ? undefined : workbook.Sheets[firstName];
  if (!sheet) {
    throw new SourceError("Workbook has no sheets");
  }
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
}
