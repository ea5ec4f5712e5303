import * as XLSX from 'xlsx';
import {
  CURRENCY_COLUMNS,
  type Dataset,
  DatasetLoadError,
  type ExtraValue,
  REQUIRED_COLUMNS,
  type RequiredColumn,
  type SalesRecord,
} from '../types';

type Cell = string | number | boolean | Date | null;

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const YEAR_FIRST_DATE_PATTERN = /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(?:[T ].*)?$/;
const DAY_FIRST_DATE_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})(?:[T ].*)?$/;
// "5 March 2024", "05-Mar-2024"
const DAY_MONTH_NAME_PATTERN = /^(\d{1,2})(?:st|nd|rd|th)?[\s-]+([A-Za-z]+)\.?,?[\s-]+(\d{4}|\d{2})$/;
// "Mar 5, 2024", "March 5th 2024"
const MONTH_NAME_DAY_PATTERN = /^([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const ZIP_SIGNATURE = [0x50, 0x4b];
const CFB_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0];

const EXCEL_EPOCH_OFFSET = 25569; // serial of 1970-01-01
const MS_PER_DAY = 86400 * 1000;

const isBlank = (val: Cell | undefined): boolean =>
  val === null || val === undefined || (typeof val === 'string' && val.trim() === '');

const parseDecimal = (text: string): number | null => {
  const clean = text.trim();
  if (!DECIMAL_PATTERN.test(clean)) return null;
  const value = Number(clean);
  return Number.isFinite(value) ? value : null;
};

/**
 * Currency text such as "$1,234.50" becomes 1234.5. Anything that is not a
 * plain decimal once `$` and `,` are stripped is treated as missing.
 */
export const cleanCurrency = (val: Cell): number | null => {
  if (typeof val === 'number') return Number.isFinite(val) ? val : null;
  if (typeof val !== 'string') return null;
  return parseDecimal(val.replace(/\$/g, '').replace(/,/g, ''));
};

export const cleanQuantity = (val: Cell): number | null => {
  if (typeof val === 'number') return Number.isFinite(val) ? val : null;
  if (typeof val !== 'string') return null;
  return parseDecimal(val);
};

/** Full English month name or its three-letter (or "Sept") abbreviation */
const monthFromName = (name: string): number | null => {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex(
    month => month === lower || month.slice(0, 3) === lower || (lower === 'sept' && month === 'september'),
  );
  return index === -1 ? null : index + 1;
};

const fullYear = (text: string): number => {
  const year = parseInt(text, 10);
  return year < 100 ? year + 2000 : year;
};

const pad = (n: number) => String(n).padStart(2, '0');

export const toIsoDate = (year: number, month: number, day: number): string | null => {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${String(year).padStart(4, '0')}-${pad(month)}-${pad(day)}`;
};

/**
 * Normalizes a date cell to `YYYY-MM-DD`. Numeric text is read day-first
 * ("05/03/2024" is 5 March 2024) unless it starts with a four-digit year.
 * English month names are accepted in either order.
 */
export const parseDate = (val: Cell): string | null => {
  // 1. Spreadsheet date cell
  if (val instanceof Date) {
    if (Number.isNaN(val.getTime())) return null;
    return toIsoDate(val.getFullYear(), val.getMonth() + 1, val.getDate());
  }

  // 2. Spreadsheet serial number
  if (typeof val === 'number') {
    if (!Number.isFinite(val)) return null;
    const date = new Date(Math.round((val - EXCEL_EPOCH_OFFSET) * MS_PER_DAY));
    if (Number.isNaN(date.getTime())) return null;
    return toIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
  }

  // 3. Text
  if (typeof val === 'string') {
    const v = val.trim();
    const yearFirstMatch = v.match(YEAR_FIRST_DATE_PATTERN);
    if (yearFirstMatch) {
      return toIsoDate(parseInt(yearFirstMatch[1], 10), parseInt(yearFirstMatch[3], 10), parseInt(yearFirstMatch[4], 10));
    }
    const dayFirstMatch = v.match(DAY_FIRST_DATE_PATTERN);
    if (dayFirstMatch) {
      return toIsoDate(fullYear(dayFirstMatch[3]), parseInt(dayFirstMatch[2], 10), parseInt(dayFirstMatch[1], 10));
    }
    const dayMonthMatch = v.match(DAY_MONTH_NAME_PATTERN);
    if (dayMonthMatch) {
      const month = monthFromName(dayMonthMatch[2]);
      return month === null ? null : toIsoDate(fullYear(dayMonthMatch[3]), month, parseInt(dayMonthMatch[1], 10));
    }
    const monthDayMatch = v.match(MONTH_NAME_DAY_PATTERN);
    if (monthDayMatch) {
      const month = monthFromName(monthDayMatch[1]);
      return month === null ? null : toIsoDate(parseInt(monthDayMatch[3], 10), month, parseInt(monthDayMatch[2], 10));
    }
  }
  return null;
};

const cleanText = (val: Cell): string | null => {
  if (isBlank(val)) return null;
  if (val instanceof Date) return parseDate(val);
  return String(val);
};

const cleanExtra = (val: Cell): ExtraValue | null => {
  if (val === null || isBlank(val)) return null;
  if (val instanceof Date) return parseDate(val);
  return val;
};

const startsWith = (bytes: Uint8Array, signature: number[]): boolean =>
  signature.every((byte, i) => bytes[i] === byte);

/** Text sources decoded as UTF-8, or null for binary workbooks and other encodings */
const decodeText = (bytes: Uint8Array): string | null => {
  if (startsWith(bytes, ZIP_SIGNATURE) || startsWith(bytes, CFB_SIGNATURE)) return null;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
};

const readRows = (data: ArrayBuffer | Uint8Array, sourceName: string): Cell[][] => {
  try {
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    const text = decodeText(bytes);
    // raw keeps CSV cells as text so the cleaning rules below see what the file says
    const workbook =
      text === null
        ? XLSX.read(bytes, { type: 'array', cellDates: true, raw: true })
        : XLSX.read(text, { type: 'string', cellDates: true, raw: true });
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
      throw new Error('workbook contains no sheets');
    }
    return XLSX.utils.sheet_to_json<Cell[]>(workbook.Sheets[sheetName], {
      header: 1,
      defval: null,
      raw: true,
      blankrows: false,
    });
  } catch (error) {
    throw new DatasetLoadError(
      'SOURCE_UNREADABLE',
      `Could not read ${sourceName}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
};

/**
 * Loads the first sheet of a sales workbook (xlsx, xls or csv) and cleans it.
 *
 * Every row with a missing or unparseable value in any column is dropped
 * whole; the count is kept on the returned dataset. Fails with
 * {@link DatasetLoadError} when the source cannot be read, lacks a required
 * column, or has no usable rows.
 */
export const parseSalesWorkbook = (data: ArrayBuffer | Uint8Array, sourceName: string): Dataset => {
  const rows = readRows(data, sourceName);

  const headers = (rows[0] ?? []).map((h, i) => {
    const name = isBlank(h) ? '' : String(h).trim();
    return name === '' ? `Column ${i + 1}` : name;
  });

  const missingColumns = REQUIRED_COLUMNS.filter(col => !headers.includes(col));
  if (missingColumns.length > 0) {
    throw new DatasetLoadError(
      'MISSING_COLUMNS',
      `${sourceName} is missing required column(s): ${missingColumns.join(', ')}`,
      missingColumns,
    );
  }

  const idx = (col: RequiredColumn) => headers.indexOf(col);
  const required = new Set<string>(REQUIRED_COLUMNS);
  const extraColumns = headers
    .map((name, index) => ({ name, index }))
    .filter(col => !required.has(col.name));

  const records: SalesRecord[] = [];
  let droppedRows = 0;

  rows.slice(1).forEach(row => {
    const getVal = (i: number): Cell => row[i] ?? null;
    if (headers.every((_, i) => isBlank(getVal(i)))) return;

    const [unitPrice, totalSale, salesAfterDiscount] = CURRENCY_COLUMNS.map(col => cleanCurrency(getVal(idx(col))));
    const date = parseDate(getVal(idx('Date')));
    const country = cleanText(getVal(idx('Country')));
    const product = cleanText(getVal(idx('Product')));
    const unitsSold = cleanQuantity(getVal(idx('Units_Sold')));

    const extras: Record<string, ExtraValue> = {};
    let extrasComplete = true;
    for (const col of extraColumns) {
      const value = cleanExtra(getVal(col.index));
      if (value === null) {
        extrasComplete = false;
        break;
      }
      extras[col.name] = value;
    }

    if (
      date === null ||
      country === null ||
      product === null ||
      unitsSold === null ||
      unitPrice === null ||
      totalSale === null ||
      salesAfterDiscount === null ||
      !extrasComplete
    ) {
      droppedRows++;
      return;
    }

    records.push(
      Object.freeze({
        date,
        country,
        product,
        unitsSold,
        unitPrice,
        totalSale,
        salesAfterDiscount,
        extras: Object.freeze(extras),
      }),
    );
  });

  if (records.length === 0) {
    throw new DatasetLoadError('EMPTY_DATASET', `${sourceName} contains no complete sales rows`);
  }

  return Object.freeze({
    records: Object.freeze(records),
    columns: Object.freeze(headers),
    sourceName,
    droppedRows,
  });
};
