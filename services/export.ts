import * as XLSX from 'xlsx';
import type { SalesRecord } from '../types';
import { monthOf } from './aggregations';

export const EXPORT_FILE_NAME = 'filtered_sales_report.csv';
export const EXPORT_MIME_TYPE = 'text/csv';
export const MONTH_COLUMN = 'Month';

/** Dataset columns plus the derived month, unless the source already had one */
export const exportColumns = (columns: readonly string[]): string[] =>
  columns.includes(MONTH_COLUMN) ? [...columns] : [...columns, MONTH_COLUMN];

/**
 * Plain-text value of one column: numbers without currency decoration,
 * dates as YYYY-MM-DD.
 */
export const columnValue = (record: SalesRecord, column: string): string => {
  if (Object.prototype.hasOwnProperty.call(record.extras, column)) {
    return String(record.extras[column]);
  }
  switch (column) {
    case 'Date':
      return record.date;
    case 'Country':
      return record.country;
    case 'Product':
      return record.product;
    case 'Units_Sold':
      return String(record.unitsSold);
    case 'Unit_Price':
      return String(record.unitPrice);
    case 'Total_Sale':
      return String(record.totalSale);
    case 'Sales_After_Discount':
      return String(record.salesAfterDiscount);
    case MONTH_COLUMN:
      return monthOf(record.date);
    default:
      return '';
  }
};

/**
 * Serializes records as CSV with a header row. An empty selection yields the
 * header alone. The output loads back through `parseSalesWorkbook`.
 */
export const exportCsv = (records: readonly SalesRecord[], columns: readonly string[]): string => {
  const header = exportColumns(columns);
  const rows = records.map(record => header.map(column => columnValue(record, column)));
  // string cells keep sheet_to_csv from reformatting numbers
  const sheet = XLSX.utils.aoa_to_sheet([header, ...rows]);
  return XLSX.utils.sheet_to_csv(sheet);
};
