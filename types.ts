export const REQUIRED_COLUMNS = [
  'Date',
  'Country',
  'Product',
  'Units_Sold',
  'Unit_Price',
  'Total_Sale',
  'Sales_After_Discount',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export const CURRENCY_COLUMNS = ['Unit_Price', 'Total_Sale', 'Sales_After_Discount'] as const;

export type ExtraValue = string | number | boolean;

export interface SalesRecord {
  date: string; // YYYY-MM-DD
  country: string;
  product: string;
  unitsSold: number;
  unitPrice: number;
  totalSale: number;
  salesAfterDiscount: number;
  /** Non-required source columns, keyed by trimmed header name */
  extras: Readonly<Record<string, ExtraValue>>;
}

export interface Dataset {
  readonly records: readonly SalesRecord[];
  /** Trimmed header names in source order */
  readonly columns: readonly string[];
  readonly sourceName: string;
  /** Rows discarded because a field was missing or unparseable */
  readonly droppedRows: number;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface FilterCriteria {
  dateRange: DateRange;
  countries: readonly string[]; // empty = every country
  products: readonly string[]; // empty = every product
}

export interface FilterOptions {
  countries: string[];
  products: string[];
  dateSpan: DateRange;
}

export type GroupKey = 'country' | 'product' | 'month';

export interface AggregatedData {
  name: string;
  value: number;
}

export interface DashboardMetrics {
  grossRevenue: number;
  netRevenue: number;
  totalUnits: number;
}

export interface AggregateResult extends DashboardMetrics {
  countryTotals: AggregatedData[];
  productTotals: AggregatedData[];
  monthlyTotals: AggregatedData[];
}

export interface DashboardViewModel {
  criteria: FilterCriteria;
  options: FilterOptions;
  records: SalesRecord[];
  summary: AggregateResult;
  display: {
    grossRevenue: string;
    netRevenue: string;
    totalUnits: string;
  };
}

export type DatasetLoadErrorCode = 'SOURCE_UNREADABLE' | 'MISSING_COLUMNS' | 'EMPTY_DATASET';

export class DatasetLoadError extends Error {
  readonly code: DatasetLoadErrorCode;
  readonly missingColumns: RequiredColumn[];

  constructor(code: DatasetLoadErrorCode, message: string, missingColumns: RequiredColumn[] = []) {
    super(message);
    this.name = 'DatasetLoadError';
    this.code = code;
    this.missingColumns = missingColumns;
  }
}
