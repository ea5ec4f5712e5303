import { type Dataset, REQUIRED_COLUMNS, type SalesRecord } from '../types';

export const SALES_COLUMNS: string[] = [...REQUIRED_COLUMNS];

export const SALES_HEADER = SALES_COLUMNS.join(',');

export const toBytes = (text: string): Uint8Array => new TextEncoder().encode(text);

export const makeRecord = (overrides: Partial<SalesRecord> = {}): SalesRecord => ({
  date: '2024-01-01',
  country: 'US',
  product: 'Widget',
  unitsSold: 1,
  unitPrice: 10,
  totalSale: 10,
  salesAfterDiscount: 10,
  extras: {},
  ...overrides,
});

export const makeDataset = (records: SalesRecord[], columns: string[] = SALES_COLUMNS): Dataset => ({
  records,
  columns,
  sourceName: 'test.csv',
  droppedRows: 0,
});

/** Three sales across two countries, two products and two months */
export const exampleDataset = (): Dataset =>
  makeDataset([
    makeRecord({ date: '2024-01-05', country: 'US', product: 'Widget', unitsSold: 10, unitPrice: 10, totalSale: 100, salesAfterDiscount: 90 }),
    makeRecord({ date: '2024-01-20', country: 'US', product: 'Gadget', unitsSold: 5, unitPrice: 10, totalSale: 50, salesAfterDiscount: 40 }),
    makeRecord({ date: '2024-02-01', country: 'UK', product: 'Widget', unitsSold: 2, unitPrice: 10, totalSale: 20, salesAfterDiscount: 20 }),
  ]);

const COUNTRIES = ['US', 'UK', 'DE'];
const PRODUCTS = ['Widget', 'Gadget', 'Gizmo', 'Doohickey'];

/** Thirty sales spread over four months with fractional amounts */
export const varietyDataset = (): Dataset =>
  makeDataset(
    Array.from({ length: 30 }, (_, i) => {
      const month = (i % 4) + 1;
      const day = ((i * 7) % 28) + 1;
      const unitsSold = (i % 9) + 1;
      const unitPrice = 12.35 + i;
      const totalSale = Math.round(unitsSold * unitPrice * 100) / 100;
      return makeRecord({
        date: `2024-0${month}-${String(day).padStart(2, '0')}`,
        country: COUNTRIES[i % COUNTRIES.length],
        product: PRODUCTS[i % PRODUCTS.length],
        unitsSold,
        unitPrice,
        totalSale,
        salesAfterDiscount: Math.round(totalSale * 0.9 * 100) / 100,
      });
    }),
  );
