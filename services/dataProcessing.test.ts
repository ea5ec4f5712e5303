import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { cleanCurrency, cleanQuantity, parseDate, parseSalesWorkbook } from './dataProcessing';
import { DatasetLoadError } from '../types';
import { SALES_HEADER, toBytes } from '../test/fixtures';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to fail');
};

describe('cleanCurrency', () => {
  it('strips dollar signs and thousands separators', () => {
    expect(cleanCurrency('$1,234.50')).toBe(1234.5);
    expect(cleanCurrency(' $12 ')).toBe(12);
    expect(cleanCurrency('1,000,000')).toBe(1000000);
  });

  it('passes numeric cells through', () => {
    expect(cleanCurrency(12.5)).toBe(12.5);
  });

  it('treats unparseable values as missing', () => {
    expect(cleanCurrency('n/a')).toBeNull();
    expect(cleanCurrency('$')).toBeNull();
    expect(cleanCurrency('')).toBeNull();
    expect(cleanCurrency('12 USD')).toBeNull();
    expect(cleanCurrency(true)).toBeNull();
    expect(cleanCurrency(null)).toBeNull();
  });
});

describe('cleanQuantity', () => {
  it('parses plain numbers only', () => {
    expect(cleanQuantity('42')).toBe(42);
    expect(cleanQuantity(7)).toBe(7);
    expect(cleanQuantity('$42')).toBeNull();
    expect(cleanQuantity('many')).toBeNull();
  });
});

describe('parseDate', () => {
  it('reads text day-first', () => {
    expect(parseDate('05/03/2024')).toBe('2024-03-05');
    expect(parseDate('5.3.24')).toBe('2024-03-05');
    expect(parseDate('05-03-2024')).toBe('2024-03-05');
    expect(parseDate('05/03/2024 14:30')).toBe('2024-03-05');
  });

  it('keeps ISO dates', () => {
    expect(parseDate('2024-03-05')).toBe('2024-03-05');
    expect(parseDate('2024-03-05T10:00:00')).toBe('2024-03-05');
  });

  it('reads year-first text with any separator', () => {
    expect(parseDate('2024/01/05')).toBe('2024-01-05');
    expect(parseDate('2024.1.5')).toBe('2024-01-05');
    expect(parseDate('2024/01-05')).toBeNull();
  });

  it('reads English month names in either order', () => {
    expect(parseDate('5 March 2024')).toBe('2024-03-05');
    expect(parseDate('05-Mar-2024')).toBe('2024-03-05');
    expect(parseDate('1st Sept 2024')).toBe('2024-09-01');
    expect(parseDate('Mar 5, 2024')).toBe('2024-03-05');
    expect(parseDate('December 31st 2024')).toBe('2024-12-31');
    expect(parseDate('31 Feb 2024')).toBeNull();
    expect(parseDate('5 Smarch 2024')).toBeNull();
  });

  it('converts spreadsheet serial numbers and date cells', () => {
    expect(parseDate(45296)).toBe('2024-01-05');
    expect(parseDate(new Date(2024, 0, 5))).toBe('2024-01-05');
  });

  it('rejects impossible or unrecognised dates', () => {
    expect(parseDate('31/02/2024')).toBeNull();
    expect(parseDate('05/13/2024')).toBeNull();
    expect(parseDate('29/02/2023')).toBeNull();
    expect(parseDate('next tuesday')).toBeNull();
    expect(parseDate(new Date(Number.NaN))).toBeNull();
    expect(parseDate(null)).toBeNull();
  });

  it('accepts leap days', () => {
    expect(parseDate('29/02/2024')).toBe('2024-02-29');
  });
});

describe('parseSalesWorkbook', () => {
  const csv = [
    'Date ,Country, Product ,Units_Sold,Unit_Price,Total_Sale,Sales_After_Discount,Region',
    '05/01/2024,US,Widget,10,$10.00,"$1,000.00","$900.50",North',
    '2024-01-20,US,Gadget,5,$10.00,$50.00,$40.00,South',
    '31/02/2024,UK,Widget,2,$10.00,$20.00,$20.00,North',
    '01/02/2024,UK,Widget,2,$10.00,n/a,$20.00,North',
    '03/02/2024,UK,,2,$10.00,$20.00,$20.00,North',
    '04/02/2024,DE,Gizmo,3,$5.00,$15.00,$15.00,',
    '10/02/2024,DE,Gizmo,3,$5.00,$15.00,$13.50,West',
  ].join('\n');

  it('cleans valid rows and drops incomplete ones whole', () => {
    const dataset = parseSalesWorkbook(toBytes(csv), 'sales.csv');

    expect(dataset.sourceName).toBe('sales.csv');
    expect(dataset.droppedRows).toBe(4);
    expect(dataset.records).toEqual([
      {
        date: '2024-01-05',
        country: 'US',
        product: 'Widget',
        unitsSold: 10,
        unitPrice: 10,
        totalSale: 1000,
        salesAfterDiscount: 900.5,
        extras: { Region: 'North' },
      },
      {
        date: '2024-01-20',
        country: 'US',
        product: 'Gadget',
        unitsSold: 5,
        unitPrice: 10,
        totalSale: 50,
        salesAfterDiscount: 40,
        extras: { Region: 'South' },
      },
      {
        date: '2024-02-10',
        country: 'DE',
        product: 'Gizmo',
        unitsSold: 3,
        unitPrice: 5,
        totalSale: 15,
        salesAfterDiscount: 13.5,
        extras: { Region: 'West' },
      },
    ]);
  });

  it('trims header names', () => {
    const dataset = parseSalesWorkbook(toBytes(csv), 'sales.csv');
    expect(dataset.columns).toEqual([
      'Date',
      'Country',
      'Product',
      'Units_Sold',
      'Unit_Price',
      'Total_Sale',
      'Sales_After_Discount',
      'Region',
    ]);
  });

  it('yields identical datasets for the same source', () => {
    expect(parseSalesWorkbook(toBytes(csv), 'sales.csv')).toEqual(parseSalesWorkbook(toBytes(csv), 'sales.csv'));
  });

  it('freezes the loaded dataset', () => {
    const dataset = parseSalesWorkbook(toBytes(csv), 'sales.csv');
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.records)).toBe(true);
    expect(Object.isFrozen(dataset.records[0])).toBe(true);
  });

  it('reads xlsx workbooks with numeric and serial-date cells', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      [' Date ', 'Country ', 'Product', 'Units_Sold', 'Unit_Price', 'Total_Sale', 'Sales_After_Discount'],
      [45296, 'US', 'Widget', 10, '$10.00', '$1,200.50', 1100.25],
      ['15/03/2024', 'UK', 'Gadget', 4, 7.5, 30, '$27.00'],
      ['15/13/2024', 'UK', 'Gadget', 4, 7.5, 30, 27],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Sales');
    const bytes = new Uint8Array(XLSX.write(workbook, { type: 'array', bookType: 'xlsx' }));

    const dataset = parseSalesWorkbook(bytes, 'data.xlsx');

    expect(dataset.columns.slice(0, 2)).toEqual(['Date', 'Country']);
    expect(dataset.droppedRows).toBe(1);
    expect(dataset.records).toEqual([
      {
        date: '2024-01-05',
        country: 'US',
        product: 'Widget',
        unitsSold: 10,
        unitPrice: 10,
        totalSale: 1200.5,
        salesAfterDiscount: 1100.25,
        extras: {},
      },
      {
        date: '2024-03-15',
        country: 'UK',
        product: 'Gadget',
        unitsSold: 4,
        unitPrice: 7.5,
        totalSale: 30,
        salesAfterDiscount: 27,
        extras: {},
      },
    ]);
  });

  it('fails when a required column is absent', () => {
    const source = 'Date,Country,Product,Units_Sold,Unit_Price,Total_Sale\n05/01/2024,US,Widget,1,$1,$1';
    const error = captureError(() => parseSalesWorkbook(toBytes(source), 'partial.csv'));

    expect(error).toBeInstanceOf(DatasetLoadError);
    expect(error).toMatchObject({ code: 'MISSING_COLUMNS', missingColumns: ['Sales_After_Discount'] });
  });

  it('fails when no row survives cleaning', () => {
    const source = `${SALES_HEADER}\nyesterday,US,Widget,1,$1,$1,$1`;
    const error = captureError(() => parseSalesWorkbook(toBytes(source), 'bad.csv'));

    expect(error).toBeInstanceOf(DatasetLoadError);
    expect(error).toMatchObject({ code: 'EMPTY_DATASET' });
  });

  it('keeps rows whose dates use other recognised formats', () => {
    const source = [
      SALES_HEADER,
      '05/01/2024,US,Widget,1,$1,$1,$1',
      '2024/01/06,US,Widget,1,$1,$1,$1',
      '7 January 2024,US,Widget,1,$1,$1,$1',
    ].join('\n');
    const dataset = parseSalesWorkbook(toBytes(source), 'formats.csv');

    expect(dataset.droppedRows).toBe(0);
    expect(dataset.records.map(r => r.date)).toEqual(['2024-01-05', '2024-01-06', '2024-01-07']);
  });

  it('decodes UTF-8 text with or without a byte-order mark', () => {
    const source = `${SALES_HEADER}\n05/01/2024,Côte d'Ivoire,Café crème,1,$1,$1,$1`;
    const withBom = new Uint8Array([0xef, 0xbb, 0xbf, ...toBytes(source)]);

    for (const bytes of [toBytes(source), withBom]) {
      const dataset = parseSalesWorkbook(bytes, 'unicode.csv');
      expect(dataset.columns[0]).toBe('Date');
      expect(dataset.records[0].country).toBe("Côte d'Ivoire");
      expect(dataset.records[0].product).toBe('Café crème');
    }
  });

  it('reads single-byte text that is not valid UTF-8', () => {
    const ascii = toBytes(`${SALES_HEADER}\n05/01/2024,US,Caf`);
    const tail = toBytes(',1,$1,$1,$1');
    const bytes = new Uint8Array([...ascii, 0xe9, ...tail]);

    expect(parseSalesWorkbook(bytes, 'latin1.csv').records[0].product).toBe('Café');
  });

  it('ignores blank lines without counting them as dropped', () => {
    const source = `${SALES_HEADER}\n05/01/2024,US,Widget,1,$1,$1,$1\n\n06/01/2024,US,Widget,1,$1,$1,$1\n`;
    const dataset = parseSalesWorkbook(toBytes(source), 'gaps.csv');

    expect(dataset.records).toHaveLength(2);
    expect(dataset.droppedRows).toBe(0);
  });
});
