import type { AggregatedData, DashboardViewModel, Dataset } from '../types';
import { formatCurrency } from './formatters';

const table = (title: string, rows: AggregatedData[]): string[] => [
  title,
  ...(rows.length === 0 ? ['  (no sales)'] : rows.map(row => `  ${row.name}: ${formatCurrency(row.value)}`)),
];

/** Plain-text rendering of a dashboard view for the terminal */
export const formatReport = (dataset: Dataset, view: DashboardViewModel): string[] => {
  const { dateRange, countries, products } = view.criteria;
  return [
    `Source: ${dataset.sourceName} (${dataset.records.length} rows, ${dataset.droppedRows} dropped)`,
    `Period: ${dateRange.start} to ${dateRange.end}`,
    `Countries: ${countries.length === 0 ? 'all' : countries.join(', ')}`,
    `Products: ${products.length === 0 ? 'all' : products.join(', ')}`,
    `Matching rows: ${view.records.length}`,
    '',
    `Gross Revenue: ${view.display.grossRevenue}`,
    `Net Revenue (After Discount): ${view.display.netRevenue}`,
    `Total Units Sold: ${view.display.totalUnits}`,
    '',
    ...table('Net Revenue by Country', view.summary.countryTotals),
    ...table('Net Revenue by Product', view.summary.productTotals),
    ...table('Monthly Net Revenue', view.summary.monthlyTotals),
  ];
};
