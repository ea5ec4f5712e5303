import type { AggregateResult, AggregatedData, DashboardMetrics, GroupKey, SalesRecord } from '../types';

/** Calendar-month label of an ISO date, e.g. "2024-01" */
export const monthOf = (date: string): string => date.substring(0, 7);

const groupName = (item: SalesRecord, groupKey: GroupKey): string => {
  switch (groupKey) {
    case 'country':
      return item.country;
    case 'product':
      return item.product;
    case 'month':
      return monthOf(item.date);
  }
};

/**
 * Net revenue (sales after discount) per distinct country, product or month.
 * Countries and products come back largest first, months in calendar order.
 * Months without sales are absent rather than zero.
 */
export const aggregateBy = (data: readonly SalesRecord[], groupKey: GroupKey): AggregatedData[] => {
  const map = new Map<string, number>();

  data.forEach(item => {
    const group = groupName(item, groupKey);
    map.set(group, (map.get(group) ?? 0) + item.salesAfterDiscount);
  });

  const totals = Array.from(map.entries()).map(([name, value]) => ({ name, value }));
  return groupKey === 'month'
    ? totals.sort((a, b) => a.name.localeCompare(b.name))
    : totals.sort((a, b) => b.value - a.value);
};

export const calculateMetrics = (data: readonly SalesRecord[]): DashboardMetrics => ({
  grossRevenue: data.reduce((acc, curr) => acc + curr.totalSale, 0),
  netRevenue: data.reduce((acc, curr) => acc + curr.salesAfterDiscount, 0),
  // fractional units are truncated when displayed, not here
  totalUnits: data.reduce((acc, curr) => acc + curr.unitsSold, 0),
});

export const summarize = (data: readonly SalesRecord[]): AggregateResult => ({
  ...calculateMetrics(data),
  countryTotals: aggregateBy(data, 'country'),
  productTotals: aggregateBy(data, 'product'),
  monthlyTotals: aggregateBy(data, 'month'),
});
