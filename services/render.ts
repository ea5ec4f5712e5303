import type { DashboardViewModel, Dataset, FilterCriteria } from '../types';
import { summarize } from './aggregations';
import { applyFilters, getFilterOptions } from './filters';
import { formatCurrency, formatUnits } from './formatters';

/**
 * One pass of the dashboard pipeline: filter the dataset by the current
 * selection and summarize what is left. Called again on every filter change.
 */
export const render = (dataset: Dataset, criteria: FilterCriteria): DashboardViewModel => {
  const records = applyFilters(dataset.records, criteria);
  const summary = summarize(records);

  return {
    criteria,
    options: getFilterOptions(dataset),
    records,
    summary,
    display: {
      grossRevenue: formatCurrency(summary.grossRevenue),
      netRevenue: formatCurrency(summary.netRevenue),
      totalUnits: formatUnits(summary.totalUnits),
    },
  };
};
