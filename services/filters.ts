import type { Dataset, FilterCriteria, FilterOptions, SalesRecord } from '../types';

/**
 * Keeps the records inside the inclusive date range whose country and product
 * are selected. An empty country or product list selects everything.
 * Source order is preserved.
 */
export const applyFilters = (records: readonly SalesRecord[], criteria: FilterCriteria): SalesRecord[] => {
  const countries = new Set(criteria.countries);
  const products = new Set(criteria.products);
  const { start, end } = criteria.dateRange;

  return records.filter(item => {
    // ISO dates compare correctly as strings
    const dateMatch = item.date >= start && item.date <= end;
    const countryMatch = countries.size === 0 || countries.has(item.country);
    const productMatch = products.size === 0 || products.has(item.product);
    return dateMatch && countryMatch && productMatch;
  });
};

const unique = (values: string[]) => Array.from(new Set(values));

export const getFilterOptions = (dataset: Dataset): FilterOptions => {
  const dates = dataset.records.map(d => d.date);
  return {
    countries: unique(dataset.records.map(d => d.country)),
    products: unique(dataset.records.map(d => d.product)),
    dateSpan: {
      start: dates.reduce((min, d) => (d < min ? d : min), dates[0] ?? ''),
      end: dates.reduce((max, d) => (d > max ? d : max), dates[0] ?? ''),
    },
  };
};

/** Full date span of the dataset, no country or product restriction */
export const defaultCriteria = (dataset: Dataset): FilterCriteria => ({
  dateRange: getFilterOptions(dataset).dateSpan,
  countries: [],
  products: [],
});
