const wholeCurrency = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const centsCurrency = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** "$1,235" for metrics and charts; pass `cents` for table cells ("$1,234.50") */
export const formatCurrency = (val: number, cents = false): string =>
  (cents ? centsCurrency : wholeCurrency).format(val);

export const formatNumber = (val: number): string =>
  new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 }).format(val);

export const formatUnits = (val: number): string =>
  new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 }).format(Math.trunc(val));
