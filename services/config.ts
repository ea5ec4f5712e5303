import { parseArgs } from 'util';
import type { FilterCriteria, FilterOptions } from '../types';
import { parseDate } from './dataProcessing';

export const DEFAULT_SOURCE_FILE = 'data.xlsx';

export interface ReportConfig {
  sourcePath: string;
  /** Where to write the CSV export; null skips the export */
  outputPath: string | null;
  from: string | null;
  to: string | null;
  countries: string[];
  products: string[];
  help: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const dateFlag = (name: string, value: string | undefined): string | null => {
  if (value === undefined) return null;
  const date = parseDate(value);
  if (date === null) {
    throw new ConfigError(`--${name} expects a date (YYYY-MM-DD or DD/MM/YYYY), got "${value}"`);
  }
  return date;
};

const parseFlags = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        from: { type: 'string' },
        to: { type: 'string' },
        country: { type: 'string', multiple: true },
        product: { type: 'string', multiple: true },
        out: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
};

/**
 * Flags win over environment variables (SALES_REPORT_FILE, SALES_REPORT_OUT),
 * which win over defaults.
 */
export const resolveReportConfig = (argv: string[], env: NodeJS.ProcessEnv): ReportConfig => {
  const { values, positionals } = parseFlags(argv);
  if (positionals.length > 1) {
    throw new ConfigError(`Expected one source file, got ${positionals.length}`);
  }

  return {
    sourcePath: positionals[0] ?? env.SALES_REPORT_FILE ?? DEFAULT_SOURCE_FILE,
    outputPath: values.out ?? env.SALES_REPORT_OUT ?? null,
    from: dateFlag('from', values.from),
    to: dateFlag('to', values.to),
    countries: values.country ?? [],
    products: values.product ?? [],
    help: values.help ?? false,
  };
};

/** Missing date bounds fall back to the dataset's span */
export const buildCriteria = (config: ReportConfig, options: FilterOptions): FilterCriteria => ({
  dateRange: {
    start: config.from ?? options.dateSpan.start,
    end: config.to ?? options.dateSpan.end,
  },
  countries: config.countries,
  products: config.products,
});
