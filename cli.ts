#!/usr/bin/env node

import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigError, buildCriteria, resolveReportConfig } from './services/config';
import { DatasetCache } from './services/datasetCache';
import { exportCsv } from './services/export';
import { fileSource } from './services/fileSource';
import { getFilterOptions } from './services/filters';
import { render } from './services/render';
import { formatReport } from './services/report';

const USAGE = `
sales-report - summarize a sales workbook

Usage:
  sales-report [file] [options]

Arguments:
  file                  Workbook to load (default: $SALES_REPORT_FILE or data.xlsx)

Options:
  --from <date>         First day of the reporting period (default: earliest sale)
  --to <date>           Last day of the reporting period (default: latest sale)
  --country <name>      Keep only this country (repeatable)
  --product <name>      Keep only this product (repeatable)
  --out <path>          Write the filtered rows as CSV (default: $SALES_REPORT_OUT)
  -h, --help            Show this help
`;

async function main() {
  const config = resolveReportConfig(process.argv.slice(2), process.env);
  if (config.help) {
    console.log(USAGE);
    return;
  }

  const cache = new DatasetCache();
  const dataset = await cache.load(fileSource(config.sourcePath));
  const view = render(dataset, buildCriteria(config, getFilterOptions(dataset)));

  console.log(formatReport(dataset, view).join('\n'));

  if (config.outputPath !== null) {
    const outputPath = resolve(config.outputPath);
    await writeFile(outputPath, exportCsv(view.records, dataset.columns), 'utf8');
    console.log(`\n✅ Exported ${view.records.length} rows to ${outputPath}`);
  }
}

main().catch(error => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
    console.error(USAGE);
  } else {
    console.error('❌ Report failed:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
