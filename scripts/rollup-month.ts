#!/usr/bin/env node

/**
 * Monthly rollup: logs progress records for every stored calendar of a month.
 *
 * Usage: node dist/scripts/rollup-month.js <year> <month> <incomes.json>
 *
 * incomes.json maps user ids to `{ "income": 4200, "region": "US-CA" }`.
 * Uses the JSON-file stores under DATA_DIR.
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { rollupMonth, RollupIncome } from '../src/utils/batch/rollup';
import { loadConfig } from '../src/utils/config/config';
import { createServices } from '../src/utils/context/services';
import { validateYearMonth } from '../src/utils/date/date';
import { err, log } from '../src/utils/logger';

function main() {
  const [yearArg, monthArg, incomesPath] = process.argv.slice(2);
  if (!yearArg || !monthArg || !incomesPath) {
    err('Usage: rollup-month <year> <month> <incomes.json>');
    process.exit(1);
  }
  const year = parseInt(yearArg, 10);
  const month = parseInt(monthArg, 10);
  validateYearMonth(year, month);

  const incomes: Record<string, RollupIncome> = JSON.parse(readFileSync(incomesPath, 'utf8'));
  const services = createServices({ ...loadConfig(), store: 'file' });
  const result = rollupMonth(services, year, month, incomes);
  log('Done', { logged: result.logged.length, skipped: result.skipped.length });
}

try {
  main();
} catch (error) {
  err('Rollup failed', { error });
  process.exit(1);
}
