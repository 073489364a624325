import { parse as parseSync } from 'csv-parse/sync';
import { writeToString } from 'fast-csv';
import { CalendarDay } from '../../data/calendar/calendarDay';
import { recordSpend } from '../calendar/dayEdits';
import { ValidationError } from '../errors/errors';

export type ExpenseImport = {
  days: CalendarDay[];
  imported: number;
};

type ExportRow = {
  date: string;
  type: string;
  category: string;
  planned: number | string;
  actual: number | string;
  status: string;
};

function readField(row: unknown, field: string, line: number): string {
  const value: unknown = typeof row === 'object' && row !== null ? Reflect.get(row, field) : undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`Line ${line}: missing ${field}`);
  }
  return value;
}

/**
 * Adds `date,category,amount` rows to the matching days as actual spend.
 * Every row must land on a day of the given month.
 *
 * @param csv - CSV text with a header row
 * @param days - The stored days of one month; updated in place
 */
export function importExpensesCsv(csv: string, days: CalendarDay[]): ExpenseImport {
  const rows: unknown = parseSync(csv, { columns: true, skip_empty_lines: true, trim: true });
  if (!Array.isArray(rows)) {
    throw new ValidationError('Expenses CSV could not be read');
  }
  const byDate = new Map(days.map((day) => [day.date, day]));

  rows.forEach((row: unknown, idx: number) => {
    const line = idx + 2; // header is line 1
    const date = readField(row, 'date', line);
    const category = readField(row, 'category', line);
    const amountText = readField(row, 'amount', line);
    const amount = Number(amountText);
    if (amountText === '' || isNaN(amount)) {
      throw new ValidationError(`Line ${line}: amount '${amountText}' is not a number`);
    }
    if (category === '') {
      throw new ValidationError(`Line ${line}: category is required`);
    }
    const day = byDate.get(date);
    if (!day) {
      throw new ValidationError(`Line ${line}: ${date} is not a day of this calendar`);
    }
    recordSpend(day, category, amount);
  });

  return { days, imported: rows.length };
}

/**
 * One row per category per day; days with no categories still get a row
 */
export async function exportCalendarCsv(days: CalendarDay[]): Promise<string> {
  const rows: ExportRow[] = [];
  for (const day of days) {
    const categories = [...new Set([...Object.keys(day.plannedBudget), ...Object.keys(day.actualSpent)])];
    if (categories.length === 0) {
      rows.push({ date: day.date, type: day.type, category: '', planned: '', actual: '', status: '' });
      continue;
    }
    for (const category of categories) {
      rows.push({
        date: day.date,
        type: day.type,
        category,
        planned: day.plannedBudget[category] ?? '',
        actual: day.actualSpent[category] ?? '',
        status: day.status[category] ?? '',
      });
    }
  }
  return writeToString(rows, { headers: ['date', 'type', 'category', 'planned', 'actual', 'status'] });
}
