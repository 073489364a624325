import { CalendarDay } from '../../data/calendar/calendarDay';
import { normalizeDay } from '../calendar/normalize';
import { monthKey } from '../date/date';
import { DateString } from '../date/types';
import { NotFoundError } from '../errors/errors';
import { KeyValueStore } from './store';

/**
 * Calendar days per user and month.
 *
 * Entries may hold days written before the field renames (`planned`,
 * `actual`, `day_type`); they are normalized on read and rewritten in the
 * canonical shape on the next save.
 */
export class CalendarStore {
  constructor(private readonly store: KeyValueStore<unknown[]>) {}

  static key(userId: string, year: number, month: number): string {
    return `${userId}:${monthKey(year, month)}`;
  }

  save(userId: string, year: number, month: number, days: CalendarDay[]): void {
    const sorted = [...days].sort((a, b) => a.date.localeCompare(b.date));
    this.store.set(
      CalendarStore.key(userId, year, month),
      sorted.map((day) => day.serialize()),
    );
  }

  get(userId: string, year: number, month: number): CalendarDay[] | null {
    const raw = this.store.get(CalendarStore.key(userId, year, month));
    if (raw === undefined) {
      return null;
    }
    return raw.map((day) => normalizeDay(day));
  }

  /**
   * Applies a change to one stored day and saves the month
   * @returns The updated day
   * @throws NotFoundError if the month or the day is not stored
   */
  updateDay(
    userId: string,
    year: number,
    month: number,
    date: DateString,
    update: (day: CalendarDay) => void,
  ): CalendarDay {
    const days = this.get(userId, year, month);
    if (!days) {
      throw new NotFoundError(`No calendar stored for ${monthKey(year, month)}`);
    }
    const day = days.find((d) => d.date === date);
    if (!day) {
      throw new NotFoundError(`Day ${date} not found`);
    }
    update(day);
    this.save(userId, year, month, days);
    return day;
  }

  clear(userId: string, year: number, month: number): boolean {
    return this.store.delete(CalendarStore.key(userId, year, month));
  }

  /**
   * Users with a stored calendar for the month
   */
  listUsers(year: number, month: number): string[] {
    const suffix = `:${monthKey(year, month)}`;
    return this.store
      .keys()
      .filter((key) => key.endsWith(suffix))
      .map((key) => key.slice(0, -suffix.length));
  }
}
