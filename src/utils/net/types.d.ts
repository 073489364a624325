import { DateString, YearMonth } from '../date/types';

export type CalendarRequestData = YearMonth & {
  userId: string;
};

export type DayRequestData = CalendarRequestData & {
  day: number;
  date: DateString;
};
