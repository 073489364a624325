/** An ISO calendar date, `YYYY-MM-DD` */
export type DateString = string;

/** A calendar month, `YYYY-MM` */
export type MonthKey = string;

export type YearMonth = {
  year: number;
  month: number; // 1-12
};
