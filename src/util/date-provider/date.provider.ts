/**
 * Local wall-clock date operations. Every method works in the process
 * timezone; there is no per-call timezone argument.
 */
export interface IDateProvider {
  now(): Date;
  startOfDay(date: Date): Date;
  startOfSecond(date: Date): Date;
  differenceInMilliseconds(dateLeft: Date, dateRight: Date): number;

  /** Calendar day as `yyyy-MM-dd`, used as the log file key. */
  getIsoDateString(date: Date): string;

  // Date manipulation
  addDays(date: Date, amount: number): Date;

  // Date comparison
  isBefore(date: Date, dateToCompare: Date): boolean;
  isValid(date: Date): boolean;

  // Parsing and formatting
  parseISO(dateString: string): Date;
  format(date: Date, formatStr: string): string;
}
