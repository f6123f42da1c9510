/**
 * Append-only store of one text log per local calendar day, keyed by
 * `YYYY-MM-DD`.
 */
export interface IDailyLogRepository {
  /**
   * Appends one line (a trailing newline is added). Creates the log, and
   * its directory, when absent.
   */
  append(logDate: string, line: string): Promise<void>;

  /**
   * All lines of the day's log, without line terminators, or null when no
   * log exists for that day.
   */
  readLines(logDate: string): Promise<string[] | null>;
}
