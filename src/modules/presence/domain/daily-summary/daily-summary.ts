import { z } from 'zod';
import { persianDateLabel } from '../calendar/jalali-calendar';
import { formatDuration, parseLineDuration } from '../duration/duration';
import { toPersianDigits } from '../calendar/persian-digits';

/** Closes a summary line; its presence on the last line marks a day as summarized. */
export const SUMMARY_MARKER = 'مجموع';

export const DailySummaryPropsSchema = z.object({
  date: z.date(),
  totalSeconds: z.number().int().min(0),
});

export type DailySummaryProps = z.infer<typeof DailySummaryPropsSchema>;

/**
 * DailySummary is the roll-up of every segment recorded in one day's log.
 */
export class DailySummary {
  private readonly _date: Date;
  private readonly _totalSeconds: number;

  private constructor(props: DailySummaryProps) {
    this._date = props.date;
    this._totalSeconds = props.totalSeconds;
  }

  public static create(props: DailySummaryProps): DailySummary {
    return new DailySummary(DailySummaryPropsSchema.parse(props));
  }

  /**
   * Sums the durations of a day's lines. Summary lines and anything else
   * without a readable duration contribute nothing.
   */
  public static fromLogLines(
    date: Date,
    lines: readonly string[],
  ): DailySummary {
    return DailySummary.create({
      date,
      totalSeconds: DailySummary.totalSecondsOf(lines),
    });
  }

  public static totalSecondsOf(lines: readonly string[]): number {
    return lines.reduce(
      (total, line) => total + (parseLineDuration(line) ?? 0),
      0,
    );
  }

  /**
   * True when the last non-empty line is already a summary line.
   */
  public static isSummarized(lines: readonly string[]): boolean {
    for (let i = lines.length - 1; i >= 0; i--) {
      const line = lines[i].trim();
      if (line.length > 0) {
        return line.includes(SUMMARY_MARKER);
      }
    }
    return false;
  }

  /** `سه‌شنبه ۱ فروردین — ۰:۰۰:۱۰ مجموع` */
  public toLogLine(): string {
    const total = toPersianDigits(formatDuration(this._totalSeconds));
    return `${persianDateLabel(this._date)} — ${total} ${SUMMARY_MARKER}`;
  }

  // Getters
  public get date(): Date {
    return this._date;
  }

  public get totalSeconds(): number {
    return this._totalSeconds;
  }
}
