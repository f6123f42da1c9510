import { z } from 'zod';
import { IDateProvider } from '@/util/date-provider/date.provider';
import { toPersianDigits } from '../calendar/persian-digits';
import { DURATION_MARKER, formatDuration } from '../duration/duration';
import { InvalidSessionSegmentError } from './session-segment.errors';

export const SessionSegmentPropsSchema = z.object({
  startTime: z.date(),
  endTime: z.date(),
  durationSeconds: z.number().int().positive(),
});

export type SessionSegmentProps = z.infer<typeof SessionSegmentPropsSchema>;

const MIN_DURATION_SECONDS = 1;
const CLOCK_FORMAT = 'H:mm:ss';
const END_OF_DAY_CLOCK = '24:00:00';

/**
 * SessionSegment is the part of an active interval that falls on a single
 * local calendar day. It maps one-to-one to a segment line in that day's log.
 */
export class SessionSegment {
  private readonly _startTime: Date;
  private readonly _endTime: Date;
  private readonly _durationSeconds: number;

  private constructor(props: SessionSegmentProps) {
    this._startTime = props.startTime;
    this._endTime = props.endTime;
    this._durationSeconds = props.durationSeconds;
  }

  public static create(props: SessionSegmentProps): SessionSegment {
    const validated = SessionSegmentPropsSchema.parse(props);

    if (validated.endTime < validated.startTime) {
      throw new InvalidSessionSegmentError('end time is before start time');
    }

    return new SessionSegment(validated);
  }

  /**
   * Builds a segment from two timestamps on the same day. Duration is the
   * whole seconds between them, never less than one.
   */
  public static createNew(
    startTime: Date,
    endTime: Date,
    dateProvider: IDateProvider,
  ): SessionSegment {
    const elapsedMs = dateProvider.differenceInMilliseconds(endTime, startTime);

    return SessionSegment.create({
      startTime,
      endTime,
      durationSeconds: Math.max(
        MIN_DURATION_SECONDS,
        Math.floor(elapsedMs / 1000),
      ),
    });
  }

  /**
   * Splits [startTime, endTime] at every local midnight strictly after the
   * start. A range crossing N midnights yields N + 1 segments. Both ends are
   * truncated to whole seconds first so each line's clock times add up to
   * its duration. An end before the start is treated as a zero-length range.
   *
   * Example: 23:59:50 → 00:00:05 the next day becomes
   * - 23:59:50 - 24:00:00 (10 s, day 1)
   * - 00:00:00 - 00:00:05 (5 s, day 2)
   */
  public static splitByDay(
    startTime: Date,
    endTime: Date,
    dateProvider: IDateProvider,
  ): SessionSegment[] {
    const start = dateProvider.startOfSecond(startTime);
    const truncatedEnd = dateProvider.startOfSecond(endTime);
    const end = dateProvider.isBefore(truncatedEnd, start) ? start : truncatedEnd;

    const segments: SessionSegment[] = [];
    let cursor = start;

    for (;;) {
      const nextMidnight = dateProvider.addDays(
        dateProvider.startOfDay(cursor),
        1,
      );
      const segmentEnd = dateProvider.isBefore(end, nextMidnight)
        ? end
        : nextMidnight;

      segments.push(SessionSegment.createNew(cursor, segmentEnd, dateProvider));

      if (!dateProvider.isBefore(segmentEnd, end)) {
        break;
      }
      cursor = segmentEnd;
    }

    return segments;
  }

  /**
   * The local calendar day (YYYY-MM-DD) this segment is logged under.
   */
  public getLogDate(dateProvider: IDateProvider): string {
    return dateProvider.getIsoDateString(this._startTime);
  }

  /**
   * `از ۲۳:۵۹:۵۰ تا ۲۴:۰۰:۰۰ — مدت: ۰:۰۰:۱۰`. A segment closed by the
   * following midnight prints its end as 24:00:00 so both clock times
   * belong to the file's day.
   */
  public toLogLine(dateProvider: IDateProvider): string {
    const start = dateProvider.format(this._startTime, CLOCK_FORMAT);
    const end = this.endsAtMidnight(dateProvider)
      ? END_OF_DAY_CLOCK
      : dateProvider.format(this._endTime, CLOCK_FORMAT);
    const duration = formatDuration(this._durationSeconds);

    return toPersianDigits(
      `از ${start} تا ${end} — ${DURATION_MARKER} ${duration}`,
    );
  }

  private endsAtMidnight(dateProvider: IDateProvider): boolean {
    const nextMidnight = dateProvider.addDays(
      dateProvider.startOfDay(this._startTime),
      1,
    );
    return this._endTime.getTime() === nextMidnight.getTime();
  }

  // Getters
  public get startTime(): Date {
    return this._startTime;
  }

  public get endTime(): Date {
    return this._endTime;
  }

  public get durationSeconds(): number {
    return this._durationSeconds;
  }
}
