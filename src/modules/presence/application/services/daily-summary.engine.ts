import { Inject, Injectable, Logger } from '@nestjs/common';
import { IDateProvider } from '@/util/date-provider/date.provider';
import { IDailyLogRepository } from '../../domain/daily-log/daily-log.repository';
import { InvalidLogDateError } from '../../domain/daily-log/daily-log.errors';
import { DailySummary } from '../../domain/daily-summary/daily-summary';
import { PRESENCE_TOKENS } from '../../presence.tokens';

const LOG_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type SummarizeDayOutcome =
  | { status: 'missing'; logDate: string }
  | { status: 'already-summarized'; logDate: string; totalSeconds: number }
  | { status: 'written'; logDate: string; totalSeconds: number; line: string };

@Injectable()
export class DailySummaryEngine {
  private readonly logger = new Logger(DailySummaryEngine.name);

  constructor(
    @Inject(PRESENCE_TOKENS.DAILY_LOG_REPOSITORY)
    private readonly logRepository: IDailyLogRepository,
    @Inject(PRESENCE_TOKENS.DATE_PROVIDER)
    private readonly dateProvider: IDateProvider,
  ) {}

  /**
   * Appends the day's summary line unless the log is missing or its last
   * non-empty line is already a summary. Safe to call repeatedly.
   */
  async summarizeDay(logDate: string): Promise<SummarizeDayOutcome> {
    const date = this.parseLogDate(logDate);
    const lines = await this.logRepository.readLines(logDate);

    if (lines === null) {
      this.logger.debug({ logDate }, 'No log for day, nothing to summarize');
      return { status: 'missing', logDate };
    }

    const summary = DailySummary.fromLogLines(date, lines);

    if (DailySummary.isSummarized(lines)) {
      this.logger.debug({ logDate }, 'Day already summarized');
      return {
        status: 'already-summarized',
        logDate,
        totalSeconds: summary.totalSeconds,
      };
    }

    const line = summary.toLogLine();
    await this.logRepository.append(logDate, line);
    this.logger.log(
      { logDate, totalSeconds: summary.totalSeconds },
      'Daily summary written',
    );

    return {
      status: 'written',
      logDate,
      totalSeconds: summary.totalSeconds,
      line,
    };
  }

  /**
   * Sum of the day's segment durations; zero when there is no log.
   */
  async getTotalSeconds(logDate: string): Promise<number> {
    this.parseLogDate(logDate);
    const lines = await this.logRepository.readLines(logDate);
    return lines === null ? 0 : DailySummary.totalSecondsOf(lines);
  }

  async isSummarized(logDate: string): Promise<boolean> {
    this.parseLogDate(logDate);
    const lines = await this.logRepository.readLines(logDate);
    return lines !== null && DailySummary.isSummarized(lines);
  }

  private parseLogDate(logDate: string): Date {
    const date = this.dateProvider.parseISO(logDate);
    if (!LOG_DATE_PATTERN.test(logDate) || !this.dateProvider.isValid(date)) {
      throw new InvalidLogDateError(logDate);
    }
    return date;
  }
}
