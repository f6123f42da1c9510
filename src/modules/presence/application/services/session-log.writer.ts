import { Inject, Injectable, Logger } from '@nestjs/common';
import { IDateProvider } from '@/util/date-provider/date.provider';
import { IDailyLogRepository } from '../../domain/daily-log/daily-log.repository';
import { SessionSegment } from '../../domain/session-segment/session-segment';
import { PRESENCE_TOKENS } from '../../presence.tokens';

@Injectable()
export class SessionLogWriter {
  private readonly logger = new Logger(SessionLogWriter.name);

  constructor(
    @Inject(PRESENCE_TOKENS.DAILY_LOG_REPOSITORY)
    private readonly logRepository: IDailyLogRepository,
    @Inject(PRESENCE_TOKENS.DATE_PROVIDER)
    private readonly dateProvider: IDateProvider,
  ) {}

  /**
   * Appends one segment line per calendar day covered by the interval.
   * Not idempotent: each call writes. `onSegmentWritten` runs after each
   * append, so a caller can record progress before a later append fails.
   */
  async logSession(
    startTime: Date,
    endTime: Date,
    onSegmentWritten?: (segment: SessionSegment) => void,
  ): Promise<SessionSegment[]> {
    const segments = SessionSegment.splitByDay(
      startTime,
      endTime,
      this.dateProvider,
    );

    for (const segment of segments) {
      const logDate = segment.getLogDate(this.dateProvider);
      await this.logRepository.append(
        logDate,
        segment.toLogLine(this.dateProvider),
      );
      this.logger.debug(
        { logDate, durationSeconds: segment.durationSeconds },
        'Segment logged',
      );
      onSegmentWritten?.(segment);
    }

    return segments;
  }
}
