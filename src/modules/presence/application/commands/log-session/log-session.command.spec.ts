import { describe, it, expect, beforeEach } from 'vitest';
import {
  LogSessionCommand,
  LogSessionCommandHandler,
} from './log-session.command';
import { SessionLogWriter } from '@/modules/presence/application/services/session-log.writer';
import { InMemoryDailyLogRepository } from '@/modules/presence/infrastructure/daily-log/in-memory-daily-log.repository';
import { FakeDateProvider } from '@/util/date-provider/fake-date.provider';

describe('LogSessionCommand Handler', () => {
  let handler: LogSessionCommandHandler;
  let logRepository: InMemoryDailyLogRepository;

  beforeEach(() => {
    const dateProvider = new FakeDateProvider();
    logRepository = new InMemoryDailyLogRepository();
    handler = new LogSessionCommandHandler(
      new SessionLogWriter(logRepository, dateProvider),
      dateProvider,
    );
  });

  it('should report the segments it wrote', async () => {
    const result = await handler.execute(
      new LogSessionCommand({
        correlationId: 'corr-1',
        startTime: new Date(2023, 2, 21, 23, 59, 50),
        endTime: new Date(2023, 2, 22, 0, 0, 5),
      }),
    );

    expect(result).toEqual({
      segments: [
        { logDate: '2023-03-21', durationSeconds: 10 },
        { logDate: '2023-03-22', durationSeconds: 5 },
      ],
    });
    expect(logRepository.getLogDates()).toEqual(['2023-03-21', '2023-03-22']);
  });
});
