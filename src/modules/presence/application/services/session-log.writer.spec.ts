import { describe, it, expect, beforeEach } from 'vitest';
import { SessionLogWriter } from './session-log.writer';
import { InMemoryDailyLogRepository } from '../../infrastructure/daily-log/in-memory-daily-log.repository';
import { DailySummary } from '../../domain/daily-summary/daily-summary';
import { FakeDateProvider } from '@/util/date-provider/fake-date.provider';

describe('SessionLogWriter', () => {
  let writer: SessionLogWriter;
  let logRepository: InMemoryDailyLogRepository;
  let dateProvider: FakeDateProvider;

  beforeEach(() => {
    dateProvider = new FakeDateProvider();
    logRepository = new InMemoryDailyLogRepository();
    writer = new SessionLogWriter(logRepository, dateProvider);
  });

  it('should append one line to the day of a same-day session', async () => {
    await writer.logSession(
      new Date(2023, 2, 21, 14, 22, 0),
      new Date(2023, 2, 21, 15, 10, 0),
    );

    expect(logRepository.getLogDates()).toEqual(['2023-03-21']);
    expect(logRepository.getLines('2023-03-21')).toEqual([
      'از ۱۴:۲۲:۰۰ تا ۱۵:۱۰:۰۰ — مدت: ۰:۴۸:۰۰',
    ]);
  });

  it('should split a midnight-crossing session into two files', async () => {
    const start = new Date(2023, 2, 21, 23, 59, 50);
    const end = new Date(2023, 2, 22, 0, 0, 5);

    await writer.logSession(start, end);

    expect(logRepository.getLogDates()).toEqual(['2023-03-21', '2023-03-22']);
    const first = logRepository.getLines('2023-03-21');
    const second = logRepository.getLines('2023-03-22');
    expect(first).toHaveLength(1);
    expect(second).toHaveLength(1);
    expect(DailySummary.totalSecondsOf(first)).toBe(10);
    expect(DailySummary.totalSecondsOf(second)).toBe(5);
    expect(
      DailySummary.totalSecondsOf(first) + DailySummary.totalSecondsOf(second),
    ).toBe((end.getTime() - start.getTime()) / 1000);
  });

  it('should write one line per day for a multi-day session', async () => {
    const segments = await writer.logSession(
      new Date(2023, 2, 20, 22, 0, 0),
      new Date(2023, 2, 23, 1, 0, 0),
    );

    expect(segments).toHaveLength(4);
    expect(logRepository.getLogDates()).toEqual([
      '2023-03-20',
      '2023-03-21',
      '2023-03-22',
      '2023-03-23',
    ]);
    expect(logRepository.getLines('2023-03-21')).toEqual([
      'از ۰:۰۰:۰۰ تا ۲۴:۰۰:۰۰ — مدت: ۲۴:۰۰:۰۰',
    ]);
  });

  it('should never write a zero-duration line', async () => {
    const instant = new Date(2023, 2, 21, 10, 0, 0);

    await writer.logSession(instant, instant);
    await writer.logSession(instant, new Date(2023, 2, 21, 9, 0, 0));

    expect(logRepository.getLines('2023-03-21')).toEqual([
      'از ۱۰:۰۰:۰۰ تا ۱۰:۰۰:۰۰ — مدت: ۰:۰۰:۰۱',
      'از ۱۰:۰۰:۰۰ تا ۱۰:۰۰:۰۰ — مدت: ۰:۰۰:۰۱',
    ]);
  });

  it('should double-log when called twice with the same interval', async () => {
    const start = new Date(2023, 2, 21, 9, 0, 0);
    const end = new Date(2023, 2, 21, 9, 30, 0);

    await writer.logSession(start, end);
    await writer.logSession(start, end);

    expect(logRepository.getLines('2023-03-21')).toHaveLength(2);
  });

  it('should report each segment once it is written', async () => {
    const written: string[] = [];

    await writer.logSession(
      new Date(2023, 2, 21, 23, 0, 0),
      new Date(2023, 2, 22, 1, 0, 0),
      (segment) => {
        written.push(segment.endTime.toISOString());
        expect(logRepository.getLines(segment.getLogDate(dateProvider))).toHaveLength(1);
      },
    );

    expect(written).toEqual([
      new Date(2023, 2, 22, 0, 0, 0).toISOString(),
      new Date(2023, 2, 22, 1, 0, 0).toISOString(),
    ]);
  });
});
