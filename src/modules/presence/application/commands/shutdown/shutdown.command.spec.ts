import { describe, it, expect, beforeEach } from 'vitest';
import { ShutdownCommand, ShutdownCommandHandler } from './shutdown.command';
import { SessionLogWriter } from '@/modules/presence/application/services/session-log.writer';
import { DailySummaryEngine } from '@/modules/presence/application/services/daily-summary.engine';
import { ActiveSessionRegistry } from '@/modules/presence/infrastructure/active-session/active-session.registry';
import { InMemoryDailyLogRepository } from '@/modules/presence/infrastructure/daily-log/in-memory-daily-log.repository';
import { DailyLogWriteError } from '@/modules/presence/domain/daily-log/daily-log.errors';
import { FakeDateProvider } from '@/util/date-provider/fake-date.provider';

class FailSecondAppendRepository extends InMemoryDailyLogRepository {
  private appends = 0;

  override async append(logDate: string, line: string): Promise<void> {
    this.appends++;
    if (this.appends === 2) {
      throw new DailyLogWriteError(logDate, new Error('disk full'));
    }
    await super.append(logDate, line);
  }
}

describe('ShutdownCommand Handler', () => {
  let handler: ShutdownCommandHandler;
  let registry: ActiveSessionRegistry;
  let logRepository: InMemoryDailyLogRepository;
  let dateProvider: FakeDateProvider;

  const command = new ShutdownCommand({ correlationId: 'corr-1' });

  beforeEach(() => {
    dateProvider = new FakeDateProvider();
    dateProvider.setNow(new Date(2023, 2, 21, 18, 0, 0));
    logRepository = new InMemoryDailyLogRepository();
    registry = new ActiveSessionRegistry();
    handler = new ShutdownCommandHandler(
      registry,
      new SessionLogWriter(logRepository, dateProvider),
      new DailySummaryEngine(logRepository, dateProvider),
      dateProvider,
    );
  });

  it('should log the open session up to now, then summarize today', async () => {
    await registry.runExclusive((session) =>
      session.open(new Date(2023, 2, 21, 17, 30, 0)),
    );

    const result = await handler.execute(command);

    expect(result.loggedOpenSession).toBe(true);
    expect(result.summary.status).toBe('written');
    expect(logRepository.getLines('2023-03-21')).toEqual([
      'از ۱۷:۳۰:۰۰ تا ۱۸:۰۰:۰۰ — مدت: ۰:۳۰:۰۰',
      'سه‌شنبه ۱ فروردین — ۰:۳۰:۰۰ مجموع',
    ]);
    const snapshot = await registry.runExclusive((session) => session.snapshot());
    expect(snapshot.active).toBe(false);
  });

  it('should only summarize when no session is open', async () => {
    logRepository.seed('2023-03-21', ['از ۹:۰۰:۰۰ تا ۹:۰۱:۰۰ — مدت: ۰:۰۱:۰۰']);

    const result = await handler.execute(command);

    expect(result.loggedOpenSession).toBe(false);
    expect(logRepository.getLines('2023-03-21')).toHaveLength(2);
  });

  it('should be safe to run twice', async () => {
    await registry.runExclusive((session) =>
      session.open(new Date(2023, 2, 21, 17, 30, 0)),
    );

    await handler.execute(command);
    const second = await handler.execute(command);

    expect(second).toEqual({
      loggedOpenSession: false,
      summary: {
        status: 'already-summarized',
        logDate: '2023-03-21',
        totalSeconds: 1800,
      },
    });
    expect(logRepository.getLines('2023-03-21')).toHaveLength(2);
  });

  it('should leave a day with no activity untouched', async () => {
    const result = await handler.execute(command);

    expect(result.summary).toEqual({ status: 'missing', logDate: '2023-03-21' });
    expect(logRepository.getLogDates()).toEqual([]);
  });

  it('should summarize the end day of a session that crossed midnight', async () => {
    await registry.runExclusive((session) =>
      session.open(new Date(2023, 2, 20, 23, 0, 0)),
    );
    dateProvider.setNow(new Date(2023, 2, 21, 0, 30, 0));

    await handler.execute(command);

    expect(logRepository.getLines('2023-03-20')).toEqual([
      'از ۲۳:۰۰:۰۰ تا ۲۴:۰۰:۰۰ — مدت: ۱:۰۰:۰۰',
    ]);
    expect(logRepository.getLines('2023-03-21')).toEqual([
      'از ۰:۰۰:۰۰ تا ۰:۳۰:۰۰ — مدت: ۰:۳۰:۰۰',
      'سه‌شنبه ۱ فروردین — ۰:۳۰:۰۰ مجموع',
    ]);
  });

  it('should not rewrite days already logged when retried after a failed append', async () => {
    const failing = new FailSecondAppendRepository();
    handler = new ShutdownCommandHandler(
      registry,
      new SessionLogWriter(failing, dateProvider),
      new DailySummaryEngine(failing, dateProvider),
      dateProvider,
    );
    await registry.runExclusive((session) =>
      session.open(new Date(2023, 2, 20, 23, 0, 0)),
    );
    dateProvider.setNow(new Date(2023, 2, 21, 0, 30, 0));

    await expect(handler.execute(command)).rejects.toBeInstanceOf(
      DailyLogWriteError,
    );
    const result = await handler.execute(command);

    expect(result.loggedOpenSession).toBe(true);
    expect(failing.getLines('2023-03-20')).toEqual([
      'از ۲۳:۰۰:۰۰ تا ۲۴:۰۰:۰۰ — مدت: ۱:۰۰:۰۰',
    ]);
    expect(failing.getLines('2023-03-21')).toEqual([
      'از ۰:۰۰:۰۰ تا ۰:۳۰:۰۰ — مدت: ۰:۳۰:۰۰',
      'سه‌شنبه ۱ فروردین — ۰:۳۰:۰۰ مجموع',
    ]);
  });
});
