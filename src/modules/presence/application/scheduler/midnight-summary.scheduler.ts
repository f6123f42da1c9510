import {
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { IDateProvider } from '@/util/date-provider/date.provider';
import { DailySummaryEngine } from '../services/daily-summary.engine';
import { SessionLogWriter } from '../services/session-log.writer';
import { ActiveSessionRegistry } from '../../infrastructure/active-session/active-session.registry';

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Writes the summary of each day once that day has ended. Sleeps until the
 * next local midnight, summarizes the day that was current when it went to
 * sleep, and repeats until its cancellation token is aborted. A session
 * still open at midnight has its part before midnight logged first and
 * carries on from midnight, so the summary stays the last line of the day.
 *
 * A failed summary is logged and not retried; the day's segments stay in
 * its log and can be summarized later on demand.
 */
export class MidnightSummaryScheduler
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(MidnightSummaryScheduler.name);
  private loop: Promise<void> | null = null;

  constructor(
    private readonly summaryEngine: DailySummaryEngine,
    private readonly sessionRegistry: ActiveSessionRegistry,
    private readonly sessionLogWriter: SessionLogWriter,
    private readonly dateProvider: IDateProvider,
    private readonly cancellation: AbortController,
  ) {}

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop || this.cancellation.signal.aborted) return;
    this.loop = this.run().finally(() => {
      this.loop = null;
    });
  }

  /**
   * Interrupts the current sleep and resolves once the loop has exited.
   * The scheduler cannot be restarted afterwards.
   */
  async stop(): Promise<void> {
    this.cancellation.abort();
    await this.loop;
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  private async run(): Promise<void> {
    const { signal } = this.cancellation;

    while (!signal.aborted) {
      const now = this.dateProvider.now();
      const endingDay = this.dateProvider.startOfDay(now);
      const nextMidnight = this.dateProvider.addDays(endingDay, 1);
      const waitMs = this.dateProvider.differenceInMilliseconds(
        nextMidnight,
        now,
      );
      const logDate = this.dateProvider.getIsoDateString(endingDay);

      this.logger.debug({ logDate, waitMs }, 'Waiting for midnight');
      if (!(await sleep(waitMs, signal))) {
        break;
      }

      try {
        await this.closeDay(logDate, nextMidnight);
      } catch (error) {
        this.logger.error({ err: error, logDate }, 'Midnight summary failed');
      }
    }
  }

  private closeDay(logDate: string, midnight: Date): Promise<void> {
    return this.sessionRegistry.runExclusive(async (session) => {
      const startedAt = session.startedAt;
      if (startedAt && this.dateProvider.isBefore(startedAt, midnight)) {
        await this.sessionLogWriter.logSession(startedAt, midnight, (segment) =>
          session.advanceTo(segment.endTime),
        );
        this.logger.debug({ logDate }, 'Open session carried over midnight');
      }

      await this.summaryEngine.summarizeDay(logDate);
    });
  }
}
