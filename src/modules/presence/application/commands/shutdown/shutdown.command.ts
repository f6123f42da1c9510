import { TypedCommand } from '@/modules/shared/cqrs';
import { ICommandHandler, CommandHandler } from '@nestjs/cqrs';
import { Inject, Logger } from '@nestjs/common';
import { PRESENCE_TOKENS } from '@/modules/presence/presence.tokens';
import { SessionLogWriter } from '@/modules/presence/application/services/session-log.writer';
import {
  DailySummaryEngine,
  SummarizeDayOutcome,
} from '@/modules/presence/application/services/daily-summary.engine';
import { ActiveSessionRegistry } from '@/modules/presence/infrastructure/active-session/active-session.registry';
import { IDateProvider } from '@/util/date-provider/date.provider';

export type ShutdownCommandProps = {
  correlationId: string;
};

export type ShutdownResult = {
  loggedOpenSession: boolean;
  summary: SummarizeDayOutcome;
};

export class ShutdownCommand extends TypedCommand<ShutdownResult> {
  constructor(public readonly props: ShutdownCommandProps) {
    super();
  }
}

/**
 * Orderly end of a run: logs the open interval up to now, then writes
 * today's summary. Repeating it only re-checks the summary.
 */
@CommandHandler(ShutdownCommand)
export class ShutdownCommandHandler
  implements ICommandHandler<ShutdownCommand>
{
  private readonly logger = new Logger(ShutdownCommandHandler.name);

  constructor(
    private readonly sessionRegistry: ActiveSessionRegistry,
    private readonly sessionLogWriter: SessionLogWriter,
    private readonly summaryEngine: DailySummaryEngine,
    @Inject(PRESENCE_TOKENS.DATE_PROVIDER)
    private readonly dateProvider: IDateProvider,
  ) {}

  async execute(command: ShutdownCommand): Promise<ShutdownResult> {
    const { correlationId } = command.props;

    const loggedOpenSession = await this.sessionRegistry.runExclusive(
      async (session) => {
        const startedAt = session.startedAt;
        if (!startedAt) return false;

        await this.sessionLogWriter.logSession(
          startedAt,
          this.dateProvider.now(),
          (segment) => session.advanceTo(segment.endTime),
        );
        session.close();
        return true;
      },
    );

    const today = this.dateProvider.getIsoDateString(this.dateProvider.now());
    const summary = await this.summaryEngine.summarizeDay(today);

    this.logger.log(
      { correlationId, loggedOpenSession, summary: summary.status },
      'Shutdown bookkeeping done',
    );

    return { loggedOpenSession, summary };
  }
}
