import { TypedCommand } from '@/modules/shared/cqrs';
import { ICommandHandler, CommandHandler } from '@nestjs/cqrs';
import { Inject, Logger } from '@nestjs/common';
import { PRESENCE_TOKENS } from '@/modules/presence/presence.tokens';
import { SessionLogWriter } from '@/modules/presence/application/services/session-log.writer';
import { ActiveSessionRegistry } from '@/modules/presence/infrastructure/active-session/active-session.registry';
import { ActiveSessionSnapshot } from '@/modules/presence/domain/active-session/active-session';
import { IDateProvider } from '@/util/date-provider/date.provider';

export type ToggleTarget = 'on' | 'off';

export type ToggleSessionCommandProps = {
  correlationId: string;
  /** Omitted: flip the current state. */
  state?: ToggleTarget;
};

export class ToggleSessionCommand extends TypedCommand<ActiveSessionSnapshot> {
  constructor(public readonly props: ToggleSessionCommandProps) {
    super();
  }
}

@CommandHandler(ToggleSessionCommand)
export class ToggleSessionCommandHandler
  implements ICommandHandler<ToggleSessionCommand>
{
  private readonly logger = new Logger(ToggleSessionCommandHandler.name);

  constructor(
    private readonly sessionRegistry: ActiveSessionRegistry,
    private readonly sessionLogWriter: SessionLogWriter,
    @Inject(PRESENCE_TOKENS.DATE_PROVIDER)
    private readonly dateProvider: IDateProvider,
  ) {}

  async execute(command: ToggleSessionCommand): Promise<ActiveSessionSnapshot> {
    const { correlationId, state } = command.props;

    // check, flip and log are one critical section
    return this.sessionRegistry.runExclusive(async (session) => {
      const now = this.dateProvider.now();
      const target = state ?? (session.isActive ? 'off' : 'on');

      if (target === 'on') {
        if (session.open(now)) {
          this.logger.log({ correlationId }, 'Session started');
        }
        return session.snapshot();
      }

      const startedAt = session.startedAt;
      if (startedAt) {
        // close only once the interval is on disk; a failed append leaves
        // the session open from the first day not yet written
        await this.sessionLogWriter.logSession(startedAt, now, (segment) =>
          session.advanceTo(segment.endTime),
        );
        session.close();
        this.logger.log({ correlationId }, 'Session stopped');
      }
      return session.snapshot();
    });
  }
}
