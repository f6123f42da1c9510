import { TypedCommand } from '@/modules/shared/cqrs';
import { ICommandHandler, CommandHandler } from '@nestjs/cqrs';
import { Inject } from '@nestjs/common';
import { PRESENCE_TOKENS } from '@/modules/presence/presence.tokens';
import { SessionLogWriter } from '@/modules/presence/application/services/session-log.writer';
import { IDateProvider } from '@/util/date-provider/date.provider';

export type LogSessionCommandProps = {
  correlationId: string;
  startTime: Date;
  endTime: Date;
};

export type LoggedSegment = {
  logDate: string;
  durationSeconds: number;
};

export type LogSessionResult = {
  segments: LoggedSegment[];
};

export class LogSessionCommand extends TypedCommand<LogSessionResult> {
  constructor(public readonly props: LogSessionCommandProps) {
    super();
  }
}

@CommandHandler(LogSessionCommand)
export class LogSessionCommandHandler
  implements ICommandHandler<LogSessionCommand>
{
  constructor(
    private readonly sessionLogWriter: SessionLogWriter,
    @Inject(PRESENCE_TOKENS.DATE_PROVIDER)
    private readonly dateProvider: IDateProvider,
  ) {}

  async execute(command: LogSessionCommand): Promise<LogSessionResult> {
    const { startTime, endTime } = command.props;

    const segments = await this.sessionLogWriter.logSession(startTime, endTime);

    return {
      segments: segments.map((segment) => ({
        logDate: segment.getLogDate(this.dateProvider),
        durationSeconds: segment.durationSeconds,
      })),
    };
  }
}
