import { TypedCommand } from '@/modules/shared/cqrs';
import { ICommandHandler, CommandHandler } from '@nestjs/cqrs';
import {
  DailySummaryEngine,
  SummarizeDayOutcome,
} from '@/modules/presence/application/services/daily-summary.engine';

export type SummarizeDayCommandProps = {
  correlationId: string;
  logDate: string;
};

export class SummarizeDayCommand extends TypedCommand<SummarizeDayOutcome> {
  constructor(public readonly props: SummarizeDayCommandProps) {
    super();
  }
}

@CommandHandler(SummarizeDayCommand)
export class SummarizeDayCommandHandler
  implements ICommandHandler<SummarizeDayCommand>
{
  constructor(private readonly summaryEngine: DailySummaryEngine) {}

  async execute(command: SummarizeDayCommand): Promise<SummarizeDayOutcome> {
    return this.summaryEngine.summarizeDay(command.props.logDate);
  }
}
