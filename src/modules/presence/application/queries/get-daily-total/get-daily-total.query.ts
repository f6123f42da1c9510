import { TypedQuery } from '@/modules/shared/cqrs';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { Inject } from '@nestjs/common';
import { PRESENCE_TOKENS } from '@/modules/presence/presence.tokens';
import { DailySummaryEngine } from '@/modules/presence/application/services/daily-summary.engine';
import { formatDuration } from '@/modules/presence/domain/duration/duration';
import { IDateProvider } from '@/util/date-provider/date.provider';

export type GetDailyTotalQueryProps = {
  correlationId: string;
  /** YYYY-MM-DD; defaults to today. */
  logDate?: string;
};

export type DailyTotalResult = {
  logDate: string;
  totalSeconds: number;
  formatted: string;
  summarized: boolean;
};

export class GetDailyTotalQuery extends TypedQuery<DailyTotalResult> {
  constructor(public readonly props: GetDailyTotalQueryProps) {
    super();
  }
}

@QueryHandler(GetDailyTotalQuery)
export class GetDailyTotalQueryHandler
  implements IQueryHandler<GetDailyTotalQuery>
{
  constructor(
    private readonly summaryEngine: DailySummaryEngine,
    @Inject(PRESENCE_TOKENS.DATE_PROVIDER)
    private readonly dateProvider: IDateProvider,
  ) {}

  async execute(query: GetDailyTotalQuery): Promise<DailyTotalResult> {
    const logDate =
      query.props.logDate ??
      this.dateProvider.getIsoDateString(this.dateProvider.now());

    const totalSeconds = await this.summaryEngine.getTotalSeconds(logDate);
    const summarized = await this.summaryEngine.isSummarized(logDate);

    return {
      logDate,
      totalSeconds,
      formatted: formatDuration(totalSeconds),
      summarized,
    };
  }
}
