import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvVars } from '@/config';
import { PRESENCE_TOKENS } from './presence.tokens';

// Controllers
import { PresenceController } from './presentation/controllers/presence.controller';

// Command Handlers
import { LogSessionCommandHandler } from './application/commands/log-session/log-session.command';
import { SummarizeDayCommandHandler } from './application/commands/summarize-day/summarize-day.command';
import { ToggleSessionCommandHandler } from './application/commands/toggle-session/toggle-session.command';
import { ShutdownCommandHandler } from './application/commands/shutdown/shutdown.command';

// Query Handlers
import { GetSessionStateQueryHandler } from './application/queries/get-session-state/get-session-state.query';
import { GetDailyTotalQueryHandler } from './application/queries/get-daily-total/get-daily-total.query';

// Services
import { SessionLogWriter } from './application/services/session-log.writer';
import { DailySummaryEngine } from './application/services/daily-summary.engine';
import { MidnightSummaryScheduler } from './application/scheduler/midnight-summary.scheduler';
import { PresenceLifecycle } from './application/lifecycle/presence-lifecycle';
import { ShutdownService } from './application/lifecycle/shutdown.service';

// Infrastructure
import { FsDailyLogRepository } from './infrastructure/daily-log/fs-daily-log.repository';
import { ActiveSessionRegistry } from './infrastructure/active-session/active-session.registry';

// Date Provider
import { OsDateProvider } from '@/util/date-provider/os-date.provider';
import { IDateProvider } from '@/util/date-provider/date.provider';

const commandHandlers = [
  LogSessionCommandHandler,
  SummarizeDayCommandHandler,
  ToggleSessionCommandHandler,
  ShutdownCommandHandler,
];
const queryHandlers = [GetSessionStateQueryHandler, GetDailyTotalQueryHandler];

@Module({
  controllers: [PresenceController],
  providers: [
    ...commandHandlers,
    ...queryHandlers,
    SessionLogWriter,
    DailySummaryEngine,
    ActiveSessionRegistry,
    PresenceLifecycle,
    ShutdownService,
    {
      provide: PRESENCE_TOKENS.LOG_DIRECTORY,
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvVars, true>): string =>
        config.get('APP_LOG_DIR', { infer: true }),
    },
    {
      provide: PRESENCE_TOKENS.DAILY_LOG_REPOSITORY,
      useClass: FsDailyLogRepository,
    },
    {
      provide: PRESENCE_TOKENS.DATE_PROVIDER,
      useClass: OsDateProvider,
    },
    {
      provide: MidnightSummaryScheduler,
      inject: [
        DailySummaryEngine,
        ActiveSessionRegistry,
        SessionLogWriter,
        PRESENCE_TOKENS.DATE_PROVIDER,
      ],
      useFactory: (
        summaryEngine: DailySummaryEngine,
        sessionRegistry: ActiveSessionRegistry,
        sessionLogWriter: SessionLogWriter,
        dateProvider: IDateProvider,
      ): MidnightSummaryScheduler =>
        new MidnightSummaryScheduler(
          summaryEngine,
          sessionRegistry,
          sessionLogWriter,
          dateProvider,
          new AbortController(),
        ),
    },
  ],
  exports: [
    SessionLogWriter,
    DailySummaryEngine,
    ShutdownService,
    PRESENCE_TOKENS.DAILY_LOG_REPOSITORY,
  ],
})
export class PresenceModule {}
