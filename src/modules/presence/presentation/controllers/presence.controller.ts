import {
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiOperation,
  ApiParam,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { TypedCommandBus, TypedQueryBus } from '@/modules/shared/cqrs';
import { CorrelationId } from '@/util/decorators/correlation-id.decorator';
import { ActiveSessionSnapshot } from '../../domain/active-session/active-session';
import { ToggleSessionCommand } from '../../application/commands/toggle-session/toggle-session.command';
import { SummarizeDayCommand } from '../../application/commands/summarize-day/summarize-day.command';
import { ShutdownCommand } from '../../application/commands/shutdown/shutdown.command';
import { GetSessionStateQuery } from '../../application/queries/get-session-state/get-session-state.query';
import { GetDailyTotalQuery } from '../../application/queries/get-daily-total/get-daily-total.query';
import { ShutdownService } from '../../application/lifecycle/shutdown.service';
import { ToggleSessionDto } from '../dto/toggle-session.dto';
import { DailyTotalQueryDto, SummarizeDayParamsDto } from '../dto/log-date.dto';
import {
  DailyTotalResponseDto,
  SessionStateResponseDto,
  SummarizeDayResponseDto,
} from '../dto/presence-response.dto';

export type QuitResponse = {
  ok: true;
  loggedOpenSession: boolean;
  summary: SummarizeDayResponseDto['status'];
};

function toSessionState(snapshot: ActiveSessionSnapshot): SessionStateResponseDto {
  return {
    active: snapshot.active,
    startedAt: snapshot.startedAt ? snapshot.startedAt.toISOString() : null,
  };
}

@ApiTags('Presence')
@Controller('api')
export class PresenceController {
  constructor(
    private readonly commandBus: TypedCommandBus,
    private readonly queryBus: TypedQueryBus,
    private readonly shutdownService: ShutdownService,
  ) {}

  @Get('state')
  @ApiOperation({ summary: 'Current session state' })
  @ApiResponse({ status: 200, type: SessionStateResponseDto })
  async getState(
    @CorrelationId() correlationId: string,
  ): Promise<SessionStateResponseDto> {
    const snapshot = await this.queryBus.execute(
      new GetSessionStateQuery({ correlationId }),
    );
    return toSessionState(snapshot);
  }

  @Post('toggle')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Start or stop recording',
    description:
      'Turning off appends the closed interval to the log of every day it covers.',
  })
  @ApiQuery({ name: 'state', required: false, enum: ['on', 'off'] })
  @ApiResponse({ status: 200, type: SessionStateResponseDto })
  async toggle(
    @Query() query: ToggleSessionDto,
    @CorrelationId() correlationId: string,
  ): Promise<SessionStateResponseDto> {
    const snapshot = await this.commandBus.execute(
      new ToggleSessionCommand({ correlationId, state: query.state }),
    );
    return toSessionState(snapshot);
  }

  @Get('total')
  @ApiOperation({ summary: 'Recorded time for a day' })
  @ApiQuery({ name: 'date', required: false, example: '2023-03-21' })
  @ApiResponse({ status: 200, type: DailyTotalResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid date' })
  async getTotal(
    @Query() query: DailyTotalQueryDto,
    @CorrelationId() correlationId: string,
  ): Promise<DailyTotalResponseDto> {
    const result = await this.queryBus.execute(
      new GetDailyTotalQuery({ correlationId, logDate: query.date }),
    );

    return {
      date: result.logDate,
      totalSeconds: result.totalSeconds,
      formatted: result.formatted,
      summarized: result.summarized,
    };
  }

  @Post('summaries/:date')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Write the summary line for a day',
    description: 'Idempotent: a day already summarized is left unchanged.',
  })
  @ApiParam({ name: 'date', example: '2023-03-21' })
  @ApiResponse({ status: 200, type: SummarizeDayResponseDto })
  async summarizeDay(
    @Param() params: SummarizeDayParamsDto,
    @CorrelationId() correlationId: string,
  ): Promise<SummarizeDayResponseDto> {
    const outcome = await this.commandBus.execute(
      new SummarizeDayCommand({ correlationId, logDate: params.date }),
    );

    return {
      date: outcome.logDate,
      status: outcome.status,
      totalSeconds: outcome.status === 'missing' ? null : outcome.totalSeconds,
    };
  }

  @Post('quit')
  @HttpCode(202)
  @ApiOperation({
    summary: 'Stop the tracker',
    description:
      "Logs the open interval, writes today's summary, then closes the application.",
  })
  async quit(@CorrelationId() correlationId: string): Promise<QuitResponse> {
    const result = await this.commandBus.execute(
      new ShutdownCommand({ correlationId }),
    );
    this.shutdownService.requestShutdown();

    return {
      ok: true,
      loggedOpenSession: result.loggedOpenSession,
      summary: result.summary.status,
    };
  }
}
