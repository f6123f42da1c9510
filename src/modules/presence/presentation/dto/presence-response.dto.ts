import { ApiProperty } from '@nestjs/swagger';

export class SessionStateResponseDto {
  @ApiProperty({ description: 'Whether an interval is being recorded' })
  active!: boolean;

  @ApiProperty({
    description: 'Start of the open interval (ISO 8601)',
    example: '2023-03-21T09:00:00.000Z',
    nullable: true,
    type: String,
  })
  startedAt!: string | null;
}

export class DailyTotalResponseDto {
  @ApiProperty({ example: '2023-03-21' })
  date!: string;

  @ApiProperty({ description: 'Sum of segment durations', example: 2890 })
  totalSeconds!: number;

  @ApiProperty({ description: 'H:MM:SS', example: '0:48:10' })
  formatted!: string;

  @ApiProperty({ description: 'Whether the summary line is already written' })
  summarized!: boolean;
}

export class SummarizeDayResponseDto {
  @ApiProperty({ example: '2023-03-21' })
  date!: string;

  @ApiProperty({ enum: ['missing', 'already-summarized', 'written'] })
  status!: 'missing' | 'already-summarized' | 'written';

  @ApiProperty({ nullable: true, type: Number, example: 2890 })
  totalSeconds!: number | null;
}
