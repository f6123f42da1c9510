import { z } from 'zod';
import { ZodSchema } from '@/util/decorators/zod-schema.decorator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

const LOG_DATE = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .describe('Local calendar day (YYYY-MM-DD)');

export const DailyTotalQueryDtoSchema = z.object({
  date: LOG_DATE.optional(),
});

@ZodSchema(DailyTotalQueryDtoSchema)
export class DailyTotalQueryDto {
  @ApiPropertyOptional({
    description: 'Local calendar day (YYYY-MM-DD); defaults to today',
    example: '2023-03-21',
  })
  date?: string;
}

export const SummarizeDayParamsDtoSchema = z.object({
  date: LOG_DATE,
});

@ZodSchema(SummarizeDayParamsDtoSchema)
export class SummarizeDayParamsDto {
  @ApiProperty({
    description: 'Local calendar day (YYYY-MM-DD)',
    example: '2023-03-21',
  })
  date!: string;
}
