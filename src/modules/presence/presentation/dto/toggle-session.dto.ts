import { z } from 'zod';
import { ZodSchema } from '@/util/decorators/zod-schema.decorator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export const ToggleSessionDtoSchema = z.object({
  state: z
    .enum(['on', 'off'])
    .optional()
    .describe('Target state; omit to flip the current one'),
});

@ZodSchema(ToggleSessionDtoSchema)
export class ToggleSessionDto {
  @ApiPropertyOptional({
    description: 'Target state; omit to flip the current one',
    enum: ['on', 'off'],
    example: 'on',
  })
  state?: 'on' | 'off';
}
