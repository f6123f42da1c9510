import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { randomUUID } from 'node:crypto';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

export function resolveCorrelationId(header: string | string[] | undefined): string {
  return typeof header === 'string' && header.length > 0 ? header : randomUUID();
}

export const CorrelationId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return resolveCorrelationId(request.headers[CORRELATION_ID_HEADER]);
  },
);
