import { BaseDomainError } from '@/modules/shared/errors/base-domain.error';

export class InvalidSessionSegmentError extends BaseDomainError {
  readonly errorCode = 'INVALID_SESSION_SEGMENT';

  constructor(message: string) {
    super(`Invalid session segment: ${message}`, {
      shouldReport: false,
    });
  }
}
