import { BaseDomainError } from '@/modules/shared/errors/base-domain.error';

export class InvalidLogDateError extends BaseDomainError {
  readonly errorCode = 'INVALID_LOG_DATE';

  constructor(logDate: string) {
    super(`Invalid log date "${logDate}", expected YYYY-MM-DD`, {
      shouldReport: false,
      metadata: { logDate },
    });
  }
}

export class DailyLogWriteError extends BaseDomainError {
  readonly errorCode = 'DAILY_LOG_WRITE_FAILED';

  constructor(logDate: string, cause: unknown) {
    super(`Could not append to the log for ${logDate}`, {
      metadata: { logDate },
      cause,
    });
  }
}

export class DailyLogReadError extends BaseDomainError {
  readonly errorCode = 'DAILY_LOG_READ_FAILED';

  constructor(logDate: string, cause: unknown) {
    super(`Could not read the log for ${logDate}`, {
      metadata: { logDate },
      cause,
    });
  }
}
