export type BaseDomainErrorOptions = {
  /** Whether the failure is unexpected and should be logged at error level. */
  shouldReport?: boolean;
  metadata?: Record<string, unknown>;
  cause?: unknown;
};

export abstract class BaseDomainError extends Error {
  abstract readonly errorCode: string;
  readonly shouldReport: boolean;
  readonly metadata: Record<string, unknown>;

  protected constructor(message: string, options: BaseDomainErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.shouldReport = options.shouldReport ?? true;
    this.metadata = options.metadata ?? {};
  }
}
