export const PRESENCE_TOKENS = {
  DAILY_LOG_REPOSITORY: Symbol('DAILY_LOG_REPOSITORY'),
  DATE_PROVIDER: Symbol('DATE_PROVIDER'),
  LOG_DIRECTORY: Symbol('LOG_DIRECTORY'),
} as const;
