import path from 'path';
import { z } from 'zod';

/**
 * Default log directory: `logs/` at the project root, which is two levels
 * above this file both in `src/config` and in the compiled `dist/config`.
 */
export const DEFAULT_LOG_DIR = path.resolve(__dirname, '..', '..', 'logs');

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const EnvVarsSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  IS_LOCAL: booleanString.default(false),
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(0),
  APP_LOG_DIR: z
    .string()
    .optional()
    .transform((value) =>
      value && value.trim().length > 0
        ? path.resolve(value.trim())
        : DEFAULT_LOG_DIR,
    ),
});

export type EnvVars = z.infer<typeof EnvVarsSchema>;

export function validate(config: Record<string, unknown>): EnvVars {
  const result = EnvVarsSchema.safeParse(config);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return result.data;
}
