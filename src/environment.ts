/**
 * Environment configuration
 *
 * Reads and validates the environment variables the toolkit honours.
 */

import {z} from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional()
});

export type Environment = z.infer<typeof envSchema>;

export function loadEnvironment(
  source: NodeJS.ProcessEnv = process.env
): Environment {
  const parsed = envSchema.safeParse({
    NODE_ENV: source.NODE_ENV,
    LOG_LEVEL: source.LOG_LEVEL
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  return parsed.data;
}

export function resolveLogLevel(env: Environment): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}
