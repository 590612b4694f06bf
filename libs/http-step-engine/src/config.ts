import { z } from 'zod';
import type { LogLevel } from './logger';
import { DEFAULT_MAX_REDIRECTS } from './transport/undiciTransport';

/**
 * Stepwise Configuration
 *
 * Environment-driven defaults for a worker. Every variable is optional.
 */

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const stepwiseEnvSchema = z.object({
  STEPWISE_USER_AGENT: z.preprocess(blankAsUndefined, z.string().trim().optional()),
  STEPWISE_PROXY: z.preprocess(blankAsUndefined, z.string().trim().url('STEPWISE_PROXY must be a URL').optional()),
  STEPWISE_COMPRESSION: z.preprocess(blankAsUndefined, booleanFlag.default('true')),
  STEPWISE_MAX_REDIRECTS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(0).max(50).default(DEFAULT_MAX_REDIRECTS),
  ),
  STEPWISE_LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  STEPWISE_MAX_STEPS: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).default(100)),
});

export interface StepwiseConfig {
  userAgent?: string;
  proxy?: string;
  compression: boolean;
  maxRedirects: number;
  logLevel: LogLevel;
  maxSteps: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid stepwise configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadStepwiseConfig(env: Record<string, string | undefined> = process.env): StepwiseConfig {
  const result = stepwiseEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const parsed = result.data;
  return {
    userAgent: parsed.STEPWISE_USER_AGENT,
    proxy: parsed.STEPWISE_PROXY,
    compression: parsed.STEPWISE_COMPRESSION,
    maxRedirects: parsed.STEPWISE_MAX_REDIRECTS,
    logLevel: parsed.STEPWISE_LOG_LEVEL,
    maxSteps: parsed.STEPWISE_MAX_STEPS,
  };
}
