import { z } from 'zod';
import { ConfigurationError } from '../services/errors';

/**
 * Validate raw commander options against a schema; failures become
 * ConfigurationError so the CLI exits before any network work.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown, command: string): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${command} options: ${issues}`);
  }
  return parsed.data;
}

export function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}
