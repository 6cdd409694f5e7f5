import { z } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validates a raw environment against a zod schema.
 * Throws ConfigError listing every failing variable as `NAME: message`.
 */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  env: NodeJS.ProcessEnv,
  label: string,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigError(`Invalid ${label} configuration: ${issues.join('; ')}`, issues);
}
