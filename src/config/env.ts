import type { z } from 'zod';
import { EnvSchema } from '../schemas/index.js';
import { InfrastructureError } from '../exception/errors.js';

export type Env = z.infer<typeof EnvSchema>;

let _env: Env | null = null;

/** Parse configuration from an environment map. Invalid values abort with InfrastructureError. */
export function loadConfig(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InfrastructureError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = loadConfig(process.env);
  }
  return _env;
}

export function resetEnv(): void {
  _env = null;
}
