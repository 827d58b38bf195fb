// CLI configuration
//
// Defaults for omitted command-line options, read from the environment.
// Precedence: command-line flag > environment > built-in default.

import { z } from 'zod';
import { InvalidParameterError, LOG_THRESHOLDS, type LogThreshold } from '@proofcost/runtime';

export type CliConfig = {
  systemKey?: string;
  batchSize?: number;
  securityBits?: number;
  hardwareScale?: number;
  logLevel: LogThreshold;
};

// Empty variables count as unset
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const EnvSchema = z.object({
  PROOFCOST_SYSTEM: fromEnv(z.string().optional()),
  PROOFCOST_BATCH_SIZE: fromEnv(z.coerce.number().optional()),
  PROOFCOST_SECURITY_BITS: fromEnv(z.coerce.number().optional()),
  PROOFCOST_HARDWARE_SCALE: fromEnv(z.coerce.number().optional()),
  PROOFCOST_LOG_LEVEL: fromEnv(z.enum(LOG_THRESHOLDS).default('warn')),
});

/**
 * Load CLI configuration from environment variables.
 *
 * Values are only coerced here; domain checks (known system, supported
 * security level, positive numbers) happen in request validation.
 *
 * @throws InvalidParameterError naming the first malformed variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue.path[0]);
    throw new InvalidParameterError(`Invalid ${variable}: ${issue.message}`, {
      field: variable,
      details: { value: env[variable] },
    });
  }

  const data = parsed.data;
  return {
    systemKey: data.PROOFCOST_SYSTEM,
    batchSize: data.PROOFCOST_BATCH_SIZE,
    securityBits: data.PROOFCOST_SECURITY_BITS,
    hardwareScale: data.PROOFCOST_HARDWARE_SCALE,
    logLevel: data.PROOFCOST_LOG_LEVEL,
  };
}
