import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  EQUITY_DEFAULT_TRIALS: z.coerce.number().int().positive().default(10000),
  EQUITY_MAX_TRIALS: z.coerce.number().int().positive().default(200000),
  EQUITY_DEFAULT_TRIALS_PER_HAND: z.coerce.number().int().positive().default(1000)
});

export interface ServerConfig {
  port: number;
  defaultTrials: number;
  /** Upper bound on trials a single request may run */
  maxTrials: number;
  defaultTrialsPerHand: number;
}

/**
 * Read server settings from the environment. Throws a ZodError naming the
 * offending variable when one is not a positive integer.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    defaultTrials: parsed.EQUITY_DEFAULT_TRIALS,
    maxTrials: parsed.EQUITY_MAX_TRIALS,
    defaultTrialsPerHand: parsed.EQUITY_DEFAULT_TRIALS_PER_HAND
  };
}
