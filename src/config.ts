/**
 * Process configuration, read once from the environment.
 */
import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';
import type { AnalysisParameters } from './models/attack-surface.js';

export interface AppConfig {
  port: number;
  analysisDefaults: AnalysisParameters;
  /** Largest path cutoff a caller may request; path enumeration is exponential in it. */
  maxPathCutoff: number;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5015),
  ATTACK_SURFACE_ORG_FACTOR: z.coerce.number().positive().finite().default(1.0),
  ATTACK_SURFACE_PATH_THRESHOLD: z.coerce.number().positive().finite().default(0.7),
  ATTACK_SURFACE_PATH_CUTOFF: z.coerce.number().int().min(1).default(5),
  ATTACK_SURFACE_MAX_PATH_CUTOFF: z.coerce.number().int().min(1).default(8),
  ATTACK_SURFACE_BUDGET: z.coerce.number().min(0).finite().default(100000),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues('Invalid environment configuration', result.error.issues);
  }
  const vars = result.data;

  if (vars.ATTACK_SURFACE_PATH_CUTOFF > vars.ATTACK_SURFACE_MAX_PATH_CUTOFF) {
    throw new ConfigurationError(
      `ATTACK_SURFACE_PATH_CUTOFF (${vars.ATTACK_SURFACE_PATH_CUTOFF}) exceeds ATTACK_SURFACE_MAX_PATH_CUTOFF (${vars.ATTACK_SURFACE_MAX_PATH_CUTOFF})`,
    );
  }

  return {
    port: vars.PORT,
    analysisDefaults: {
      organizationalFactor: vars.ATTACK_SURFACE_ORG_FACTOR,
      pathThreshold: vars.ATTACK_SURFACE_PATH_THRESHOLD,
      pathCutoff: vars.ATTACK_SURFACE_PATH_CUTOFF,
      budget: vars.ATTACK_SURFACE_BUDGET,
    },
    maxPathCutoff: vars.ATTACK_SURFACE_MAX_PATH_CUTOFF,
  };
}
