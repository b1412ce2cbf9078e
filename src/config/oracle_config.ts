/**
 * @fileoverview Query Engine Configuration
 *
 * Resolves the settings shared by the separation oracle and the PAG searches.
 *
 * Priority order (highest to lowest):
 * 1. Per-call options
 * 2. Environment variables
 * 3. Defaults
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { InvalidQueryError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { isFalsyFlag, isTruthyFlag } from '../utils/runtime_controls.js';

export const SeparationStrategySchema = z.enum(['moralization', 'legal_path']);

export type SeparationStrategy = z.infer<typeof SeparationStrategySchema>;

export const OracleConfigSchema = z.object({
  /** Decision procedure used by mSeparated */
  separationStrategy: SeparationStrategySchema,
  /** Maximum number of edges on a searched path; null is unbounded */
  maxPathLength: z.number().int().positive().nullable(),
  /** Require a definite `→` into the endpoint for discriminating-path colliders */
  definiteParents: z.boolean(),
});

export type OracleConfig = z.infer<typeof OracleConfigSchema>;

export type OracleOptions = Partial<OracleConfig>;

export const DEFAULT_ORACLE_CONFIG: OracleConfig = {
  separationStrategy: 'moralization',
  maxPathLength: null,
  definiteParents: false,
};

export const ORACLE_ENV_VARS = {
  SEPARATION_STRATEGY: 'MIXGRAPH_SEPARATION_STRATEGY',
  MAX_PATH_LENGTH: 'MIXGRAPH_MAX_PATH_LENGTH',
  DEFINITE_PARENTS: 'MIXGRAPH_DEFINITE_PARENTS',
} as const;

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (isTruthyFlag(value)) return true;
  if (isFalsyFlag(value)) return false;
  return undefined;
}

function parseEnvPathLength(value: string | undefined): number | null | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const lower = value.trim().toLowerCase();
  if (lower === 'none' || lower === 'unbounded') return null;
  const parsed = Number(lower);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

/**
 * Read overrides from the environment. Unset variables contribute nothing.
 */
export function getEnvOracleConfig(env: NodeJS.ProcessEnv = process.env): OracleOptions {
  const result: OracleOptions = {};

  const strategy = env[ORACLE_ENV_VARS.SEPARATION_STRATEGY];
  if (strategy !== undefined && strategy.trim() !== '') {
    const parsed = SeparationStrategySchema.safeParse(strategy.trim().toLowerCase());
    if (!parsed.success) {
      throw new InvalidQueryError(
        `Invalid ${ORACLE_ENV_VARS.SEPARATION_STRATEGY}: '${strategy}'`,
        { variable: ORACLE_ENV_VARS.SEPARATION_STRATEGY, value: strategy }
      );
    }
    result.separationStrategy = parsed.data;
  }

  const maxPathLength = parseEnvPathLength(env[ORACLE_ENV_VARS.MAX_PATH_LENGTH]);
  if (maxPathLength !== undefined) {
    result.maxPathLength = maxPathLength;
  }

  const definiteParentsRaw = env[ORACLE_ENV_VARS.DEFINITE_PARENTS];
  const definiteParents = parseEnvBoolean(definiteParentsRaw);
  if (definiteParents !== undefined) {
    result.definiteParents = definiteParents;
  } else if (definiteParentsRaw !== undefined && definiteParentsRaw.trim() !== '') {
    logWarning(`Ignoring unrecognised ${ORACLE_ENV_VARS.DEFINITE_PARENTS} value`, { value: definiteParentsRaw });
  }

  return result;
}

/**
 * Merge defaults, environment and per-call options, then validate.
 */
export function resolveOracleConfig(
  options: OracleOptions = {},
  env: NodeJS.ProcessEnv = process.env
): OracleConfig {
  const merged = {
    ...DEFAULT_ORACLE_CONFIG,
    ...getEnvOracleConfig(env),
    ...stripUndefined(options),
  };
  const parsed = OracleConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidQueryError('Invalid oracle configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function stripUndefined(options: OracleOptions): OracleOptions {
  const result: OracleOptions = {};
  if (options.separationStrategy !== undefined) result.separationStrategy = options.separationStrategy;
  if (options.maxPathLength !== undefined) result.maxPathLength = options.maxPathLength;
  if (options.definiteParents !== undefined) result.definiteParents = options.definiteParents;
  return result;
}
