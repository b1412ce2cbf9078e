/**
 * Centralized Vitest Setup for mixgraph
 *
 * Keeps query debug output off the test reporter unless a log level is
 * requested explicitly, and clears configuration overrides that would change
 * which separation procedure the suites exercise.
 */

import { afterEach } from 'vitest';

const MIXGRAPH_CONFIG_VARS = [
  'MIXGRAPH_SEPARATION_STRATEGY',
  'MIXGRAPH_MAX_PATH_LENGTH',
  'MIXGRAPH_DEFINITE_PARENTS',
] as const;

if (process.env.MIXGRAPH_LOG_LEVEL === undefined) {
  process.env.MIXGRAPH_LOG_LEVEL = 'silent';
}

for (const name of MIXGRAPH_CONFIG_VARS) {
  delete process.env[name];
}

afterEach(() => {
  for (const name of MIXGRAPH_CONFIG_VARS) {
    delete process.env[name];
  }
});
