import type { Readable } from 'stream';
import { loadEnvFile, type EnvMapping } from '../../deployment/env-file.js';
import { ConfigurationError } from '../../errors.js';
import { readStream } from '../../utils/streams.js';

export function readStdin(input: Readable = process.stdin): Promise<string> {
  return readStream(input);
}

/** Commander option collector for repeatable flags */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Parse `--var NAME=value` assignments; later ones win. */
export function parseVarAssignments(assignments: string[] = []): EnvMapping {
  const vars: EnvMapping = {};
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      throw new ConfigurationError(`Expected NAME=value, got "${assignment}"`);
    }
    vars[assignment.slice(0, eq)] = assignment.slice(eq + 1);
  }
  return vars;
}

/**
 * Templating variables: `base`, then each env file in order, then the
 * explicit assignments.
 */
export function buildTemplateVars(base: EnvMapping, files: string[] = [], assignments: string[] = []): EnvMapping {
  const vars: EnvMapping = { ...base };
  for (const file of files) {
    Object.assign(vars, loadEnvFile(file));
  }
  return Object.assign(vars, parseVarAssignments(assignments));
}
