/**
 * Persisted shapes of a deployment record
 */

import { z } from 'zod';
import { LEGACY_CONFIG_VERSION } from '../constants.js';

const envMappingSchema = z.record(z.string(), z.string());

/**
 * Current single-file layout: `<deployments>/<name>.json`
 */
export const deploymentRecordSchema = z.object({
  name: z.string().min(1),
  created: z.string(),
  updated: z.string(),
  stackname: z.string().min(1),
  /** null means the default credential chain */
  profile: z.string().nullable(),
  /** Snapshot of the stack's operational configuration */
  environment: envMappingSchema,
  /** Local overrides layered over `environment`; never touched by refresh */
  user_vars: envMappingSchema.default({}),
  /** Absent in records written before the format was versioned */
  config_version: z.number().int().nonnegative().default(LEGACY_CONFIG_VERSION),
});

export type DeploymentRecord = z.infer<typeof deploymentRecordSchema>;

/**
 * Legacy directory layout: `<deployments>/<name>/deployment.json` holds
 * everything but the environment, which lives in the sibling `env` file.
 */
export const legacyMetaSchema = z.object({
  name: z.string().min(1),
  created: z.string(),
  updated: z.string(),
  stackname: z.string().min(1),
  profile: z.string().nullable().default(null),
  user_vars: envMappingSchema.default({}),
  config_version: z.number().int().nonnegative().optional(),
});

export type LegacyMeta = z.infer<typeof legacyMetaSchema>;

export type RecordLayout = 'file' | 'directory';

export interface CreateDeploymentOptions {
  /** Defaults to the project's stack name template */
  stackname?: string;
  /** Credential profile; omitted or null uses the default chain */
  profile?: string | null;
  /** Replace an existing record of the same name */
  overwrite?: boolean;
}

export interface RefreshOptions {
  stackname?: string;
  profile?: string;
}

export interface SaveOption {
  /** Persist immediately; otherwise the caller batches and calls save() */
  save?: boolean;
}
