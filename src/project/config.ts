/**
 * Project configuration loader
 *
 * Loads `.wfdeploy/config.yaml`, environment variables, and CLI arguments,
 * merging them in order of precedence.
 */

import * as fs from 'fs';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import { DEFAULT_POLL_INTERVAL } from '../constants.js';
import { ConfigurationError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'WFDEPLOY_';

export const DEFAULT_STACK_NAME_TEMPLATE = '{project}-{deployment}';

const positiveSeconds = z.number().positive();

export const projectConfigSchema = z
  .object({
    /** Default stack name of new deployments; `{project}` and `{deployment}` are substituted */
    stackName: z.string().min(1).optional(),
    /** AWS region for every client */
    region: z.string().min(1).optional(),
    /** Prefix of the operational variable names (e.g. `ACME_` → `ACME_STATE_DB`) */
    envPrefix: z.string().optional(),
    /** Seconds between state-store reads */
    pollInterval: positiveSeconds.optional(),
    /** Seconds to wait for a run before giving up; absent waits forever */
    runTimeout: positiveSeconds.optional(),
  })
  .strict();

export type PartialProjectConfig = z.infer<typeof projectConfigSchema>;

export interface ProjectConfig {
  stackName: string;
  region?: string;
  envPrefix: string;
  pollInterval: number;
  runTimeout?: number;
}

/**
 * CLI argument overrides
 */
export interface CliConfigOverrides {
  region?: string;
  envPrefix?: string;
  pollInterval?: number;
  runTimeout?: number;
}

export const DEFAULT_PROJECT_CONFIG: ProjectConfig = {
  stackName: DEFAULT_STACK_NAME_TEMPLATE,
  envPrefix: '',
  pollInterval: DEFAULT_POLL_INTERVAL,
};

/**
 * Read and validate a config file. A missing file is an empty config; an
 * unreadable or invalid one is a ConfigurationError naming the file.
 */
export function loadConfigFile(configPath: string): PartialProjectConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let data: unknown;
  try {
    data = YAML.load(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${configPath}: ${getErrorMessage(error)}`, { cause: error });
  }

  // An empty file loads as undefined
  if (data == null) {
    return {};
  }

  const result = projectConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config ${configPath}: ${issues.join('; ')}`);
  }
  return result.data;
}

function parseSeconds(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number of seconds, got "${value}"`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialProjectConfig {
  const config: PartialProjectConfig = {};

  const region = env[`${ENV_PREFIX}REGION`];
  const envPrefix = env[`${ENV_PREFIX}ENV_PREFIX`];
  const pollInterval = env[`${ENV_PREFIX}POLL_INTERVAL`];
  const runTimeout = env[`${ENV_PREFIX}RUN_TIMEOUT`];

  if (region) config.region = region;
  if (envPrefix !== undefined) config.envPrefix = envPrefix;
  if (pollInterval) config.pollInterval = parseSeconds(`${ENV_PREFIX}POLL_INTERVAL`, pollInterval);
  if (runTimeout) config.runTimeout = parseSeconds(`${ENV_PREFIX}RUN_TIMEOUT`, runTimeout);

  return config;
}

function mergeConfig(base: ProjectConfig, override: PartialProjectConfig): ProjectConfig {
  return {
    stackName: override.stackName ?? base.stackName,
    region: override.region ?? base.region,
    envPrefix: override.envPrefix ?? base.envPrefix,
    pollInterval: override.pollInterval ?? base.pollInterval,
    runTimeout: override.runTimeout ?? base.runTimeout,
  };
}

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export function loadProjectConfig(
  configPath: string,
  cliOverrides: CliConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ProjectConfig {
  let config = mergeConfig(DEFAULT_PROJECT_CONFIG, loadConfigFile(configPath));
  config = mergeConfig(config, loadEnvConfig(env));
  return mergeConfig(config, cliOverrides);
}

/**
 * Expand a stack name template for one deployment.
 */
export function expandStackName(template: string, project: string, deployment: string): string {
  return template.replace(/\{project\}/g, project).replace(/\{deployment\}/g, deployment);
}
