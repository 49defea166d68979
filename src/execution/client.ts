/**
 * The remote side of a workflow run, as the runner sees it: an intake queue,
 * an object store, a state store and the execution history.
 */

import { RESOURCE_KEYS } from '../constants.js';
import type { EnvMapping } from '../deployment/env-file.js';
import { ConfigurationError } from '../errors.js';
import type { StateRecord } from './state-db.js';

export interface SubmissionReceipt {
  messageId?: string;
  /** Raw service response, for display */
  raw: Record<string, unknown>;
}

export interface ExecutionDetail {
  arn: string;
  status?: string;
  /** Serialized input payload */
  input?: string;
  /** Serialized output payload; absent until the execution succeeds */
  output?: string;
  raw: Record<string, unknown>;
}

export interface ExecutionClient {
  /** Enqueue a serialized payload. */
  submit(queueUrl: string, body: string): Promise<SubmissionReceipt>;
  putObject(bucket: string, key: string, body: string): Promise<void>;
  getObject(bucket: string, key: string): Promise<string>;
  /** State-store record for a payload id; undefined when none exists yet. */
  getStatusRecord(payloadId: string): Promise<StateRecord | undefined>;
  /** ARN of the latest execution started for a payload id. */
  getExecutionArnFor(payloadId: string): Promise<string>;
  describeExecution(arn: string): Promise<ExecutionDetail>;
}

/**
 * Addresses of the remote resources, read from a deployment's environment.
 */
export interface ExecutionResources {
  queueUrl: string;
  stateTable: string;
  payloadBucket: string;
}

/** A client bound to one deployment's resources. */
export interface BoundExecutionClient extends ExecutionClient {
  readonly resources: ExecutionResources;
}

/**
 * Pick the resource addresses out of an environment mapping. A deployment
 * without them cannot address the remote system, so a missing key fails
 * here rather than on first use.
 */
export function resolveResources(env: EnvMapping, envPrefix = ''): ExecutionResources {
  const read = (key: string): string => {
    const name = `${envPrefix}${key}`;
    const value = env[name];
    if (!value) {
      throw new ConfigurationError(
        `Deployment environment has no ${name}; refresh the deployment or check the project's envPrefix`
      );
    }
    return value;
  };

  return {
    queueUrl: read(RESOURCE_KEYS.queueUrl),
    stateTable: read(RESOURCE_KEYS.stateTable),
    payloadBucket: read(RESOURCE_KEYS.payloadBucket),
  };
}
