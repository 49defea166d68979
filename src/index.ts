/**
 * wfdeploy
 *
 * Deployment records for workflow stacks, and a runner that submits a
 * payload to a deployment and waits for its workflow to finish.
 *
 * @example
 * ```ts
 * import { Project, DeploymentStore, WorkflowRunner } from 'wfdeploy';
 *
 * const store = new DeploymentStore(Project.resolve());
 * const deployment = store.load('dev');
 * const result = await new WorkflowRunner().run(deployment, 'payload.json');
 * ```
 */

export * from './constants.js';
export * from './errors.js';

export { Project } from './project/project.js';
export {
  DEFAULT_PROJECT_CONFIG,
  expandStackName,
  loadProjectConfig,
  type CliConfigOverrides,
  type ProjectConfig,
} from './project/config.js';

export { AwsSession, createSessionFactory, type SessionFactory, type SessionOptions } from './aws/session.js';

export { DeploymentStore, type DeploymentStoreOptions } from './deployment/store.js';
export { Deployment, type DeploymentContext, type ExecEnvOptions, type RecordWriter } from './deployment/deployment.js';
export { LambdaConfigResolver, processFunctionName, type ConfigResolver } from './deployment/remote-config.js';
export { formatEnvFile, loadEnvFile, parseEnvFile, writeEnvFile, type EnvMapping } from './deployment/env-file.js';
export type {
  CreateDeploymentOptions,
  DeploymentRecord,
  RecordLayout,
  RefreshOptions,
  SaveOption,
} from './deployment/types.js';

export {
  resolveResources,
  type BoundExecutionClient,
  type ExecutionClient,
  type ExecutionDetail,
  type ExecutionResources,
  type SubmissionReceipt,
} from './execution/client.js';
export { AwsExecutionClient, createExecutionClient, type ExecutionClientOptions } from './execution/aws-client.js';
export { resolvePayloadPointer, submitPayload, type SubmitOptions, type SubmitResult } from './execution/intake.js';
export {
  WorkflowRunner,
  forceSuffix,
  type ClientFactory,
  type ExecutionRun,
  type RunOptions,
  type RunPhase,
  type RunResult,
  type WorkflowRunnerOptions,
} from './execution/runner.js';
export type { RunLogger } from './execution/run-logger.js';
export {
  isTerminalState,
  latestExecution,
  parseStateToken,
  payloadIdToBucketKey,
  payloadIdToKey,
  type StateRecord,
} from './execution/state-db.js';

export { parsePayload, payloadId, validatePayload, type ProcessPayload } from './payload/payload.js';
export { templatePayload, type TemplateOptions } from './template/template.js';
