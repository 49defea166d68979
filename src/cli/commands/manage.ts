/**
 * Manage commands - operations against one named deployment
 *
 * Each command loads the deployment first, so an unknown name fails before
 * anything remote is touched.
 */

import type { Readable } from 'stream';
import { ConfigurationError, InvalidPayloadError, NotFoundError } from '../../errors.js';
import type { BoundExecutionClient } from '../../execution/client.js';
import { submitPayload } from '../../execution/intake.js';
import { WorkflowRunner, type ExecutionRun, type RunPhase, type WorkflowRunnerOptions } from '../../execution/runner.js';
import { payloadIdToBucketKey } from '../../execution/state-db.js';
import { templatePayload } from '../../template/template.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { clientFor, type CliContext } from '../utils/context.js';
import { buildTemplateVars, readStdin } from '../utils/io.js';
import { logger, runLogger } from '../utils/logger.js';

export interface RawOption {
  /** Print the response without pretty-formatting */
  raw?: boolean;
}

export interface ExecutionTargetOptions extends RawOption {
  arn?: string;
  payloadId?: string;
}

export interface RefreshCommandOptions {
  stackname?: string;
  profile?: string;
}

export interface TemplatePayloadCommandOptions {
  var?: string[];
  silenceTemplatingErrors?: boolean;
}

export interface RunWorkflowCommandOptions {
  force?: boolean;
  /** Write the result here instead of stdout */
  output?: string;
  /** Seconds; overrides the project's runTimeout */
  timeout?: string;
}

export interface ExecCommandOptions {
  /** Commander's `--no-user-vars` negation sets this to false */
  userVars?: boolean;
  isolated?: boolean;
}

function printJson(value: unknown, raw = false): void {
  logger.log(raw ? JSON.stringify(value) : JSON.stringify(value, null, 4));
}

function parseJsonDocument(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidPayloadError(`${what} is not JSON: ${getErrorMessage(error)}`, { cause: error });
  }
}

async function executionArnFor(client: BoundExecutionClient, options: ExecutionTargetOptions): Promise<string> {
  if (options.arn && options.payloadId) {
    throw new ConfigurationError('Give either --arn or --payload-id, not both');
  }
  if (options.arn) {
    return options.arn;
  }
  if (options.payloadId) {
    return client.getExecutionArnFor(options.payloadId);
  }
  throw new ConfigurationError('An execution identifier is required: --arn or --payload-id');
}

export function showCommand(ctx: CliContext, name: string): void {
  const deployment = ctx.store.load(name);
  const record = deployment.toRecord();

  logger.log(`Deployment Name: ${deployment.name}`);
  logger.log('Info:');
  logger.log(`  created: ${record.created}`);
  logger.log(`  updated: ${record.updated}`);
  logger.log(`  stackname: ${record.stackname}`);
  logger.log(`  profile: ${record.profile ?? '(default)'}`);
  logger.log(`  config_version: ${record.config_version}`);
  logger.log('Environment Variables:');
  for (const [key, value] of Object.entries(record.environment)) {
    logger.log(`  ${key}: ${value}`);
  }
  const userVars = Object.entries(record.user_vars);
  if (userVars.length > 0) {
    logger.log('User Variables:');
    for (const [key, value] of userVars) {
      logger.log(`  ${key}: ${value}`);
    }
  }
}

export function getPathCommand(ctx: CliContext, name: string): void {
  logger.log(ctx.store.load(name).path);
}

export async function refreshCommand(ctx: CliContext, name: string, options: RefreshCommandOptions = {}): Promise<void> {
  const deployment = ctx.store.load(name);
  await deployment.refresh({ stackname: options.stackname, profile: options.profile });
  logger.success(`Refreshed ${deployment.name} from stack ${deployment.stackname}`);
}

export async function getPayloadCommand(
  ctx: CliContext,
  name: string,
  payloadId: string,
  options: RawOption = {}
): Promise<void> {
  const deployment = ctx.store.load(name);
  const client = await clientFor(ctx, deployment);
  const { bucket, key } = payloadIdToBucketKey(payloadId, client.resources.payloadBucket);
  logger.debug(`bucket: '${bucket}', key: '${key}'`);

  const text = await client.getObject(bucket, key);
  if (options.raw) {
    logger.log(text);
  } else {
    printJson(parseJsonDocument(text, `s3://${bucket}/${key}`));
  }
}

export async function getExecutionCommand(
  ctx: CliContext,
  name: string,
  options: ExecutionTargetOptions
): Promise<void> {
  const client = await clientFor(ctx, ctx.store.load(name));
  const execution = await client.describeExecution(await executionArnFor(client, options));
  printJson(execution.raw, options.raw);
}

export async function getExecutionInputCommand(
  ctx: CliContext,
  name: string,
  options: ExecutionTargetOptions
): Promise<void> {
  const client = await clientFor(ctx, ctx.store.load(name));
  const execution = await client.describeExecution(await executionArnFor(client, options));
  if (execution.input === undefined) {
    throw new NotFoundError(`Execution ${execution.arn} has no recorded input`, 'execution', execution.arn);
  }
  printJson(parseJsonDocument(execution.input, `Input of ${execution.arn}`), options.raw);
}

export async function getExecutionOutputCommand(
  ctx: CliContext,
  name: string,
  options: ExecutionTargetOptions
): Promise<void> {
  const client = await clientFor(ctx, ctx.store.load(name));
  const execution = await client.describeExecution(await executionArnFor(client, options));
  if (execution.output === undefined) {
    throw new NotFoundError(
      `Execution ${execution.arn} has no recorded output (status ${execution.status ?? 'unknown'})`,
      'execution',
      execution.arn
    );
  }
  printJson(parseJsonDocument(execution.output, `Output of ${execution.arn}`), options.raw);
}

export async function getStateCommand(ctx: CliContext, name: string, payloadId: string): Promise<void> {
  const client = await clientFor(ctx, ctx.store.load(name));
  const record = await client.getStatusRecord(payloadId);
  if (!record) {
    throw new NotFoundError(`No state record for ${payloadId}`, 'execution', payloadId);
  }
  printJson(record);
}

/** Enqueue the payload on stdin as-is. */
export async function processCommand(ctx: CliContext, name: string, input?: Readable): Promise<void> {
  const client = await clientFor(ctx, ctx.store.load(name));
  const body = await readStdin(input);
  const { receipt } = await submitPayload(client, client.resources, body, { logger: runLogger });
  printJson(receipt.raw);
}

/**
 * Template the payload on stdin with the deployment's effective environment,
 * then any env files, then `--var` assignments.
 */
export async function templatePayloadCommand(
  ctx: CliContext,
  name: string,
  files: string[],
  options: TemplatePayloadCommandOptions = {},
  input?: Readable
): Promise<void> {
  const deployment = ctx.store.load(name);
  const vars = buildTemplateVars(deployment.effectiveEnv(true), files, options.var);
  logger.debug(`Templating vars: ${JSON.stringify(vars)}`);
  logger.log(templatePayload(await readStdin(input), vars, { silenceErrors: options.silenceTemplatingErrors }));
}

function parseTimeout(value: string | undefined, fallbackSeconds: number | undefined): number | undefined {
  if (value === undefined) {
    return fallbackSeconds === undefined ? undefined : fallbackSeconds * 1000;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`--timeout must be a positive number of seconds, got "${value}"`);
  }
  return seconds * 1000;
}

/**
 * Submit a payload file and wait for its workflow to finish. Ctrl-C stops
 * the wait; the remote execution carries on.
 *
 * @returns the terminal phase, so the caller can pick an exit code
 */
export async function runWorkflowCommand(
  ctx: CliContext,
  name: string,
  payloadPath: string,
  options: RunWorkflowCommandOptions = {},
  runnerOverrides: Partial<WorkflowRunnerOptions> = {}
): Promise<RunPhase> {
  const deployment = ctx.store.load(name);
  const config = ctx.project.config;
  const timeoutMs = parseTimeout(options.timeout, config.runTimeout);

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const last: { run?: ExecutionRun } = {};
  const runner = new WorkflowRunner({
    clientFactory: ctx.clientFactory,
    envPrefix: config.envPrefix,
    pollIntervalMs: config.pollInterval * 1000,
    timeoutMs,
    signal: controller.signal,
    logger: runLogger,
    onTransition: (run) => {
      logger.debug(`${run.payloadId ?? deployment.name}: ${run.phase}`);
      last.run = { ...run };
    },
    ...runnerOverrides,
  });

  try {
    await runner.run(deployment, payloadPath, {
      force: options.force,
      output: options.output ?? process.stdout,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const phase = last.run?.phase ?? 'INIT';
  if (options.output) {
    logger.success(`Result written to ${options.output}`);
  }
  if (phase !== 'COMPLETED') {
    logger.error(`Workflow ${phase}: ${last.run?.lastError ?? 'unknown error'}`);
  }
  return phase;
}

export function setVarCommand(ctx: CliContext, name: string, variable: string, value: string): void {
  const deployment = ctx.store.load(name);
  deployment.addUserVar(variable, value, { save: true });
  logger.success(`Set ${variable} on ${deployment.name}`);
}

export function unsetVarCommand(ctx: CliContext, name: string, variable: string): void {
  const deployment = ctx.store.load(name);
  deployment.delUserVar(variable, { save: true });
  logger.success(`Unset ${variable} on ${deployment.name}`);
}

export function addVarsCommand(ctx: CliContext, name: string, file: string): void {
  const deployment = ctx.store.load(name);
  deployment.addUserVarsFromFile(file, { save: true });
  logger.success(`Added vars from ${file} to ${deployment.name}`);
}

/**
 * @returns the command's exit code
 */
export function execCommand(
  ctx: CliContext,
  name: string,
  command: string[],
  options: ExecCommandOptions = {}
): Promise<number> {
  const deployment = ctx.store.load(name);
  return deployment.exec(command, {
    includeUserVars: options.userVars ?? true,
    isolated: options.isolated ?? false,
  });
}
