/**
 * # Workflow runner
 *
 * Submits a payload to a deployment and waits for the remote execution to
 * finish:
 *
 * ```
 * INIT ─submit─▶ SUBMITTED ─▶ POLLING ─┬─▶ COMPLETED  (execution output)
 *                               ▲  │   ├─▶ FAILED     ({ last_error })
 *                               └──┘   └─▶ ABORTED    ({ last_error })
 * ```
 *
 * The remote side is authoritative. Stopping the local wait (timeout, abort
 * signal, killed process) never touches the remote execution.
 */

import * as fs from 'fs';
import type { Readable, Writable } from 'stream';
import { setTimeout as delay } from 'timers/promises';
import { DEFAULT_POLL_INTERVAL, LAST_ERROR_PLACEHOLDER, type TerminalState } from '../constants.js';
import type { Deployment } from '../deployment/deployment.js';
import { InvalidPayloadError, PollingReadError, RunCancelledError, RunTimeoutError } from '../errors.js';
import { parsePayload, payloadId } from '../payload/payload.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { formatJson, isPlainObject } from '../utils/json.js';
import { readStream, writeToStream } from '../utils/streams.js';
import { createExecutionClient, type ExecutionClientOptions } from './aws-client.js';
import type { BoundExecutionClient } from './client.js';
import { resolvePayloadPointer, submitPayload } from './intake.js';
import { silentLogger, type RunLogger } from './run-logger.js';
import { isTerminalState, parseStateToken, type StateRecord } from './state-db.js';

export type RunPhase = 'INIT' | 'SUBMITTED' | 'POLLING' | TerminalState;

export type RunResult = Record<string, unknown>;

/**
 * Transient context of one run. Handed to `onTransition` on every phase
 * change; never persisted.
 */
export interface ExecutionRun {
  deployment: string;
  payloadId?: string;
  forceSuffix?: string;
  phase: RunPhase;
  /** Last state token read from the state store */
  state: string;
  polls: number;
  lastError?: string;
  result?: RunResult;
}

export type ClientFactory = (deployment: Deployment, options: ExecutionClientOptions) => Promise<BoundExecutionClient>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WorkflowRunnerOptions {
  clientFactory?: ClientFactory;
  pollIntervalMs?: number;
  sleep?: SleepFn;
  /** Clock in epoch milliseconds */
  now?: () => number;
  logger?: RunLogger;
  /** Stop waiting after this long. Unset waits until a terminal state. */
  timeoutMs?: number;
  signal?: AbortSignal;
  envPrefix?: string;
  onTransition?: (run: Readonly<ExecutionRun>) => void;
}

export interface RunOptions {
  /** Append a time-derived suffix to the id so a finished run can be repeated */
  force?: boolean;
  /** File path or stream receiving the formatted result */
  output?: string | Writable;
}

interface TerminalObservation {
  record: StateRecord | undefined;
  state: TerminalState;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Nanosecond-resolution suffix derived from `nowMs`. */
export function forceSuffix(nowMs: number): string {
  return `_force-${(BigInt(Math.trunc(nowMs)) * 1000000n).toString()}`;
}

async function readSource(source: string | Readable): Promise<string> {
  if (typeof source === 'string') {
    return fs.promises.readFile(source, 'utf8');
  }
  return readStream(source);
}

export class WorkflowRunner {
  private readonly clientFactory: ClientFactory;
  private readonly pollIntervalMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: RunLogger;

  constructor(private readonly options: WorkflowRunnerOptions = {}) {
    this.clientFactory = options.clientFactory ?? createExecutionClient;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL * 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async run(deployment: Deployment, source: string | Readable, runOptions: RunOptions = {}): Promise<RunResult> {
    const run: ExecutionRun = { deployment: deployment.name, phase: 'INIT', state: 'INIT', polls: 0 };
    this.transition(run, 'INIT');

    const payload = parsePayload(await readSource(source));
    let id = payloadId(payload, { setIfMissing: true });
    if (runOptions.force) {
      run.forceSuffix = forceSuffix(this.now());
      id += run.forceSuffix;
      payload.id = id;
    }
    run.payloadId = id;

    const client = await this.clientFactory(deployment, { envPrefix: this.options.envPrefix });

    this.logger.info(`Submitting ${id} to ${deployment.name}`);
    const submission = await submitPayload(client, client.resources, JSON.stringify(payload), {
      logger: this.logger,
    });
    this.logger.debug(`Queue response: ${JSON.stringify(submission.receipt.raw)}`);
    this.transition(run, 'SUBMITTED');

    const { record, state } = await this.poll(client, run, id);

    let result: RunResult;
    if (state === 'COMPLETED') {
      result = await this.resolveOutput(client, id);
    } else {
      run.lastError = record?.last_error ?? LAST_ERROR_PLACEHOLDER;
      result = { last_error: run.lastError };
    }
    run.result = result;
    this.transition(run, state);

    if (runOptions.output !== undefined) {
      await this.writeOutput(runOptions.output, result);
    }
    return result;
  }

  private async poll(client: BoundExecutionClient, run: ExecutionRun, id: string): Promise<TerminalObservation> {
    const signal = this.options.signal;
    const timeoutMs = this.options.timeoutMs;
    const started = this.now();
    this.transition(run, 'POLLING');

    while (true) {
      if (signal?.aborted) {
        throw new RunCancelledError(id, run.state);
      }
      try {
        await this.sleep(this.pollIntervalMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new RunCancelledError(id, run.state);
        }
        throw error;
      }

      let record: StateRecord | undefined;
      try {
        record = await client.getStatusRecord(id);
      } catch (error) {
        throw new PollingReadError(id, `Could not read state of ${id}: ${getErrorMessage(error)}`, {
          cause: error,
        });
      }
      const state = parseStateToken(record);
      run.polls += 1;
      run.state = state;
      this.logger.debug(`State of ${id}: ${state}`);

      if (isTerminalState(state)) {
        return { record, state };
      }
      if (timeoutMs !== undefined && this.now() - started >= timeoutMs) {
        throw new RunTimeoutError(id, timeoutMs, run.state);
      }
    }
  }

  private async resolveOutput(client: BoundExecutionClient, id: string): Promise<RunResult> {
    const arn = await client.getExecutionArnFor(id);
    const execution = await client.describeExecution(arn);
    if (execution.output === undefined) {
      throw new InvalidPayloadError(`Execution ${arn} completed without recorded output`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(execution.output);
    } catch (error) {
      throw new InvalidPayloadError(`Output of ${arn} is not JSON: ${getErrorMessage(error)}`, { cause: error });
    }

    const output = await resolvePayloadPointer(client, parsed);
    if (!isPlainObject(output)) {
      throw new InvalidPayloadError(`Output of ${arn} is not a JSON object`);
    }
    return output;
  }

  private async writeOutput(output: string | Writable, result: RunResult): Promise<void> {
    const text = formatJson(result);
    if (typeof output === 'string') {
      await fs.promises.writeFile(output, text, 'utf8');
    } else {
      await writeToStream(output, text);
    }
  }

  private transition(run: ExecutionRun, phase: RunPhase): void {
    run.phase = phase;
    this.options.onTransition?.({ ...run });
  }
}
