/**
 * State-store record helpers.
 *
 * The state table is keyed by the payload id split at `/workflow-`:
 *
 * ```
 * sentinel-2/workflow-cog/S2A_123/S2A_456
 * └─ collections ┘         └── itemids ──┘
 *           └ workflow ┘
 *
 * → { collections_workflow: "sentinel-2_cog", itemids: "S2A_123/S2A_456" }
 * ```
 */

import { z } from 'zod';
import { PAYLOAD_KEY_PREFIX, TERMINAL_STATES, type TerminalState } from '../constants.js';
import { InvalidPayloadError } from '../errors.js';

const WORKFLOW_MARKER = '/workflow-';

export interface StateKey {
  collections_workflow: string;
  itemids: string;
}

export const stateRecordSchema = z
  .object({
    collections_workflow: z.string().optional(),
    itemids: z.string().optional(),
    /** `<STATE>_<timestamp>`, e.g. `RUNNING_2024-05-01T10:00:00+00:00` */
    state_updated: z.string().optional(),
    last_error: z.string().optional(),
    /** Execution ARNs in the order they were started */
    executions: z.array(z.string()).optional(),
    created: z.string().optional(),
    updated: z.string().optional(),
  })
  .passthrough();

export type StateRecord = z.infer<typeof stateRecordSchema>;

export function payloadIdToKey(payloadId: string): StateKey {
  const marker = payloadId.indexOf(WORKFLOW_MARKER);
  if (marker < 0) {
    throw new InvalidPayloadError(`Payload id "${payloadId}" does not contain "${WORKFLOW_MARKER}"`);
  }

  const collections = payloadId.slice(0, marker);
  const rest = payloadId.slice(marker + WORKFLOW_MARKER.length);
  const slash = rest.indexOf('/');
  const workflow = slash < 0 ? rest : rest.slice(0, slash);
  const itemids = slash < 0 ? '' : rest.slice(slash + 1);

  return { collections_workflow: `${collections}_${workflow}`, itemids };
}

/** Where the intake stores a payload's input document. */
export function payloadIdToBucketKey(payloadId: string, bucket: string): { bucket: string; key: string } {
  return { bucket, key: `${PAYLOAD_KEY_PREFIX}/${payloadId}/input.json` };
}

/**
 * The state token of a record: the text before the first `_` of
 * `state_updated`. Missing records and fields read as `UNKNOWN`.
 */
export function parseStateToken(record: StateRecord | undefined): string {
  const stateUpdated = record?.state_updated;
  if (!stateUpdated) return 'UNKNOWN';
  return stateUpdated.split('_')[0] || 'UNKNOWN';
}

export function isTerminalState(state: string): state is TerminalState {
  return TERMINAL_STATES.some((terminal) => terminal === state);
}

/** ARN of the most recently started execution, if any. */
export function latestExecution(record: StateRecord | undefined): string | undefined {
  const executions = record?.executions ?? [];
  return executions.length > 0 ? executions[executions.length - 1] : undefined;
}
