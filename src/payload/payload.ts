/**
 * Process payloads: the JSON documents submitted to a deployment's intake
 * queue.
 *
 * Only the fields the id derivation needs are checked; everything else is
 * carried through untouched.
 */

import { z } from 'zod';
import { InvalidPayloadError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';

const featureSchema = z
  .object({
    id: z.string().min(1),
    collection: z.string().optional(),
  })
  .passthrough();

const processDefinitionSchema = z
  .object({
    workflow: z.string().min(1),
    input_collections: z.array(z.string()).optional(),
  })
  .passthrough();

export const payloadSchema = z
  .object({
    id: z.string().min(1).optional(),
    features: z.array(featureSchema).default([]),
    process: z.union([processDefinitionSchema, z.array(processDefinitionSchema).nonempty()]),
  })
  .passthrough();

export type ProcessPayload = z.infer<typeof payloadSchema>;
export type ProcessDefinition = z.infer<typeof processDefinitionSchema>;

export function validatePayload(value: unknown): ProcessPayload {
  const result = payloadSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new InvalidPayloadError(`Invalid payload: ${issues}`);
  }
  return result.data;
}

export function parsePayload(text: string): ProcessPayload {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new InvalidPayloadError(`Payload is not valid JSON: ${getErrorMessage(error)}`, { cause: error });
  }
  return validatePayload(value);
}

/**
 * The process definition that applies to this step. Chained payloads carry
 * an array; the head is the current step.
 */
export function currentProcess(payload: ProcessPayload): ProcessDefinition {
  return Array.isArray(payload.process) ? payload.process[0] : payload.process;
}

function collectionsOf(payload: ProcessPayload, process: ProcessDefinition): string[] {
  const declared = process.input_collections;
  const collections =
    declared && declared.length > 0
      ? declared
      : payload.features.flatMap((feature) => (feature.collection ? [feature.collection] : []));
  return [...new Set(collections)].sort();
}

/**
 * `<collections>/workflow-<workflow>/<item ids>`, with collections and item
 * ids sorted and joined by `/`.
 */
export function derivePayloadId(payload: ProcessPayload): string {
  const process = currentProcess(payload);
  const collections = collectionsOf(payload, process);
  if (collections.length === 0) {
    throw new InvalidPayloadError(
      'Cannot derive a payload id: no input_collections and no feature declares a collection'
    );
  }

  const itemIds = payload.features.map((feature) => feature.id).sort();
  return `${collections.join('/')}/workflow-${process.workflow}/${itemIds.join('/')}`;
}

export interface PayloadIdOptions {
  /** Derive and store an id on the payload when it has none */
  setIfMissing?: boolean;
}

export function payloadId(payload: ProcessPayload, options: PayloadIdOptions = {}): string {
  if (payload.id) {
    return payload.id;
  }
  if (!options.setIfMissing) {
    throw new InvalidPayloadError('Payload has no id');
  }

  const id = derivePayloadId(payload);
  payload.id = id;
  return id;
}
