/**
 * Payload intake: puts a serialized payload on the process queue, spilling
 * it to the payload bucket when it is too large for a queue message.
 */

import { randomUUID } from 'crypto';
import { MAX_MESSAGE_BYTES, PAYLOAD_KEY_PREFIX } from '../constants.js';
import { InvalidPayloadError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import type { ExecutionClient, ExecutionResources, SubmissionReceipt } from './client.js';
import { silentLogger, type RunLogger } from './run-logger.js';

export interface SpilledPayload {
  bucket: string;
  key: string;
  url: string;
}

export interface SubmitResult {
  receipt: SubmissionReceipt;
  /** The message body actually sent: the payload, or a pointer to it */
  message: string;
  spilled?: SpilledPayload;
}

export interface SubmitOptions {
  logger?: RunLogger;
  /** Override for tests */
  maxMessageBytes?: number;
}

export function isOversized(body: string, maxMessageBytes: number = MAX_MESSAGE_BYTES): boolean {
  return Buffer.byteLength(body, 'utf8') > maxMessageBytes;
}

/**
 * Enqueue `body`. Oversized bodies are stored at `payloads/<uuid>.json` and
 * replaced by `{"url": "s3://<bucket>/<key>"}`; the consumer resolves the
 * pointer, so the substitution is transparent downstream.
 */
export async function submitPayload(
  client: ExecutionClient,
  resources: Pick<ExecutionResources, 'queueUrl' | 'payloadBucket'>,
  body: string,
  options: SubmitOptions = {}
): Promise<SubmitResult> {
  const logger = options.logger ?? silentLogger;
  let message = body;
  let spilled: SpilledPayload | undefined;

  if (isOversized(body, options.maxMessageBytes)) {
    const bucket = resources.payloadBucket;
    const key = `${PAYLOAD_KEY_PREFIX}/${randomUUID()}.json`;
    const url = `s3://${bucket}/${key}`;
    logger.warn('Message exceeds the queue message size limit.');
    logger.warn(`Uploading to '${url}'`);

    await client.putObject(bucket, key, body);
    spilled = { bucket, key, url };
    message = JSON.stringify({ url });
  }

  const receipt = await client.submit(resources.queueUrl, message);
  return { receipt, message, spilled };
}

/**
 * Split an `s3://bucket/key` URL.
 */
export function parseObjectUrl(url: string): { bucket: string; key: string } | undefined {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url);
  return match ? { bucket: match[1], key: match[2] } : undefined;
}

function isPointer(value: unknown): value is { url: string } {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0] === 'url' && 'url' in value && typeof value.url === 'string';
}

/**
 * Replace a `{ "url": "s3://..." }` pointer by the JSON document it points
 * to. Anything else is returned unchanged.
 */
export async function resolvePayloadPointer(client: ExecutionClient, value: unknown): Promise<unknown> {
  if (!isPointer(value)) {
    return value;
  }
  const location = parseObjectUrl(value.url);
  if (!location) {
    return value;
  }

  const text = await client.getObject(location.bucket, location.key);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidPayloadError(`Stored payload ${value.url} is not JSON: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}
