/**
 * Payload commands - validate, derive ids and template payloads read from stdin
 */

import type { Readable } from 'stream';
import { parsePayload, payloadId } from '../../payload/payload.js';
import { templatePayload } from '../../template/template.js';
import { buildTemplateVars, readStdin } from '../utils/io.js';
import { logger } from '../utils/logger.js';

export interface PayloadTemplateOptions {
  var?: string[];
  silenceTemplatingErrors?: boolean;
}

export async function payloadValidateCommand(input?: Readable): Promise<void> {
  parsePayload(await readStdin(input));
  logger.success('Payload is valid');
}

export async function payloadGetIdCommand(input?: Readable): Promise<void> {
  const payload = parsePayload(await readStdin(input));
  logger.log(payloadId(payload, { setIfMissing: true }));
}

export async function payloadTemplateCommand(
  files: string[],
  options: PayloadTemplateOptions,
  input?: Readable
): Promise<void> {
  const vars = buildTemplateVars({}, files, options.var);
  logger.debug(`Templating vars: ${JSON.stringify(vars)}`);
  logger.log(templatePayload(await readStdin(input), vars, { silenceErrors: options.silenceTemplatingErrors }));
}
