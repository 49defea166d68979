/**
 * Deployment record commands: list, add, rm
 */

import type { CliContext } from '../utils/context.js';
import { logger } from '../utils/logger.js';

export interface AddDeploymentOptions {
  stackname?: string;
  profile?: string;
  force?: boolean;
}

export function listDeploymentsCommand(ctx: CliContext): void {
  for (const name of ctx.store.list()) {
    logger.log(name);
  }
}

export async function addDeploymentCommand(
  ctx: CliContext,
  name: string,
  options: AddDeploymentOptions = {}
): Promise<void> {
  const deployment = await ctx.store.create(name, {
    stackname: options.stackname,
    profile: options.profile,
    overwrite: options.force,
  });
  logger.success(`Added deployment ${deployment.name} (stack ${deployment.stackname})`);
  logger.debug(`Record written to ${deployment.path}`);
}

export function removeDeploymentCommand(ctx: CliContext, name: string): void {
  ctx.store.remove(name);
  logger.success(`Removed deployment ${name}`);
}
