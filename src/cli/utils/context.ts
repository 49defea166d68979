/**
 * What a command needs to work against the current project. Built once per
 * invocation from the global options; tests build their own.
 */

import type { SessionFactory } from '../../aws/session.js';
import type { Deployment } from '../../deployment/deployment.js';
import type { ConfigResolver } from '../../deployment/remote-config.js';
import { DeploymentStore } from '../../deployment/store.js';
import { createExecutionClient } from '../../execution/aws-client.js';
import type { BoundExecutionClient } from '../../execution/client.js';
import type { ClientFactory } from '../../execution/runner.js';
import type { CliConfigOverrides } from '../../project/config.js';
import { Project } from '../../project/project.js';

export interface CliContext {
  project: Project;
  store: DeploymentStore;
  clientFactory: ClientFactory;
}

export type GlobalOptions = {
  /** Start the project search here instead of the working directory */
  project?: string;
  region?: string;
  envPrefix?: string;
};

export interface CliContextOptions {
  env?: NodeJS.ProcessEnv;
  openSession?: SessionFactory;
  resolver?: ConfigResolver;
  clientFactory?: ClientFactory;
}

export function createCliContext(globals: GlobalOptions = {}, options: CliContextOptions = {}): CliContext {
  const overrides: CliConfigOverrides = {};
  if (globals.region) overrides.region = globals.region;
  if (globals.envPrefix !== undefined) overrides.envPrefix = globals.envPrefix;

  const project = Project.resolve(globals.project ?? process.cwd(), overrides, options.env ?? process.env);
  return {
    project,
    store: new DeploymentStore(project, { openSession: options.openSession, resolver: options.resolver }),
    clientFactory: options.clientFactory ?? createExecutionClient,
  };
}

/** Execution client for a deployment, addressed with the project's env prefix. */
export function clientFor(ctx: CliContext, deployment: Deployment): Promise<BoundExecutionClient> {
  return ctx.clientFactory(deployment, { envPrefix: ctx.project.config.envPrefix });
}
