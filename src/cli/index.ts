#!/usr/bin/env node
/**
 * wfdeploy CLI
 * Manage workflow stack deployments and run workflows against them
 */

import * as fs from 'fs';
import { Command } from 'commander';
import { addDeploymentCommand, listDeploymentsCommand, removeDeploymentCommand } from './commands/deployments.js';
import { initCommand } from './commands/init.js';
import {
  addVarsCommand,
  execCommand,
  getExecutionCommand,
  getExecutionInputCommand,
  getExecutionOutputCommand,
  getPathCommand,
  getPayloadCommand,
  getStateCommand,
  processCommand,
  refreshCommand,
  runWorkflowCommand,
  setVarCommand,
  showCommand,
  templatePayloadCommand,
  unsetVarCommand,
} from './commands/manage.js';
import { payloadGetIdCommand, payloadTemplateCommand, payloadValidateCommand } from './commands/payload.js';
import { createCliContext, type CliContext, type GlobalOptions } from './utils/context.js';
import { collect } from './utils/io.js';
import { logger } from './utils/logger.js';
import { runAction } from './utils/report.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug(`Could not read package version: ${String(error)}`);
  }
  return '0.0.0-dev';
}

const program = new Command();

program
  .name('wfdeploy')
  .description('Manage workflow stack deployments and run workflows against them')
  .version(readVersion(), '-v, --version', 'Output the current version')
  .option('-C, --project <dir>', 'Look for the project from this directory instead of the working directory')
  .option('--region <region>', 'AWS region for every client')
  .option('--env-prefix <prefix>', 'Prefix of the operational variable names')
  .enablePositionalOptions();

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

function context(): CliContext {
  return createCliContext(program.opts<GlobalOptions>());
}

// Init command
program
  .command('init [dir]')
  .description('Create a .wfdeploy/ project directory')
  .action(async (dir: string | undefined) => {
    await runAction(() => {
      initCommand(dir);
    });
  });

// Deployment records
const deployments = program.command('deployments').alias('deps').description('List, add and remove deployments');

deployments
  .command('list')
  .alias('ls')
  .description('List deployment names')
  .action(async () => {
    await runAction(() => listDeploymentsCommand(context()));
  });

deployments
  .command('add <name>')
  .description("Add a deployment bound to a stack, caching the stack's configuration")
  .option('--stackname <stackname>', 'Stack to bind to (default: from the project stackName template)')
  .option('--profile <profile>', 'Credential profile (default: the default credential chain)')
  .option('-f, --force', 'Replace an existing deployment of the same name', false)
  .action(async (name: string, options) => {
    await runAction(() => addDeploymentCommand(context(), name, options));
  });

deployments
  .command('rm <name>')
  .alias('remove')
  .description('Remove a deployment record')
  .action(async (name: string) => {
    await runAction(() => removeDeploymentCommand(context(), name));
  });

// Management operations against one deployment
const manage = program
  .command('manage')
  .alias('mgmt')
  .description('Run management operations against a deployment')
  .enablePositionalOptions();

manage
  .command('show <deployment>')
  .description('Show a deployment configuration')
  .action(async (name: string) => {
    await runAction(() => showCommand(context(), name));
  });

manage
  .command('get-path <deployment>')
  .description('Print the path of the deployment record')
  .action(async (name: string) => {
    await runAction(() => getPathCommand(context(), name));
  });

manage
  .command('refresh <deployment>')
  .description('Refresh the cached environment from the stack, optionally rebinding stack or profile')
  .option('--stackname <stackname>', 'Bind to another stack')
  .option('--profile <profile>', 'Use another credential profile')
  .action(async (name: string, options) => {
    await runAction(() => refreshCommand(context(), name, options));
  });

manage
  .command('get-payload <deployment> <payload-id>')
  .description('Get a stored input payload by its ID')
  .option('-r, --raw', 'Do not pretty-format the response', false)
  .action(async (name: string, payloadId: string, options) => {
    await runAction(() => getPayloadCommand(context(), name, payloadId, options));
  });

for (const [commandName, description, handler] of [
  ['get-execution', 'Describe a workflow execution', getExecutionCommand],
  ['get-execution-input', "Get a workflow execution's input payload", getExecutionInputCommand],
  ['get-execution-output', "Get a workflow execution's output payload", getExecutionOutputCommand],
] as const) {
  manage
    .command(`${commandName} <deployment>`)
    .description(`${description}, by ARN or by payload ID (latest execution)`)
    .option('--arn <arn>', 'Execution ARN')
    .option('--payload-id <id>', 'Payload ID')
    .option('-r, --raw', 'Do not pretty-format the response', false)
    .action(async (name: string, options) => {
      await runAction(() => handler(context(), name, options));
    });
}

manage
  .command('get-state <deployment> <payload-id>')
  .description('Get the state record for a payload ID')
  .action(async (name: string, payloadId: string) => {
    await runAction(() => getStateCommand(context(), name, payloadId));
  });

manage
  .command('process <deployment>')
  .description('Enqueue a payload read from stdin for processing')
  .action(async (name: string) => {
    await runAction(() => processCommand(context(), name));
  });

manage
  .command('template-payload <deployment> [files...]')
  .description("Template a payload from stdin with the deployment's variables")
  .option('-x, --var <name=value>', 'Additional templating variable (repeatable)', collect, [])
  .option('--silence-templating-errors', 'Leave unresolved placeholders in place', false)
  .action(async (name: string, files: string[], options) => {
    await runAction(() => templatePayloadCommand(context(), name, files, options));
  });

manage
  .command('run-workflow <deployment> <payload>')
  .description('Submit a payload file and wait for the workflow to finish')
  .option('-f, --force', 'Re-run even if the payload already has a terminal state', false)
  .option('-o, --output <file>', 'Write the result to a file instead of stdout')
  .option('-t, --timeout <seconds>', 'Stop waiting after this many seconds')
  .action(async (name: string, payload: string, options) => {
    await runAction(async () => {
      const phase = await runWorkflowCommand(context(), name, payload, options);
      if (phase !== 'COMPLETED') process.exitCode = 1;
    });
  });

manage
  .command('set-var <deployment> <name> <value>')
  .description('Set a user variable')
  .action(async (name: string, variable: string, value: string) => {
    await runAction(() => setVarCommand(context(), name, variable, value));
  });

manage
  .command('unset-var <deployment> <name>')
  .description('Remove a user variable')
  .action(async (name: string, variable: string) => {
    await runAction(() => unsetVarCommand(context(), name, variable));
  });

manage
  .command('add-vars <deployment> <file>')
  .description('Add user variables from a NAME=value file')
  .action(async (name: string, file: string) => {
    await runAction(() => addVarsCommand(context(), name, file));
  });

manage
  .command('exec <deployment> <command...>')
  .description("Run a command with the deployment's environment")
  .option('--no-user-vars', 'Leave user variables out of the environment')
  .option('--isolated', 'Start from an empty environment instead of the current one', false)
  .passThroughOptions()
  .action(async (name: string, command: string[], options) => {
    await runAction(async () => {
      process.exitCode = await execCommand(context(), name, command, options);
    });
  });

// Payload utilities (stdin to stdout)
const payload = program.command('payload').description('Work with payloads read from stdin');

payload
  .command('validate')
  .description('Check that a payload has the expected shape')
  .action(async () => {
    await runAction(() => payloadValidateCommand());
  });

payload
  .command('get-id')
  .description("Print a payload's ID, deriving it when missing")
  .action(async () => {
    await runAction(() => payloadGetIdCommand());
  });

payload
  .command('template [files...]')
  .description('Template a payload with variables from env files and --var')
  .option('-x, --var <name=value>', 'Additional templating variable (repeatable)', collect, [])
  .option('--silence-templating-errors', 'Leave unresolved placeholders in place', false)
  .action(async (files: string[], options) => {
    await runAction(() => payloadTemplateCommand(files, options));
  });

program.on('--help', () => {
  logger.newline();
  logger.section('Examples');
  logger.log('  $ wfdeploy init');
  logger.log('  $ wfdeploy deployments add dev --profile dev-account');
  logger.log('  $ wfdeploy manage show dev');
  logger.log('  $ wfdeploy manage refresh dev --stackname my-stack-v2');
  logger.log('  $ wfdeploy manage run-workflow dev payload.json --force -o result.json');
  logger.log('  $ cat payload.json | wfdeploy manage process dev');
  logger.log('  $ wfdeploy manage exec dev -- aws s3 ls');
  logger.newline();
});

// Parse arguments
await program.parseAsync(process.argv);
