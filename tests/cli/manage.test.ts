/**
 * Tests for the manage commands, run against a temp project with an
 * in-memory execution client.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
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
} from '../../src/cli/commands/manage.js';
import type { CliContext } from '../../src/cli/utils/context.js';
import { ConfigurationError, NotFoundError } from '../../src/errors.js';
import { captureConsole, cliContext } from '../helpers/cli.js';
import { createTestStore, FakeExecutionClient, stateRecord, type TestStore } from '../helpers/fakes.js';

const ARN = 'arn:aws:states:us-east-1:000000000000:execution:test-cog:run-1';

describe('manage commands', () => {
  let t: TestStore;
  let client: FakeExecutionClient;
  let ctx: CliContext;
  let output: ReturnType<typeof captureConsole>;

  beforeEach(async () => {
    t = createTestStore();
    client = new FakeExecutionClient();
    ctx = cliContext(t, client);
    await t.store.create('dev');
    output = captureConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(t.root, { recursive: true, force: true });
  });

  it('should fail on an unknown deployment before touching the client', async () => {
    const factory = vi.fn(ctx.clientFactory);

    await expect(getStateCommand({ ...ctx, clientFactory: factory }, 'prod', 'x')).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(factory).not.toHaveBeenCalled();
  });

  describe('show / get-path', () => {
    it('should print the record', () => {
      t.store.load('dev').addUserVar('EXTRA', 'yes', { save: true });

      showCommand(ctx, 'dev');

      expect(output.log[0]).toBe('Deployment Name: dev');
      expect(output.log).toContain(`  stackname: ${t.project.name}-dev`);
      expect(output.log).toContain('  profile: (default)');
      expect(output.log).toContain('  config_version: 1');
      expect(output.log).toContain('  STATE_DB: test-state');
      expect(output.log.slice(-2)).toEqual(['User Variables:', '  EXTRA: yes']);
    });

    it('should leave out the user variables section when there are none', () => {
      showCommand(ctx, 'dev');
      expect(output.log).not.toContain('User Variables:');
    });

    it('should print the record path', () => {
      getPathCommand(ctx, 'dev');
      expect(output.log).toEqual([path.join(t.store.dir, 'dev.json')]);
    });
  });

  describe('refresh', () => {
    it('should rebind the deployment', async () => {
      await refreshCommand(ctx, 'dev', { stackname: 'other-stack' });

      expect(t.store.load('dev').environment.STATE_DB).toBe('other-state');
      expect(output.err).toContain('✓ Refreshed dev from stack other-stack');
    });
  });

  describe('user vars', () => {
    it('should set, unset and import variables', () => {
      const file = path.join(t.root, 'vars.env');
      fs.writeFileSync(file, 'A=1\nB=2\n');

      setVarCommand(ctx, 'dev', 'C', '3');
      addVarsCommand(ctx, 'dev', file);
      unsetVarCommand(ctx, 'dev', 'A');

      expect(t.store.load('dev').userVars).toEqual({ C: '3', B: '2' });
    });
  });

  describe('get-payload', () => {
    it('should pretty-print the stored input', async () => {
      client.objects.set('s3://test-payloads/payloads/p-1/input.json', '{"id":"p-1"}');

      await getPayloadCommand(ctx, 'dev', 'p-1');

      expect(output.log).toEqual(['{\n    "id": "p-1"\n}']);
    });

    it('should print the stored text as-is with raw', async () => {
      client.objects.set('s3://test-payloads/payloads/p-1/input.json', '{"id": "p-1"}');

      await getPayloadCommand(ctx, 'dev', 'p-1', { raw: true });

      expect(output.log).toEqual(['{"id": "p-1"}']);
    });
  });

  describe('executions', () => {
    beforeEach(() => {
      client.arns.set('p-1', ARN);
      client.executions.set(ARN, {
        arn: ARN,
        status: 'SUCCEEDED',
        input: '{"id":"p-1"}',
        output: '{"id":"p-1","done":true}',
        raw: { executionArn: ARN, status: 'SUCCEEDED' },
      });
    });

    it('should describe an execution by ARN', async () => {
      await getExecutionCommand(ctx, 'dev', { arn: ARN, raw: true });
      expect(output.log).toEqual([`{"executionArn":"${ARN}","status":"SUCCEEDED"}`]);
    });

    it('should find the execution by payload id', async () => {
      await getExecutionInputCommand(ctx, 'dev', { payloadId: 'p-1', raw: true });
      await getExecutionOutputCommand(ctx, 'dev', { payloadId: 'p-1', raw: true });

      expect(output.log).toEqual(['{"id":"p-1"}', '{"id":"p-1","done":true}']);
    });

    it('should require exactly one of --arn and --payload-id', async () => {
      await expect(getExecutionCommand(ctx, 'dev', {})).rejects.toBeInstanceOf(ConfigurationError);
      await expect(getExecutionCommand(ctx, 'dev', { arn: ARN, payloadId: 'p-1' })).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });

    it('should report a running execution without output', async () => {
      client.executions.set(ARN, { arn: ARN, status: 'RUNNING', raw: {} });

      await expect(getExecutionOutputCommand(ctx, 'dev', { arn: ARN })).rejects.toThrow(
        `Execution ${ARN} has no recorded output (status RUNNING)`
      );
    });
  });

  describe('get-state', () => {
    it('should print the state record', async () => {
      client.states = [stateRecord('RUNNING')];

      await getStateCommand(ctx, 'dev', 'p-1');

      expect(JSON.parse(output.log[0])).toEqual({ state_updated: 'RUNNING_2024-05-01T10:00:00+00:00' });
    });

    it('should fail when there is no record', async () => {
      await expect(getStateCommand(ctx, 'dev', 'p-1')).rejects.toThrow('No state record for p-1');
    });
  });

  describe('process', () => {
    it('should enqueue stdin unchanged and print the receipt', async () => {
      const body = '{"id": "p-1", "process": {"workflow": "cog"}}';

      await processCommand(ctx, 'dev', Readable.from([body]));

      expect(client.messages).toEqual([{ queueUrl: client.resources.queueUrl, body }]);
      expect(output.log).toEqual(['{\n    "MessageId": "msg-1"\n}']);
    });
  });

  describe('template-payload', () => {
    it('should template with the deployment environment and user vars', async () => {
      t.store.load('dev').addUserVar('WORKFLOW', 'cog', { save: true });

      await templatePayloadCommand(ctx, 'dev', [], { var: ['EXTRA=x'] }, Readable.from(['$STATE_DB/$WORKFLOW/$EXTRA']));

      expect(output.log).toEqual(['test-state/cog/x']);
    });
  });

  describe('run-workflow', () => {
    let payloadPath: string;
    let outputPath: string;
    const noWait = { sleep: async () => undefined };

    beforeEach(() => {
      payloadPath = path.join(t.root, 'payload.json');
      outputPath = path.join(t.root, 'result.json');
      fs.writeFileSync(payloadPath, JSON.stringify({ id: 'p-1', process: { workflow: 'cog' } }));
    });

    it('should write the output and return COMPLETED', async () => {
      client.states = [stateRecord('RUNNING'), stateRecord('COMPLETED')];
      client.arns.set('p-1', ARN);
      client.executions.set(ARN, { arn: ARN, status: 'SUCCEEDED', output: '{"ok":true}', raw: {} });

      const phase = await runWorkflowCommand(ctx, 'dev', payloadPath, { output: outputPath }, noWait);

      expect(phase).toBe('COMPLETED');
      expect(fs.readFileSync(outputPath, 'utf8')).toBe('{\n  "ok": true\n}\n');
      expect(output.err).toContain(`✓ Result written to ${outputPath}`);
    });

    it('should report a failed workflow', async () => {
      client.states = [stateRecord('FAILED', { last_error: 'boom' })];

      const phase = await runWorkflowCommand(ctx, 'dev', payloadPath, { output: outputPath }, noWait);

      expect(phase).toBe('FAILED');
      expect(output.err).toContain('✗ Workflow FAILED: boom');
    });

    it('should reject a malformed timeout', async () => {
      await expect(runWorkflowCommand(ctx, 'dev', payloadPath, { timeout: 'soon' }, noWait)).rejects.toThrow(
        '--timeout must be a positive number of seconds, got "soon"'
      );
    });

    it('should remove its interrupt handler when done', async () => {
      client.states = [stateRecord('COMPLETED')];
      client.arns.set('p-1', ARN);
      client.executions.set(ARN, { arn: ARN, status: 'SUCCEEDED', output: '{}', raw: {} });
      const before = process.listenerCount('SIGINT');

      await runWorkflowCommand(ctx, 'dev', payloadPath, { output: outputPath }, noWait);

      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });

  describe('exec', () => {
    it('should return the exit code of the command', async () => {
      const code = await execCommand(ctx, 'dev', [
        process.execPath,
        '-e',
        'process.exit(process.env.STATE_DB === "test-state" ? 4 : 0)',
      ]);

      expect(code).toBe(4);
    });
  });
});
