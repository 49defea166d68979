import * as fs from 'fs';
import * as path from 'path';
import { nextTimestamp } from '../../../src/deployment/deployment.js';
import { RemoteResolutionError, NotFoundError } from '../../../src/errors.js';
import { createTestStore, TEST_ENV, type TestStore } from '../../helpers/fakes.js';

describe('Deployment', () => {
  let t: TestStore;

  beforeEach(() => {
    t = createTestStore();
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(t.root, { recursive: true, force: true });
  });

  describe('effectiveEnv', () => {
    it('should overlay user vars only when asked', async () => {
      const deployment = await t.store.create('dev');
      deployment.addUserVar('STATE_DB', 'override-state');
      deployment.addUserVar('EXTRA', 'yes');

      expect(deployment.effectiveEnv()).toEqual(TEST_ENV);
      expect(deployment.effectiveEnv(true)).toEqual({ ...TEST_ENV, STATE_DB: 'override-state', EXTRA: 'yes' });
    });

    it('should return a fresh object each call', async () => {
      const deployment = await t.store.create('dev');

      const env = deployment.effectiveEnv(true);
      env.STATE_DB = 'mutated';

      expect(deployment.effectiveEnv(true).STATE_DB).toBe('test-state');
    });
  });

  describe('user vars', () => {
    it('should persist only when save is requested', async () => {
      await t.store.create('dev');
      const deployment = t.store.load('dev');

      deployment.addUserVar('UNSAVED', '1');
      expect(t.store.load('dev').userVars).toEqual({});

      deployment.addUserVar('SAVED', '2', { save: true });
      expect(t.store.load('dev').userVars).toEqual({ UNSAVED: '1', SAVED: '2' });
    });

    it('should treat deleting a missing var as a no-op', async () => {
      const deployment = await t.store.create('dev');
      deployment.addUserVar('A', '1');

      deployment.delUserVar('MISSING', { save: true });
      deployment.delUserVar('A', { save: true });

      expect(t.store.load('dev').userVars).toEqual({});
    });

    it('should add vars from an env file', async () => {
      const deployment = await t.store.create('dev');
      const file = path.join(t.root, 'vars.env');
      fs.writeFileSync(file, "GREETING='hello there'\nCOUNT=3\n");

      deployment.addUserVarsFromFile(file, { save: true });

      expect(t.store.load('dev').userVars).toEqual({ GREETING: 'hello there', COUNT: '3' });
    });
  });

  describe('refresh', () => {
    it('should replace the environment, keep user vars and bump updated', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T10:00:00.000Z'));
      const deployment = await t.store.create('dev');
      deployment.addUserVar('KEEP', 'me', { save: true });
      t.resolver.stacks[deployment.stackname] = { STATE_DB: 'new-state' };

      await deployment.refresh();

      expect(deployment.environment).toEqual({ STATE_DB: 'new-state' });
      expect(deployment.userVars).toEqual({ KEEP: 'me' });
      expect(deployment.updated).toBe('2024-05-01T10:00:00.001Z');
      expect(deployment.created).toBe('2024-05-01T10:00:00.000Z');

      const reloaded = t.store.load('dev');
      expect(reloaded.environment).toEqual({ STATE_DB: 'new-state' });
      expect(reloaded.updated).toBe('2024-05-01T10:00:00.001Z');
    });

    it('should rebind to another stack', async () => {
      const deployment = await t.store.create('dev');

      await deployment.refresh({ stackname: 'other-stack' });

      expect(deployment.stackname).toBe('other-stack');
      expect(deployment.environment.STATE_DB).toBe('other-state');
      expect(t.store.load('dev').stackname).toBe('other-stack');
    });

    it('should open a session for a new profile', async () => {
      const deployment = await t.store.create('dev');
      t.openSession.mockClear();

      await deployment.refresh({ profile: 'test-profile' });

      expect(t.openSession).toHaveBeenCalledWith('test-profile');
      expect(deployment.profile).toBe('test-profile');
      expect((await deployment.getSession()).profile).toBe('test-profile');
    });

    it('should release the previous session when the profile changes', async () => {
      const deployment = await t.store.create('dev');
      const first = await deployment.getSession();
      const destroy = vi.spyOn(first, 'destroy');

      await deployment.refresh({ profile: 'test-profile' });

      const second = await deployment.getSession();
      expect(destroy).toHaveBeenCalledTimes(1);
      expect(second).not.toBe(first);
      expect(second.profile).toBe('test-profile');
    });

    it('should keep the session when the profile is unchanged', async () => {
      const deployment = await t.store.create('dev');
      const first = await deployment.getSession();
      const destroy = vi.spyOn(first, 'destroy');

      await deployment.refresh();

      expect(destroy).not.toHaveBeenCalled();
      expect(await deployment.getSession()).toBe(first);
    });

    it('should leave everything untouched when resolution fails', async () => {
      const deployment = await t.store.create('dev');
      const before = fs.readFileSync(t.store.pathFor('dev'), 'utf8');
      const snapshot = deployment.toRecord();
      t.resolver.failWith = new Error('Rate exceeded');

      await expect(deployment.refresh({ profile: 'test-profile' })).rejects.toThrow(RemoteResolutionError);

      expect(deployment.toRecord()).toEqual(snapshot);
      expect(fs.readFileSync(t.store.pathFor('dev'), 'utf8')).toBe(before);
    });

    it('should wrap a vanished stack in RemoteResolutionError', async () => {
      const deployment = await t.store.create('dev');

      try {
        await deployment.refresh({ stackname: 'missing-stack' });
        expect.unreachable('refresh should have thrown');
      } catch (error) {
        expect(RemoteResolutionError.isRemoteResolutionError(error)).toBe(true);
        if (RemoteResolutionError.isRemoteResolutionError(error)) {
          expect(error.stackname).toBe('missing-stack');
          expect(error.cause).toBeInstanceOf(NotFoundError);
        }
      }
      expect(deployment.stackname).toBe(`${t.project.name}-dev`);
    });
  });

  describe('getSession', () => {
    it('should open one session per instance', async () => {
      await t.store.create('dev');
      const deployment = t.store.load('dev');
      t.openSession.mockClear();

      const [a, b] = await Promise.all([deployment.getSession(), deployment.getSession()]);

      expect(a).toBe(b);
      expect(t.openSession).toHaveBeenCalledTimes(1);
    });

    it('should not cache a failed open', async () => {
      const deployment = await t.store.create('dev');
      t.openSession.mockRejectedValueOnce(new Error('no credentials'));

      await expect(deployment.getSession()).rejects.toThrow('no credentials');
      await expect(deployment.getSession()).resolves.toBeDefined();
    });
  });

  describe('execEnv / exec', () => {
    it('should build an explicit mapping without touching process.env', async () => {
      const deployment = await t.store.create('dev', { profile: 'test-profile' });
      deployment.addUserVar('EXTRA', 'yes');
      const before = { ...process.env };

      const env = deployment.execEnv({}, { PATH: '/usr/bin' });

      expect(env).toEqual({ PATH: '/usr/bin', ...TEST_ENV, EXTRA: 'yes', AWS_PROFILE: 'test-profile' });
      expect(process.env).toEqual(before);
    });

    it('should use only the deployment environment when isolated', async () => {
      const deployment = await t.store.create('dev', { profile: 'test-profile' });
      deployment.addUserVar('EXTRA', 'yes');

      expect(deployment.execEnv({ isolated: true, includeUserVars: false }, { PATH: '/usr/bin' })).toEqual(TEST_ENV);
    });

    it('should run a command with the deployment environment', async () => {
      const deployment = await t.store.create('dev');

      const code = await deployment.exec([
        process.execPath,
        '-e',
        'process.exit(process.env.STATE_DB === "test-state" ? 0 : 7)',
      ]);

      expect(code).toBe(0);
    });

    it('should resolve with a non-zero exit code', async () => {
      const deployment = await t.store.create('dev');

      await expect(deployment.exec([process.execPath, '-e', 'process.exit(3)'], { isolated: true })).resolves.toBe(3);
    });
  });
});

describe('nextTimestamp', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should use the clock when it has moved on', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:05.000Z'));
    expect(nextTimestamp('2024-05-01T10:00:00.000Z')).toBe('2024-05-01T10:00:05.000Z');
  });

  it('should step past a timestamp from the future', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:00.000Z'));
    expect(nextTimestamp('2024-06-01T00:00:00.000Z')).toBe('2024-06-01T00:00:00.001Z');
  });
});
