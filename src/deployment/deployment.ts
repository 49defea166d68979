/**
 * In-memory view of one deployment record.
 *
 * Owns the cached environment snapshot, the user overrides layered over it,
 * and a lazily-opened session for the record's credential profile.
 */

import { spawn } from 'child_process';
import type { AwsSession, SessionFactory } from '../aws/session.js';
import { NotFoundError, RemoteResolutionError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { loadEnvFile, type EnvMapping } from './env-file.js';
import type { ConfigResolver } from './remote-config.js';
import type { DeploymentRecord, RefreshOptions, SaveOption } from './types.js';

/**
 * Persists whole records. Implemented by DeploymentStore.
 */
export interface RecordWriter {
  write(record: DeploymentRecord): void;
  pathFor(name: string): string;
}

export interface DeploymentContext {
  writer: RecordWriter;
  openSession: SessionFactory;
  resolver: ConfigResolver;
}

export interface ExecEnvOptions {
  /** Overlay user vars on the cached environment (default true) */
  includeUserVars?: boolean;
  /** Start from an empty environment instead of the parent process's */
  isolated?: boolean;
}

export function nowIsoformat(): string {
  return new Date().toISOString();
}

/**
 * Current time, or one millisecond past `previous` when the clock has not
 * moved beyond it, so `updated` strictly increases.
 */
export function nextTimestamp(previous: string): string {
  const now = Date.now();
  const last = Date.parse(previous);
  return new Date(Number.isNaN(last) || now > last ? now : last + 1).toISOString();
}

export class Deployment {
  readonly name: string;
  readonly created: string;
  stackname: string;
  profile: string | null;
  updated: string;
  configVersion: number;
  environment: EnvMapping;
  userVars: EnvMapping;

  private sessionPromise?: Promise<AwsSession>;
  /** The session once opened; released when a refresh switches profile */
  private session?: AwsSession;

  constructor(
    record: DeploymentRecord,
    private readonly context: DeploymentContext
  ) {
    this.name = record.name;
    this.created = record.created;
    this.updated = record.updated;
    this.stackname = record.stackname;
    this.profile = record.profile;
    this.configVersion = record.config_version;
    this.environment = { ...record.environment };
    this.userVars = { ...record.user_vars };
  }

  /** Canonical on-disk location of this record */
  get path(): string {
    return this.context.writer.pathFor(this.name);
  }

  /**
   * One session per Deployment instance, opened on first use. A failed open
   * is not cached, so the next call tries again.
   */
  getSession(): Promise<AwsSession> {
    if (!this.sessionPromise) {
      this.sessionPromise = this.context.openSession(this.profile).then(
        (session) => {
          this.session = session;
          return session;
        },
        (error: unknown) => {
          this.sessionPromise = undefined;
          throw error;
        }
      );
    }
    return this.sessionPromise;
  }

  /**
   * Re-pull the operational configuration, optionally rebinding the stack or
   * profile first. On failure nothing changes: not the bindings, not the
   * environment, not `updated`.
   */
  async refresh(options: RefreshOptions = {}): Promise<void> {
    const stackname = options.stackname || this.stackname;
    const profile = options.profile || this.profile;
    const profileChanged = profile !== this.profile;

    let session: AwsSession;
    let environment: EnvMapping;
    try {
      session = profileChanged ? await this.context.openSession(profile) : await this.getSession();
      environment = await this.context.resolver.getOperationalConfig(stackname, session);
    } catch (error) {
      if (error instanceof RemoteResolutionError) {
        throw error;
      }
      const reason = NotFoundError.isNotFoundError(error)
        ? `stack "${stackname}" no longer exists (${error.message})`
        : getErrorMessage(error);
      throw new RemoteResolutionError(stackname, `Could not refresh deployment ${this.name}: ${reason}`, {
        cause: error,
      });
    }

    this.stackname = stackname;
    if (profileChanged) {
      const previous = this.session;
      this.profile = profile;
      this.session = session;
      this.sessionPromise = Promise.resolve(session);
      if (previous && previous !== session) previous.destroy();
    }
    this.environment = { ...environment };
    this.updated = nextTimestamp(this.updated);
    this.save();
  }

  /**
   * The cached environment, with user vars winning on key collisions when
   * requested. Always a fresh object.
   */
  effectiveEnv(includeUserVars = false): EnvMapping {
    return includeUserVars ? { ...this.environment, ...this.userVars } : { ...this.environment };
  }

  addUserVar(name: string, value: string, options: SaveOption = {}): void {
    this.userVars[name] = value;
    if (options.save) this.save();
  }

  /** Removing a var that is not set is a no-op. */
  delUserVar(name: string, options: SaveOption = {}): void {
    delete this.userVars[name];
    if (options.save) this.save();
  }

  addUserVarsFromFile(filePath: string, options: SaveOption = {}): void {
    Object.assign(this.userVars, loadEnvFile(filePath));
    if (options.save) this.save();
  }

  toRecord(): DeploymentRecord {
    return {
      name: this.name,
      created: this.created,
      updated: this.updated,
      stackname: this.stackname,
      profile: this.profile,
      environment: { ...this.environment },
      user_vars: { ...this.userVars },
      config_version: this.configVersion,
    };
  }

  save(): void {
    this.context.writer.write(this.toRecord());
  }

  /**
   * Environment for a subprocess working against this deployment. Built
   * explicitly and handed to the child; `process.env` is never mutated.
   */
  execEnv(options: ExecEnvOptions = {}, parentEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    const includeUserVars = options.includeUserVars ?? true;
    const env: NodeJS.ProcessEnv = options.isolated ? {} : { ...parentEnv };
    Object.assign(env, this.effectiveEnv(includeUserVars));
    if (!options.isolated && this.profile) {
      env.AWS_PROFILE = this.profile;
    }
    return env;
  }

  /**
   * Run `command` with this deployment's environment and resolve with its
   * exit code. stdio is inherited.
   */
  exec(command: string[], options: ExecEnvOptions = {}): Promise<number> {
    const [file, ...args] = command;
    if (!file) {
      return Promise.reject(new Error('No command given'));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(file, args, { env: this.execEnv(options), stdio: 'inherit' });
      child.on('error', reject);
      child.on('close', (code, signal) => {
        resolve(code ?? (signal ? 128 : 1));
      });
    });
  }
}
