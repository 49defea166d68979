/**
 * Deployment store
 *
 * Locates, lists, creates, loads, persists and deletes deployment records
 * under a project's `.wfdeploy/deployments/` directory.
 *
 * Two on-disk layouts are read:
 * - `<name>.json`: one document, environment embedded (config_version 1)
 * - `<name>/deployment.json` + `<name>/env`: the legacy split layout
 *
 * Only the single-file layout is ever written. Saving a record loaded from
 * the legacy layout writes `<name>.json` and removes the old directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createSessionFactory, type SessionFactory } from '../aws/session.js';
import {
  CONFIG_VERSION,
  DEPLOYMENT_NAME_PATTERN,
  LEGACY_CONFIG_VERSION,
  LEGACY_ENV_FILE_NAME,
  LEGACY_META_FILE_NAME,
} from '../constants.js';
import { ConfigurationError, MalformedRecordError, NotFoundError } from '../errors.js';
import type { Project } from '../project/project.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { suggestNames } from '../utils/string-distance.js';
import { Deployment, nowIsoformat, type DeploymentContext, type RecordWriter } from './deployment.js';
import { loadEnvFile } from './env-file.js';
import { LambdaConfigResolver, type ConfigResolver } from './remote-config.js';
import {
  deploymentRecordSchema,
  legacyMetaSchema,
  type CreateDeploymentOptions,
  type DeploymentRecord,
  type RecordLayout,
} from './types.js';

export interface DeploymentStoreOptions {
  openSession?: SessionFactory;
  resolver?: ConfigResolver;
}

function readJson(filePath: string): unknown {
  const text = fs.readFileSync(filePath, 'utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedRecordError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, filePath, {
      cause: error,
    });
  }
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** True when the file holds a current-layout record for `name` */
function holdsRecord(filePath: string, name: string): boolean {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch {
    return false;
  }
  const result = deploymentRecordSchema.safeParse(data);
  return result.success && result.data.name === name;
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export class DeploymentStore implements RecordWriter {
  private readonly context: DeploymentContext;

  constructor(
    readonly project: Project,
    options: DeploymentStoreOptions = {}
  ) {
    this.context = {
      writer: this,
      openSession: options.openSession ?? createSessionFactory({ region: project.config.region }),
      resolver: options.resolver ?? new LambdaConfigResolver(),
    };
  }

  get dir(): string {
    return this.project.deploymentsDir;
  }

  /** Path of the single-file record, whether or not it exists yet */
  pathFor(name: string): string {
    return path.join(this.dir, `${name}.json`);
  }

  private legacyDirFor(name: string): string {
    return path.join(this.dir, name);
  }

  private assertValidName(name: string): void {
    if (!DEPLOYMENT_NAME_PATTERN.test(name)) {
      throw new ConfigurationError(
        `Invalid deployment name "${name}": use letters, digits, ".", "_" and "-", starting with a letter or digit`
      );
    }
  }

  /**
   * Which layout holds `name`, or null when neither does. Both at once is
   * refused rather than guessed.
   */
  layoutOf(name: string): RecordLayout | null {
    const file = isFile(this.pathFor(name));
    const dir = isFile(path.join(this.legacyDirFor(name), LEGACY_META_FILE_NAME));

    if (file && dir) {
      throw new MalformedRecordError(
        `Deployment ${name} exists in both ${this.pathFor(name)} and ${this.legacyDirFor(name)}; remove one`,
        this.pathFor(name)
      );
    }
    if (file) return 'file';
    if (dir) return 'directory';
    return null;
  }

  exists(name: string): boolean {
    return DEPLOYMENT_NAME_PATTERN.test(name) && this.layoutOf(name) !== null;
  }

  /**
   * Lazily yield deployment names in directory order, each once. Entries
   * that are not a record in either layout are skipped.
   */
  *list(): Generator<string> {
    if (!isDirectory(this.dir)) {
      return;
    }

    const seen = new Set<string>();
    const dir = fs.opendirSync(this.dir);
    try {
      let entry: fs.Dirent | null;
      while ((entry = dir.readSync()) !== null) {
        if (entry.name.startsWith('.')) continue;

        let name: string | null = null;
        if (entry.isFile() && entry.name.endsWith('.json')) {
          const stem = entry.name.slice(0, -'.json'.length);
          if (DEPLOYMENT_NAME_PATTERN.test(stem) && holdsRecord(path.join(this.dir, entry.name), stem)) {
            name = stem;
          }
        } else if (
          entry.isDirectory() &&
          DEPLOYMENT_NAME_PATTERN.test(entry.name) &&
          isFile(path.join(this.dir, entry.name, LEGACY_META_FILE_NAME))
        ) {
          name = entry.name;
        }

        if (name !== null && !seen.has(name)) {
          seen.add(name);
          yield name;
        }
      }
    } finally {
      dir.closeSync();
    }
  }

  /**
   * Resolve the stack's configuration and persist a new record.
   */
  async create(name: string, options: CreateDeploymentOptions = {}): Promise<Deployment> {
    this.assertValidName(name);

    if (!options.overwrite && this.layoutOf(name) !== null) {
      throw new ConfigurationError(`Deployment ${name} already exists`);
    }

    const stackname = options.stackname || this.project.getStackName(name);
    const profile = options.profile ?? null;

    const session = await this.context.openSession(profile);
    const environment = await this.context.resolver.getOperationalConfig(stackname, session);

    const now = nowIsoformat();
    const record: DeploymentRecord = {
      name,
      created: now,
      updated: now,
      stackname,
      profile,
      environment,
      user_vars: {},
      config_version: CONFIG_VERSION,
    };

    this.write(record);
    return new Deployment(record, this.context);
  }

  load(name: string): Deployment {
    const layout = DEPLOYMENT_NAME_PATTERN.test(name) ? this.layoutOf(name) : null;

    if (layout === null) {
      const validNames = [...this.list()].sort();
      throw NotFoundError.deployment(name, validNames, suggestNames(name, validNames));
    }

    const record = layout === 'file' ? this.readRecordFile(name) : this.readLegacyDirectory(name);
    if (record.name !== name) {
      throw new MalformedRecordError(
        `Record ${this.pathFor(name)} is named "${record.name}", expected "${name}"`,
        this.pathFor(name)
      );
    }
    return new Deployment(record, this.context);
  }

  private readRecordFile(name: string): DeploymentRecord {
    const filePath = this.pathFor(name);
    const data = readJson(filePath);

    const result = deploymentRecordSchema.safeParse(data);
    if (!result.success) {
      throw new MalformedRecordError(
        `Invalid deployment record ${filePath}: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        filePath
      );
    }
    if (result.data.config_version > CONFIG_VERSION) {
      throw new MalformedRecordError(
        `Deployment record ${filePath} has config_version ${result.data.config_version}; this release reads up to ${CONFIG_VERSION}`,
        filePath
      );
    }

    // Older single-file records are upgraded in memory; the next save persists it
    return { ...result.data, config_version: CONFIG_VERSION };
  }

  private readLegacyDirectory(name: string): DeploymentRecord {
    const dir = this.legacyDirFor(name);
    const metaPath = path.join(dir, LEGACY_META_FILE_NAME);
    const envPath = path.join(dir, LEGACY_ENV_FILE_NAME);

    const result = legacyMetaSchema.safeParse(readJson(metaPath));
    if (!result.success) {
      throw new MalformedRecordError(
        `Invalid deployment metadata ${metaPath}: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        metaPath
      );
    }
    const meta = result.data;
    if ((meta.config_version ?? LEGACY_CONFIG_VERSION) > LEGACY_CONFIG_VERSION) {
      throw new MalformedRecordError(
        `Deployment directory ${dir} declares config_version ${meta.config_version}, which does not use the directory layout`,
        metaPath
      );
    }
    if (!isFile(envPath)) {
      throw new MalformedRecordError(`Deployment directory ${dir} has no ${LEGACY_ENV_FILE_NAME} file`, envPath);
    }

    return {
      name: meta.name,
      created: meta.created,
      updated: meta.updated,
      stackname: meta.stackname,
      profile: meta.profile,
      environment: loadEnvFile(envPath),
      user_vars: meta.user_vars,
      config_version: CONFIG_VERSION,
    };
  }

  /**
   * Whole-file replace of `<name>.json`, then removal of any legacy
   * directory for the same name.
   */
  write(record: DeploymentRecord): void {
    this.assertValidName(record.name);
    writeFileAtomic(this.pathFor(record.name), JSON.stringify(record, null, 4) + '\n');

    this.removeLegacyDirectory(record.name);
  }

  private removeLegacyDirectory(name: string): void {
    const legacyDir = this.legacyDirFor(name);
    if (isFile(path.join(legacyDir, LEGACY_META_FILE_NAME))) {
      fs.rmSync(legacyDir, { recursive: true, force: true });
    }
  }

  /** Delete a record in whichever layout it is stored. Missing names are a no-op. */
  remove(name: string): void {
    this.assertValidName(name);
    fs.rmSync(this.pathFor(name), { force: true });
    this.removeLegacyDirectory(name);
  }
}
