import * as fs from 'fs';
import * as path from 'path';
import {
  DEFAULT_DEPLOYMENTS_DIR_NAME,
  PROJECT_CONFIG_FILE_NAME,
  PROJECT_DIR_NAME,
} from '../constants.js';
import { ConfigurationError } from '../errors.js';
import {
  expandStackName,
  loadProjectConfig,
  type CliConfigOverrides,
  type ProjectConfig,
} from './config.js';

const STARTER_CONFIG = `# wfdeploy project configuration
#
# stackName: "{project}-{deployment}"
# region: us-east-1
# envPrefix: ""
# pollInterval: 5
# runTimeout: 3600
`;

/**
 * A directory holding a `.wfdeploy/` dot-directory. Deployment records and
 * project configuration are scoped to it.
 */
export class Project {
  readonly dotDir: string;
  readonly config: ProjectConfig;

  constructor(
    readonly root: string,
    overrides: CliConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.root = path.resolve(root);
    this.dotDir = path.join(this.root, PROJECT_DIR_NAME);
    this.config = loadProjectConfig(this.configPath, overrides, env);
  }

  get name(): string {
    return path.basename(this.root);
  }

  get configPath(): string {
    return path.join(this.dotDir, PROJECT_CONFIG_FILE_NAME);
  }

  get deploymentsDir(): string {
    return path.join(this.dotDir, DEFAULT_DEPLOYMENTS_DIR_NAME);
  }

  /** Stack name a new deployment binds to when none is given. */
  getStackName(deployment: string): string {
    return expandStackName(this.config.stackName, this.name, deployment);
  }

  /**
   * Walk up from `cwd` to the nearest directory containing `.wfdeploy/`.
   */
  static resolve(
    cwd: string = process.cwd(),
    overrides: CliConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
  ): Project {
    let dir = path.resolve(cwd);

    while (true) {
      const candidate = path.join(dir, PROJECT_DIR_NAME);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
        return new Project(dir, overrides, env);
      }
      const parent = path.dirname(dir);
      if (parent === dir) {
        throw new ConfigurationError(
          `Not inside a wfdeploy project (no ${PROJECT_DIR_NAME}/ found from ${cwd}); run "wfdeploy init" first`
        );
      }
      dir = parent;
    }
  }

  /**
   * Create `.wfdeploy/` with a commented starter config. Existing files are
   * left alone.
   */
  static init(dir: string, env: NodeJS.ProcessEnv = process.env): Project {
    const root = path.resolve(dir);
    const dotDir = path.join(root, PROJECT_DIR_NAME);
    fs.mkdirSync(path.join(dotDir, DEFAULT_DEPLOYMENTS_DIR_NAME), { recursive: true });

    const configPath = path.join(dotDir, PROJECT_CONFIG_FILE_NAME);
    if (!fs.existsSync(configPath)) {
      fs.writeFileSync(configPath, STARTER_CONFIG, 'utf8');
    }

    return new Project(root, {}, env);
  }
}
