import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../../../src/errors.js';
import { Project } from '../../../src/project/project.js';
import { makeTempDir } from '../../helpers/fakes.js';

describe('Project', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('init', () => {
    it('should create the dot-directory, deployments directory and a starter config', () => {
      const project = Project.init(root, {});

      expect(fs.statSync(project.deploymentsDir).isDirectory()).toBe(true);
      expect(fs.readFileSync(project.configPath, 'utf8')).toContain('# wfdeploy project configuration');
      expect(project.dotDir).toBe(path.join(root, '.wfdeploy'));
    });

    it('should keep an existing config', () => {
      fs.mkdirSync(path.join(root, '.wfdeploy'));
      fs.writeFileSync(path.join(root, '.wfdeploy', 'config.yaml'), 'region: eu-central-1\n');

      const project = Project.init(root, {});

      expect(project.config.region).toBe('eu-central-1');
    });
  });

  describe('resolve', () => {
    it('should walk up to the nearest project', () => {
      Project.init(root, {});
      const nested = path.join(root, 'a', 'b');
      fs.mkdirSync(nested, { recursive: true });

      const project = Project.resolve(nested, {}, {});

      expect(project.root).toBe(path.resolve(root));
    });

    it('should fail outside a project', () => {
      expect(() => Project.resolve(root, {}, {})).toThrow(ConfigurationError);
    });

    it('should pass overrides into the config', () => {
      Project.init(root, {});
      expect(Project.resolve(root, { envPrefix: 'ACME_' }, {}).config.envPrefix).toBe('ACME_');
    });
  });

  describe('getStackName', () => {
    it('should expand the template with the directory name', () => {
      fs.mkdirSync(path.join(root, '.wfdeploy'));
      fs.writeFileSync(path.join(root, '.wfdeploy', 'config.yaml'), 'stackName: "{project}-stack-{deployment}"\n');

      const project = new Project(root, {}, {});

      expect(project.getStackName('prod')).toBe(`${path.basename(root)}-stack-prod`);
    });
  });
});
