/**
 * Init command - create the project dot-directory
 */

import * as path from 'path';
import { Project } from '../../project/project.js';
import { logger } from '../utils/logger.js';

export function initCommand(dir: string | undefined, env: NodeJS.ProcessEnv = process.env): Project {
  const project = Project.init(path.resolve(dir ?? '.'), env);
  logger.success(`Initialized wfdeploy project in ${project.dotDir}`);
  logger.info(`Edit ${project.configPath} to set the stack name template and region`);
  return project;
}
