import { NotFoundError } from '../../errors.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { logger } from './logger.js';

/**
 * Print the one-line diagnostic for a failed command. An unknown deployment
 * also lists the names that do exist.
 */
export function reportCommandError(error: unknown): void {
  logger.error(`Command failed: ${getErrorMessage(error)}`);

  if (NotFoundError.isNotFoundError(error) && error.kind === 'deployment') {
    if (error.suggestions.length > 0) {
      logger.info(`Did you mean: ${error.suggestions.join(', ')}?`);
    }
    if (error.validNames.length > 0) {
      logger.info('Valid deployments:');
      for (const name of error.validNames) {
        logger.info(`    ${name}`);
      }
    } else {
      logger.info('No deployments exist yet; add one with "wfdeploy deployments add <name>"');
    }
  }
}

/**
 * Run a command action, turning any failure into a diagnostic and exit code 1.
 */
export async function runAction(action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (error) {
    reportCommandError(error);
    process.exit(1);
  }
}
