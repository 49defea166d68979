/**
 * Resolves a stack's operational configuration (queue URL, state table,
 * payload bucket, log level, ...) from the environment of its process
 * function.
 */

import { GetFunctionConfigurationCommand } from '@aws-sdk/client-lambda';
import type { AwsSession } from '../aws/session.js';
import { PROCESS_FUNCTION_SUFFIX } from '../constants.js';
import { NotFoundError, RemoteResolutionError } from '../errors.js';
import { getErrorMessage, hasErrorName } from '../utils/error-utils.js';
import type { EnvMapping } from './env-file.js';

export interface ConfigResolver {
  /**
   * Fails with NotFoundError when the stack's function does not exist and
   * with RemoteResolutionError for anything else that goes wrong.
   */
  getOperationalConfig(stackname: string, session: AwsSession): Promise<EnvMapping>;
}

export function processFunctionName(stackname: string): string {
  return `${stackname}${PROCESS_FUNCTION_SUFFIX}`;
}

export class LambdaConfigResolver implements ConfigResolver {
  async getOperationalConfig(stackname: string, session: AwsSession): Promise<EnvMapping> {
    const functionName = processFunctionName(stackname);

    let variables: Record<string, string> | undefined;
    try {
      const response = await session.lambda.send(
        new GetFunctionConfigurationCommand({ FunctionName: functionName })
      );
      variables = response.Environment?.Variables;
    } catch (error) {
      if (hasErrorName(error, 'ResourceNotFoundException')) {
        throw new NotFoundError(`Stack function not found: ${functionName}`, 'stack', functionName, [], [], {
          cause: error,
        });
      }
      throw new RemoteResolutionError(
        stackname,
        `Could not read configuration of ${functionName}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    if (!variables) {
      throw new RemoteResolutionError(stackname, `Function ${functionName} has no environment variables`);
    }

    return { ...variables };
  }
}
