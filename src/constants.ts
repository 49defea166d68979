/**
 * # wfdeploy constants
 *
 * Names and limits shared by the deployment store, the payload intake and
 * the workflow runner.
 *
 * ## Project layout
 *
 * ```
 * <project>/
 *   .wfdeploy/
 *     config.yaml              project configuration
 *     deployments/
 *       dev.json               current record layout (config_version 1)
 *       legacy/                legacy layout (config_version 0)
 *         deployment.json
 *         env
 * ```
 */

/** Project dot-directory, searched for upwards from the working directory */
export const PROJECT_DIR_NAME = '.wfdeploy';

export const PROJECT_CONFIG_FILE_NAME = 'config.yaml';

export const DEFAULT_DEPLOYMENTS_DIR_NAME = 'deployments';

/** Metadata document inside a legacy deployment directory */
export const LEGACY_META_FILE_NAME = 'deployment.json';

/** `NAME=value` environment file inside a legacy deployment directory */
export const LEGACY_ENV_FILE_NAME = 'env';

/** Persisted record schema version written by this release */
export const CONFIG_VERSION = 1;

/** Version assigned to records read from the legacy directory layout */
export const LEGACY_CONFIG_VERSION = 0;

/** Largest message body the intake queue accepts (SQS limit) */
export const MAX_MESSAGE_BYTES = 2 ** 18;

/** Seconds between two reads of the state store */
export const DEFAULT_POLL_INTERVAL = 5;

/** Execution states after which no further progress occurs */
export const TERMINAL_STATES = ['COMPLETED', 'FAILED', 'ABORTED'] as const;

export type TerminalState = (typeof TERMINAL_STATES)[number];

export const LAST_ERROR_PLACEHOLDER = 'last error not recorded';

/** Suffix of the function whose environment holds a stack's operational configuration */
export const PROCESS_FUNCTION_SUFFIX = '-process';

/** Object-store prefix of stored payloads (spilled messages and execution inputs) */
export const PAYLOAD_KEY_PREFIX = 'payloads';

/** Operational variable names, before the project's env prefix is applied */
export const RESOURCE_KEYS = {
  queueUrl: 'PROCESS_QUEUE_URL',
  stateTable: 'STATE_DB',
  payloadBucket: 'PAYLOAD_BUCKET',
} as const;

/** Matches names that are safe to use as a record file or directory name */
export const DEPLOYMENT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
