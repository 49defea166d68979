/**
 * Typed failures surfaced by the deployment store, the deployment model and
 * the workflow runner. CLI callers turn them into a one-line diagnostic and a
 * non-zero exit; library callers can branch on `code` or the `is…` guards.
 */

export type DeploymentErrorCode =
  | 'NOT_FOUND'
  | 'MALFORMED_RECORD'
  | 'TRANSPORT'
  | 'REMOTE_RESOLUTION'
  | 'POLLING_READ'
  | 'MISSING_VARIABLE'
  | 'CONFIGURATION'
  | 'INVALID_PAYLOAD'
  | 'RUN_TIMEOUT'
  | 'RUN_CANCELLED';

interface DeploymentErrorOptions {
  cause?: unknown;
}

export class DeploymentError extends Error {
  constructor(
    public readonly code: DeploymentErrorCode,
    message: string,
    options: DeploymentErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DeploymentError';
  }

  static isDeploymentError(error: unknown): error is DeploymentError {
    return error instanceof DeploymentError;
  }
}

export type NotFoundKind = 'deployment' | 'stack' | 'execution' | 'object';

/**
 * A deployment name, remote stack, execution or stored object could not be
 * resolved. `target` is the name that was looked up; for deployments,
 * `validNames` lists what does exist.
 */
export class NotFoundError extends DeploymentError {
  constructor(
    message: string,
    public readonly kind: NotFoundKind,
    public readonly target: string,
    public readonly validNames: string[] = [],
    public readonly suggestions: string[] = [],
    options: DeploymentErrorOptions = {}
  ) {
    super('NOT_FOUND', message, options);
    this.name = 'NotFoundError';
  }

  static deployment(name: string, validNames: string[], suggestions: string[] = []): NotFoundError {
    return new NotFoundError(`Deployment not found: ${name}`, 'deployment', name, validNames, suggestions);
  }

  static isNotFoundError(error: unknown): error is NotFoundError {
    return error instanceof NotFoundError;
  }
}

/** A persisted record or environment file could not be read back. */
export class MalformedRecordError extends DeploymentError {
  constructor(
    message: string,
    public readonly path: string,
    options: DeploymentErrorOptions = {}
  ) {
    super('MALFORMED_RECORD', message, options);
    this.name = 'MalformedRecordError';
  }

  static isMalformedRecordError(error: unknown): error is MalformedRecordError {
    return error instanceof MalformedRecordError;
  }
}

/** A queue, object-store or execution-detail call failed. Never retried here. */
export class TransportError extends DeploymentError {
  constructor(
    public readonly operation: string,
    message: string,
    options: DeploymentErrorOptions = {}
  ) {
    super('TRANSPORT', `${operation} failed: ${message}`, options);
    this.name = 'TransportError';
  }

  static isTransportError(error: unknown): error is TransportError {
    return error instanceof TransportError;
  }
}

/** The remote stack's operational configuration could not be queried. */
export class RemoteResolutionError extends DeploymentError {
  constructor(
    public readonly stackname: string,
    message: string,
    options: DeploymentErrorOptions = {}
  ) {
    super('REMOTE_RESOLUTION', message, options);
    this.name = 'RemoteResolutionError';
  }

  static isRemoteResolutionError(error: unknown): error is RemoteResolutionError {
    return error instanceof RemoteResolutionError;
  }
}

/** The state store could not be read while waiting for an execution. */
export class PollingReadError extends DeploymentError {
  constructor(
    public readonly payloadId: string,
    message: string,
    options: DeploymentErrorOptions = {}
  ) {
    super('POLLING_READ', message, options);
    this.name = 'PollingReadError';
  }

  static isPollingReadError(error: unknown): error is PollingReadError {
    return error instanceof PollingReadError;
  }
}

export class MissingVariableError extends DeploymentError {
  constructor(
    public readonly variable: string,
    message: string = `Missing template variable: ${variable}`
  ) {
    super('MISSING_VARIABLE', message);
    this.name = 'MissingVariableError';
  }

  static isMissingVariableError(error: unknown): error is MissingVariableError {
    return error instanceof MissingVariableError;
  }
}

export class ConfigurationError extends DeploymentError {
  constructor(message: string, options: DeploymentErrorOptions = {}) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }

  static isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError;
  }
}

export class InvalidPayloadError extends DeploymentError {
  constructor(message: string, options: DeploymentErrorOptions = {}) {
    super('INVALID_PAYLOAD', message, options);
    this.name = 'InvalidPayloadError';
  }

  static isInvalidPayloadError(error: unknown): error is InvalidPayloadError {
    return error instanceof InvalidPayloadError;
  }
}

/**
 * Raised when a bounded wait expires. The remote execution keeps running;
 * only the local observer stops.
 */
export class RunTimeoutError extends DeploymentError {
  constructor(
    public readonly payloadId: string,
    public readonly timeoutMs: number,
    public readonly lastState: string
  ) {
    super('RUN_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${payloadId} (last state: ${lastState})`);
    this.name = 'RunTimeoutError';
  }

  static isRunTimeoutError(error: unknown): error is RunTimeoutError {
    return error instanceof RunTimeoutError;
  }
}

export class RunCancelledError extends DeploymentError {
  constructor(
    public readonly payloadId: string,
    public readonly lastState: string
  ) {
    super('RUN_CANCELLED', `Stopped waiting for ${payloadId} (last state: ${lastState})`);
    this.name = 'RunCancelledError';
  }

  static isRunCancelledError(error: unknown): error is RunCancelledError {
    return error instanceof RunCancelledError;
  }
}
