/**
 * Error types and classifications for deployment operations
 */

/**
 * Deployment error types
 */
export enum DeploymentErrorType {
  // Missing or malformed input, raised before any side effect
  VALIDATION = 'VALIDATION',

  // Database server or container runtime unreachable after bounded retries
  RESOURCE_UNAVAILABLE = 'RESOURCE_UNAVAILABLE',

  // Database or role creation failed for a reason other than "already exists"
  PROVISIONING = 'PROVISIONING',

  // Schema state cannot be classified; an operator has to look at it
  MIGRATION_AMBIGUITY = 'MIGRATION_AMBIGUITY',

  // The new instance never reported healthy within the bound
  HEALTH_CHECK_TIMEOUT = 'HEALTH_CHECK_TIMEOUT',

  // Snapshot could not be taken, read or restored
  SNAPSHOT = 'SNAPSHOT',

  // A container runtime command exited non-zero
  RUNTIME_COMMAND = 'RUNTIME_COMMAND',

  UNKNOWN = 'UNKNOWN',
}

/**
 * Base class for every error the orchestrator raises on purpose
 */
export class DeploymentError extends Error {
  readonly type: DeploymentErrorType;
  readonly context?: Record<string, unknown>;
  readonly requiresOperator: boolean;

  constructor(
    message: string,
    type: DeploymentErrorType,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DeploymentError';
    this.type = type;
    this.context = context;
    this.requiresOperator = type === DeploymentErrorType.MIGRATION_AMBIGUITY;

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, DeploymentError.prototype);
  }

  toJSON() {
    return {
      error: this.name,
      type: this.type,
      message: this.message,
      context: this.context,
      requiresOperator: this.requiresOperator,
    };
  }
}

export class ValidationError extends DeploymentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DeploymentErrorType.VALIDATION, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ResourceUnavailableError extends DeploymentError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, DeploymentErrorType.RESOURCE_UNAVAILABLE, context, cause);
    this.name = 'ResourceUnavailableError';
    Object.setPrototypeOf(this, ResourceUnavailableError.prototype);
  }
}

export class ProvisioningError extends DeploymentError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, DeploymentErrorType.PROVISIONING, context, cause);
    this.name = 'ProvisioningError';
    Object.setPrototypeOf(this, ProvisioningError.prototype);
  }
}

export class MigrationAmbiguityError extends DeploymentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DeploymentErrorType.MIGRATION_AMBIGUITY, context);
    this.name = 'MigrationAmbiguityError';
    Object.setPrototypeOf(this, MigrationAmbiguityError.prototype);
  }
}

export class HealthCheckTimeoutError extends DeploymentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DeploymentErrorType.HEALTH_CHECK_TIMEOUT, context);
    this.name = 'HealthCheckTimeoutError';
    Object.setPrototypeOf(this, HealthCheckTimeoutError.prototype);
  }
}

export class SnapshotError extends DeploymentError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, DeploymentErrorType.SNAPSHOT, context, cause);
    this.name = 'SnapshotError';
    Object.setPrototypeOf(this, SnapshotError.prototype);
  }
}

export class RuntimeCommandError extends DeploymentError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, DeploymentErrorType.RUNTIME_COMMAND, context, cause);
    this.name = 'RuntimeCommandError';
    Object.setPrototypeOf(this, RuntimeCommandError.prototype);
  }
}

/**
 * PostgreSQL SQLSTATE codes that mean a concurrent or earlier run already
 * created the object
 */
export const ALREADY_EXISTS_CODES: readonly string[] = [
  '42P04', // duplicate_database
  '42710', // duplicate_object (role)
  '23505', // unique_violation on the system catalogs under a race
];

const UNREACHABLE_CODES: readonly string[] = [
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  '57P03', // cannot_connect_now (server starting up)
];

/**
 * Read the `code` property pg and Node attach to their errors
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function isAlreadyExistsError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && ALREADY_EXISTS_CODES.includes(code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper function to classify errors
 */
export function classifyError(error: unknown): DeploymentError {
  // If it's already a DeploymentError, return it
  if (error instanceof DeploymentError) {
    return error;
  }

  const code = getErrorCode(error);
  if (code !== undefined && UNREACHABLE_CODES.includes(code)) {
    return new ResourceUnavailableError(
      errorMessage(error),
      { code },
      error
    );
  }

  return new DeploymentError(
    errorMessage(error),
    DeploymentErrorType.UNKNOWN,
    code === undefined ? undefined : { code },
    error
  );
}
