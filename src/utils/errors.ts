/**
 * Error types and codes for skelly.
 * Every error raised by the engine or the CLI extends SkellyError.
 */

/**
 * Base error class for all skelly errors.
 */
export class SkellyError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SkellyError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends SkellyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse errors, unreadable files).
 */
export class SystemError extends SkellyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Security errors (paths escaping the destination or template directory).
 */
export class SecurityError extends SkellyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

// Error code constants
export const ErrorCodes = {
  // Template engine errors (T001-T005)
  TEMPLATE_NOT_FOUND: 'T001',
  DESTINATION_CONFLICT: 'T002',
  FILE_WRITE: 'T003',
  MANIFEST_LOAD: 'T004',
  POST_COMMAND: 'T005',

  // Configuration errors
  CONFIG_LOAD: 'CONFIG_LOAD_ERROR',
  CONFIG_SAVE: 'CONFIG_SAVE_ERROR',
  CONFIG_KEY: 'CONFIG_UNKNOWN_KEY',
  CONFIG_VALUE: 'CONFIG_INVALID_VALUE',

  // System errors
  PARSE_ERROR: 'S001',

  // Security errors
  PATH_TRAVERSAL: 'SEC001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * The requested template is not in the catalog.
 */
export class TemplateNotFoundError extends SkellyError {
  constructor(
    public readonly templateName: string,
    public readonly available: string[] = []
  ) {
    super(ErrorCodes.TEMPLATE_NOT_FOUND, `Template '${templateName}' not found`, {
      templateName,
      available,
    });
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * The destination exists, is not empty, and overwrite was not requested.
 */
export class DestinationConflictError extends SkellyError {
  constructor(public readonly destination: string) {
    super(
      ErrorCodes.DESTINATION_CONFLICT,
      `Directory ${destination} already exists and is not empty. Use --overwrite to write into it.`,
      { destination }
    );
    this.name = 'DestinationConflictError';
  }
}

/**
 * A directory or file could not be created during materialization.
 */
export class FileWriteError extends SkellyError {
  constructor(
    public readonly filePath: string,
    message: string,
    cause?: unknown
  ) {
    super(ErrorCodes.FILE_WRITE, message, {
      filePath,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = 'FileWriteError';
  }
}

/**
 * A template manifest could not be loaded.
 * Only ever reported as a diagnostic; the catalog scan carries on.
 */
export class ManifestLoadError extends SkellyError {
  constructor(public readonly templateDir: string, message: string) {
    super(ErrorCodes.MANIFEST_LOAD, message, { templateDir });
    this.name = 'ManifestLoadError';
  }
}

/** How a post-command ended when it did not exit on its own. */
export interface PostCommandTermination {
  signal?: string;
  timedOut?: boolean;
}

function describePostCommandFailure(
  command: string,
  exitCode: number | null,
  termination: PostCommandTermination
): string {
  if (exitCode !== null) {
    return `Command exited with code ${exitCode}: ${command}`;
  }
  if (termination.timedOut) {
    return `Command timed out and was killed${termination.signal ? ` (${termination.signal})` : ''}: ${command}`;
  }
  if (termination.signal) {
    return `Command was killed by ${termination.signal}: ${command}`;
  }
  return `Command failed to start: ${command}`;
}

/**
 * A post-create command exited non-zero, was killed or could not be
 * launched. Logged as a warning; never fails project creation.
 */
export class PostCommandError extends SkellyError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    stderr: string,
    termination: PostCommandTermination = {}
  ) {
    super(ErrorCodes.POST_COMMAND, describePostCommandFailure(command, exitCode, termination), {
      command,
      exitCode,
      stderr,
      ...termination,
    });
    this.name = 'PostCommandError';
  }
}

/**
 * Extract a printable message from anything that was thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
