/**
 * Error types raised at component boundaries.
 *
 * Collaborator failures (fs, child processes, HTTP) are wrapped in one of these
 * with the original error kept as `cause`.
 */

/**
 * Missing or invalid configuration: config file, model profile or credential.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The chat-completion request failed, timed out, or returned nothing usable.
 */
export class CompletionError extends Error {
  constructor(
    message: string,
    public readonly timedOut: boolean = false,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CompletionError';
  }
}

/**
 * The model response is not valid JSON or does not match the change-set shape.
 */
export class ChangeSetParseError extends Error {
  constructor(
    message: string,
    public readonly rawResponse: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ChangeSetParseError';
  }
}

/**
 * A working-copy file could not be resolved or written.
 */
export class WorkspaceError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'WorkspaceError';
  }
}

/**
 * A git operation exited with a non-zero status or could not be started.
 */
export class GitError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly stderr: string = '',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'GitError';
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
