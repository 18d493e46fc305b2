/**
 * Error types used by the tool gateway
 */

/**
 * Caller-facing tool failure. The message is everything the caller gets:
 * plain text, or serialized JSON when the failure carried a structured
 * provider diagnostic.
 */
export class ToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolError';
  }
}

/**
 * Arguments were missing or malformed. Raised before any provider call.
 */
export class ValidationError extends ToolError {
  readonly argument: string | undefined;

  constructor(message: string, argument?: string) {
    super(message);
    this.name = 'ValidationError';
    this.argument = argument;
  }
}

export class MissingArgumentError extends ValidationError {
  readonly arguments: readonly string[];

  constructor(...names: [string, ...string[]]) {
    super(
      names.length === 1
        ? `Missing required argument: ${names[0]}`
        : `Missing required arguments: ${names.join(', ')}`,
      names[0]
    );
    this.name = 'MissingArgumentError';
    this.arguments = names;
  }
}

export class InvalidArgumentError extends ValidationError {
  constructor(message: string, argument?: string) {
    super(message, argument);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A describe-by-identifier call succeeded but matched nothing.
 */
export class NotFoundError extends ToolError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The provider rejected a request and said why.
 */
export class ProviderError extends Error {
  readonly code: string;
  readonly diagnostic: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, diagnostic?: Record<string, unknown>) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
    this.diagnostic = diagnostic ?? { code, message };
  }
}

export class DuplicateToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}
