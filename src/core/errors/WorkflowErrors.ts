/**
 * Error taxonomy for workflows, tools and generators
 */

/**
 * Base class for every failure raised while running a workflow
 */
export class WorkflowError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing configuration. Never retried.
 */
export class ConfigurationError extends WorkflowError {}

export class ToolNotFoundError extends ConfigurationError {
  constructor(public readonly toolName: string, available: string[]) {
    super(
      `Tool "${toolName}" is not registered (available: ${available.length > 0 ? available.join(', ') : 'none'})`
    );
  }
}

export class TemplateError extends ConfigurationError {}

export class ToolCallError extends WorkflowError {
  constructor(
    public readonly toolName: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Tool "${toolName}" failed: ${message}`, options);
  }
}

export class OutputParseError extends WorkflowError {}

/**
 * Failure reported by a generator backend
 */
export class GeneratorError extends WorkflowError {
  constructor(message: string, public readonly status?: number, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * The backend refused the request because of its own rate limit (HTTP 429)
 */
export class RateLimitError extends GeneratorError {
  constructor(message = 'Rate limit exceeded', options?: ErrorOptions) {
    super(message, 429, options);
  }
}

/**
 * Structural programming error: a flat-map received something that is not a list.
 * Always fatal, whatever the error mode.
 */
export class NotASequenceError extends TypeError {
  constructor(received: unknown) {
    super(`Expected an array, got ${describeValue(received)}`);
    this.name = 'NotASequenceError';
  }
}

export interface ErrorRecord {
  message: string;
}

export function toErrorRecord(error: unknown): ErrorRecord {
  return { message: error instanceof Error ? error.message : String(error) };
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
