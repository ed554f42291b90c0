/**
 * Error types raised by the ONDD IPC client.
 *
 * Transport failures, protocol violations and record mapping failures each
 * have their own class so callers can decide what to retry.
 *
 * @module ipc/errors
 */

/**
 * Base error class for all client errors.
 */
export class OnddError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OnddError';
  }
}

/**
 * Error thrown when the socket cannot be opened, drops, or a read/write fails.
 */
export class ConnectionError extends OnddError {
  /** Endpoint the connection was made to, when known */
  readonly endpoint?: string;

  constructor(message: string, endpoint?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
  }
}

/**
 * Error thrown when no complete response arrives in time.
 *
 * The connection has already been closed when this is raised.
 */
export class TimeoutError extends OnddError {
  readonly timeoutMs: number;
  readonly command?: string;

  constructor(timeoutMs: number, command?: string) {
    super(
      command
        ? `No response to ${command} within ${timeoutMs}ms`
        : `No response within ${timeoutMs}ms`
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.command = command;
  }
}

/**
 * Error thrown when the caller cancels a pending exchange.
 */
export class AbortError extends OnddError {
  readonly command?: string;

  constructor(command?: string, options?: ErrorOptions) {
    super(command ? `${command} aborted` : 'Operation aborted', options);
    this.name = 'AbortError';
    this.command = command;
  }
}

/**
 * Details attached to a {@link MalformedResponseError}.
 */
export interface MalformedResponseDetails {
  /** Command whose response was being decoded */
  command?: string;
  /** 1-based line number of the offending line */
  line?: number;
  /** The offending raw line */
  raw?: string;
  /** Underlying decoder failure */
  cause?: unknown;
}

/**
 * Error thrown when response bytes violate the stanza grammar.
 */
export class MalformedResponseError extends OnddError {
  readonly command?: string;
  readonly line?: number;
  readonly raw?: string;

  constructor(message: string, details: MalformedResponseDetails = {}) {
    super(details.command ? `${details.command}: ${message}` : message, { cause: details.cause });
    this.name = 'MalformedResponseError';
    this.command = details.command;
    this.line = details.line;
    this.raw = details.raw;
  }
}

/**
 * Error thrown when a stanza lacks a field its record kind requires.
 */
export class MissingFieldError extends OnddError {
  /** Record kind being mapped (e.g. "CacheInfo") */
  readonly kind: string;
  /** Record field name */
  readonly field: string;
  /** Protocol key looked up in the stanza */
  readonly key: string;

  constructor(kind: string, field: string, key: string) {
    super(`${kind}.${field}: missing required key "${key}"`);
    this.name = 'MissingFieldError';
    this.kind = kind;
    this.field = field;
    this.key = key;
  }
}

/**
 * Error thrown when a raw value cannot be coerced to its field's type.
 */
export class FieldTypeError extends OnddError {
  readonly kind: string;
  readonly field: string;
  readonly key: string;
  /** The raw value that failed coercion */
  readonly raw: string;
  readonly reason: string;

  constructor(kind: string, field: string, key: string, raw: string, reason: string) {
    super(`${kind}.${field}: invalid value ${JSON.stringify(raw)} for key "${key}" (${reason})`);
    this.name = 'FieldTypeError';
    this.kind = kind;
    this.field = field;
    this.key = key;
    this.raw = raw;
    this.reason = reason;
  }
}

/**
 * Error thrown when caller-supplied parameters fail validation.
 *
 * Raised before any I/O takes place.
 */
export class InvalidArgumentError extends OnddError {
  /** Name of the offending argument */
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(`Invalid ${argument}: ${message}`);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * Error thrown when the daemon acknowledges a control command with a failure code.
 */
export class CommandRejectedError extends OnddError {
  readonly command: string;
  readonly code: number;
  readonly detail: string;

  constructor(command: string, code: number, detail: string) {
    super(detail ? `${command} rejected (${code}): ${detail}` : `${command} rejected (${code})`);
    this.name = 'CommandRejectedError';
    this.command = command;
    this.code = code;
    this.detail = detail;
  }
}
