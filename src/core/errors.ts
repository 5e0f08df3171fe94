/**
 * Error taxonomy of a scrape cycle.
 *
 * Only AuthError is fatal to a cycle. Every other error is scoped to the
 * collector that raised it and ends up as a failure outcome.
 */

export type AuthErrorKind = 'AuthRejected' | 'MalformedAuthResponse' | 'Transport';

export type ExecErrorKind = 'Unauthorized' | 'Transport' | 'EmptyOutput' | 'Cancelled';

export type ErrorKind = AuthErrorKind | ExecErrorKind | 'ParseError';

const SNIPPET_LENGTH = 80;

/**
 * Bound a piece of router output for inclusion in an error message
 */
export function snippet(text: string, maxLength = SNIPPET_LENGTH): string {
  const flattened = text.replace(/\s+/g, ' ').trim();
  if (flattened.length <= maxLength) {
    return flattened;
  }
  return `${flattened.substring(0, maxLength)}...`;
}

/**
 * Network, timeout or cancellation failure below the session and executor layers
 */
export class TransportError extends Error {
  readonly cancelled: boolean;

  constructor(message: string, cancelled = false) {
    super(message);
    this.name = 'TransportError';
    this.cancelled = cancelled;
  }
}

export class AuthError extends Error {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string) {
    super(message);
    this.name = 'AuthError';
    this.kind = kind;
  }
}

export class ExecError extends Error {
  readonly kind: ExecErrorKind;

  constructor(kind: ExecErrorKind, message: string) {
    super(message);
    this.name = 'ExecError';
    this.kind = kind;
  }
}

export class ParseError extends Error {
  readonly kind = 'ParseError' as const;
  readonly collector: string;
  readonly command: string;
  readonly context: string;

  constructor(collector: string, command: string, reason: string, offending: string) {
    const context = snippet(offending);
    super(`${collector}: ${reason} (command: ${command}, output: "${context}")`);
    this.name = 'ParseError';
    this.collector = collector;
    this.command = command;
    this.context = context;
  }
}

/**
 * Raised for a target the orchestrator cannot scrape at all
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
