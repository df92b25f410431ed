/**
 * Error hierarchy for the relay.
 *
 * RelayError (base, carries `code`)
 * ├── TransportError       non-2xx answer from the assistant backend
 * ├── StructuralError      backend answer did not decode
 * ├── PersistenceError     processed-events file could not be written
 * ├── PlatformLookupError  Slack thread lookup failed
 * ├── SlackSendError       Slack post failed (after admin escalation)
 * ├── RunTimeoutError      run polling exceeded its bound
 * └── ConfigError          environment did not validate
 */

export type RelayErrorCode =
  | 'TRANSPORT'
  | 'STRUCTURE'
  | 'PERSISTENCE'
  | 'PLATFORM_LOOKUP'
  | 'SLACK_SEND'
  | 'RUN_TIMEOUT'
  | 'CONFIG';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'RelayError';
  }
}

export class TransportError extends RelayError {
  readonly statusCode: number;
  readonly body: string;

  constructor(params: { operation: string; statusCode: number; body: string }) {
    super('TRANSPORT', `Failed to ${params.operation}: ${params.statusCode}, ${params.body}`);
    this.statusCode = params.statusCode;
    this.body = params.body;
    this.name = 'TransportError';
  }
}

export class StructuralError extends RelayError {
  /** Dotted path of the first field that failed to decode, when known. */
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super('STRUCTURE', message);
    this.field = field;
    this.name = 'StructuralError';
  }
}

export class PersistenceError extends RelayError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super('PERSISTENCE', `Failed to persist processed events to ${filePath}: ${errorMessage(cause)}`, { cause });
    this.filePath = filePath;
    this.name = 'PersistenceError';
  }
}

export class PlatformLookupError extends RelayError {
  constructor(detail: string, cause?: unknown) {
    super('PLATFORM_LOOKUP', `Error fetching last message: ${detail}`, { cause });
    this.name = 'PlatformLookupError';
  }
}

export class SlackSendError extends RelayError {
  readonly detail: string;

  constructor(detail: string, cause?: unknown) {
    super('SLACK_SEND', `Error sending message to Slack: ${detail}`, { cause });
    this.detail = detail;
    this.name = 'SlackSendError';
  }
}

export class RunTimeoutError extends RelayError {
  readonly threadId: string;
  readonly waitedMs: number;

  constructor(threadId: string, waitedMs: number) {
    super('RUN_TIMEOUT', `Run on thread ${threadId} did not finish within ${waitedMs}ms`);
    this.threadId = threadId;
    this.waitedMs = waitedMs;
    this.name = 'RunTimeoutError';
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
    this.name = 'ConfigError';
  }
}

/** Message of any thrown value. Node's fs errors fail `instanceof Error` under Jest's VM realm. */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
