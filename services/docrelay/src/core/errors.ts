/**
 * Error taxonomy shared by the HTTP and socket services.
 *
 * Every class carries the HTTP status it maps to and whether the caller may retry.
 * Socket-side errors also carry the WebSocket close code used when a session ends
 * because of them.
 */

export type ErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'SUBSCRIBER_DISCONNECTED'
  | 'HANDSHAKE_FAILURE'
  | 'PROTOCOL_VIOLATION'
  | 'IDLE_TIMEOUT'
  | 'CONFIG'
  | 'RATE_LIMITED'
  | 'INTERNAL';

export const CloseCodes = {
  normal: 1000,
  goingAway: 1001,
  sendFailure: 1011,
  idleTimeout: 4000,
  subscriberDisconnected: 4001,
  handshakeFailure: 4002,
  protocolViolation: 4003,
} as const;

export type CloseCode = (typeof CloseCodes)[keyof typeof CloseCodes];

export class DocRelayError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { statusCode?: number; retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }
}

/** Transient store failure; retried by the gateway, surfaced as 503 once retries run out. */
export class StoreUnavailableError extends DocRelayError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, { statusCode: 503, retryable: true, cause });
  }
}

/** Optimistic revision mismatch. Never retried by the gateway. */
export class ConflictError extends DocRelayError {
  readonly resource: string;
  readonly expectedRevision: number;
  readonly actualRevision: number | null;

  constructor(resource: string, expectedRevision: number, actualRevision: number | null) {
    super(
      'CONFLICT',
      `Resource ${resource} is at revision ${actualRevision ?? 'none'}, expected ${expectedRevision}`,
      { statusCode: 409, details: { resource, expectedRevision, actualRevision } }
    );
    this.resource = resource;
    this.expectedRevision = expectedRevision;
    this.actualRevision = actualRevision;
  }
}

export class NotFoundError extends DocRelayError {
  readonly resource: string;

  constructor(resource: string) {
    super('NOT_FOUND', `Resource ${resource} not found`, { statusCode: 404, details: { resource } });
    this.resource = resource;
  }
}

export class ValidationError extends DocRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION', message, { statusCode: 400, details });
  }
}

/** Raised on a subscriber whose buffer overflowed; the client must reconnect and resubscribe. */
export class SubscriberDisconnectedError extends DocRelayError {
  readonly resource: string;

  constructor(resource: string, bufferLimit: number) {
    super('SUBSCRIBER_DISCONNECTED', `Subscriber to ${resource} exceeded ${bufferLimit} buffered events`, {
      statusCode: 503,
      retryable: true,
      details: { resource, bufferLimit },
    });
    this.resource = resource;
  }
}

export class HandshakeError extends DocRelayError {
  constructor(message: string) {
    super('HANDSHAKE_FAILURE', message, { statusCode: 400 });
  }
}

export class ProtocolViolationError extends DocRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PROTOCOL_VIOLATION', message, { statusCode: 400, details });
  }
}

export class IdleTimeoutError extends DocRelayError {
  constructor(idleMs: number) {
    super('IDLE_TIMEOUT', `No heartbeat for ${idleMs}ms`, { statusCode: 408 });
  }
}

export class ConfigError extends DocRelayError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function isDocRelayError(error: unknown): error is DocRelayError {
  return error instanceof DocRelayError;
}
