/**
 * Bridge error kinds
 * Every error that can reach a client carries a stable code; `fatal` marks
 * the ones that end the connection.
 */

export type BridgeErrorCode =
  | 'FORMAT_ERROR'
  | 'BACKEND_UNAVAILABLE'
  | 'SEGMENT_TIMEOUT'
  | 'BUSY'
  | 'PROTOCOL_ERROR'
  | 'LIMIT_EXCEEDED'
  | 'RECOGNITION_ERROR';

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly fatal: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: BridgeErrorCode, fatal: boolean = false, context?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.fatal = fatal;
    this.context = context;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Audio that does not match the negotiated 16 kHz mono 16-bit contract. */
export class FormatError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FORMAT_ERROR', true, context);
  }
}

export class BackendUnavailableError extends BridgeError {
  public readonly attempts: number;

  constructor(target: string, attempts: number, cause?: Error) {
    super(
      `Recognition backend ${target} unavailable after ${attempts} attempt(s)${cause ? `: ${cause.message}` : ''}`,
      'BACKEND_UNAVAILABLE',
      false,
      { target, attempts }
    );
    this.attempts = attempts;
  }
}

export class SegmentTimeoutError extends BridgeError {
  public readonly segmentId: number;

  constructor(segmentId: number, timeoutMs: number, waitingFor: 'partial' | 'final') {
    super(
      `Segment ${segmentId} timed out after ${timeoutMs}ms waiting for ${waitingFor} result`,
      'SEGMENT_TIMEOUT',
      false,
      { segmentId, timeoutMs, waitingFor }
    );
    this.segmentId = segmentId;
  }
}

export class BusyError extends BridgeError {
  constructor(segmentId: number, queueDepth: number) {
    super(
      `Recognizer busy, segment ${segmentId} rejected (${queueDepth} segments pending), retry later`,
      'BUSY',
      false,
      { segmentId, queueDepth }
    );
  }
}

export class ProtocolError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', false, context);
  }
}

export class LimitExceededError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LIMIT_EXCEEDED', true, context);
  }
}

/** Transport failure of a backend stream while a segment was in flight. */
export class RecognitionStreamError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RECOGNITION_ERROR', false, context);
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message safe to show a client: bridge errors verbatim, anything else generic
 */
export function clientMessage(error: unknown): string {
  if (error instanceof BridgeError) {
    return error.message;
  }
  return 'Internal server error';
}
