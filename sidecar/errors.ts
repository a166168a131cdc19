/**
 * Error types surfaced to endpoint callers.
 *
 * Each error carries a stable `code` so the HTTP layer can map it to a status
 * without string matching. Timeouts are not errors: they come back as values.
 */

// ============================================================================
// INTERFACES
// ============================================================================

export type VoiceErrorCode =
  | "INVALID_INPUT"
  | "INVALID_PARAMETER"
  | "BACKEND_UNAVAILABLE"
  | "REQUEST_REJECTED"
  | "DEVICE_ERROR"
  | "ALREADY_ACTIVE"
  | "NOT_ACTIVE";

// ============================================================================
// ERRORS
// ============================================================================

export class VoiceError extends Error {
  readonly code: VoiceErrorCode;

  constructor(code: VoiceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Empty or whitespace-only text */
export class InvalidInputError extends VoiceError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

/** Out-of-range speed, silence timeout, echo delay or an unparseable hotkey */
export class InvalidParameterError extends VoiceError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
  }
}

/** A synthesis backend or transcription engine could not serve the request */
export class BackendUnavailableError extends VoiceError {
  constructor(message: string) {
    super("BACKEND_UNAVAILABLE", message);
  }
}

/**
 * A healthy backend refused this particular request, e.g. an unknown voice.
 * Says nothing about the backend's health.
 */
export class RequestRejectedError extends VoiceError {
  constructor(message: string) {
    super("REQUEST_REJECTED", message);
  }
}

/** Microphone or speaker could not be opened or failed mid-stream */
export class DeviceError extends VoiceError {
  constructor(message: string) {
    super("DEVICE_ERROR", message);
  }
}

/** start() while the listener is already armed, recording or transcribing */
export class AlreadyActiveError extends VoiceError {
  constructor(message: string) {
    super("ALREADY_ACTIVE", message);
  }
}

/** An operation that needs an active listener was called while idle */
export class NotActiveError extends VoiceError {
  constructor(message: string) {
    super("NOT_ACTIVE", message);
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Check whether a caught value is a Node system error with a `code` property.
 *
 * @param err - The caught value
 * @param code - Optional code to match, e.g. "ENOENT"
 */
export function isErrnoError(err: unknown, code?: string): err is NodeJS.ErrnoException {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return code === undefined || err.code === code;
}

/**
 * Render a caught value as a one-line message for logs and status strings.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
