// src/server/sync/syncErrors.ts

/**
 * Base class for every failure a sync route reports to the caller.
 *
 * `code` (also the message) is the public snake_case code and `status` the HTTP
 * status; `details` are merged into the JSON body and `headers` into the response.
 */
export class SyncError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;

  constructor(status: number, code: string, details: Record<string, string> = {}, headers: Record<string, string> = {}) {
    super(code);
    this.name = 'SyncError';
    this.status = status;
    this.code = code;
    this.details = details;
    this.headers = headers;
  }
}

/**
 * Expired, evicted or never issued. The client must start a new session.
 */
export class SyncSessionNotFoundError extends SyncError {
  constructor(sessionId: string) {
    super(410, 'session_not_found', { session_id: sessionId });
    this.name = 'SyncSessionNotFoundError';
  }
}

/**
 * Owner or client mismatch. Never retried automatically.
 */
export class SyncSessionForbiddenError extends SyncError {
  constructor(sessionId: string) {
    super(403, 'session_forbidden', { session_id: sessionId });
    this.name = 'SyncSessionForbiddenError';
  }
}

/**
 * Stored expiry passed but the record was still readable (process-local store).
 */
export class SyncSessionExpiredError extends SyncError {
  constructor(sessionId: string) {
    super(410, 'session_expired', { session_id: sessionId });
    this.name = 'SyncSessionExpiredError';
  }
}

/**
 * Shared store unreachable while configured as required.
 */
export class SyncStoreUnavailableError extends SyncError {
  constructor(readonly reason?: unknown) {
    super(503, 'session_store_unavailable');
    this.name = 'SyncStoreUnavailableError';
  }
}

export class SyncConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncConfigError';
  }
}
