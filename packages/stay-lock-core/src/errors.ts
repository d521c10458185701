export type ErrorCode = "CONFIGURATION" | "SOURCE" | "BACKEND" | "REPORT";

export class StayLockError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StayLockError";
  }
}

/** Unit is misconfigured, or its guest code is missing and cannot be provisioned. */
export class ConfigurationError extends StayLockError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

export class SourceError extends StayLockError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SOURCE", message, options);
    this.name = "SourceError";
  }
}

export class BackendError extends StayLockError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super("BACKEND", message, options);
    this.name = "BackendError";
  }
}

export class ReportError extends StayLockError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REPORT", message, options);
    this.name = "ReportError";
  }
}

export function createBackendError(status: number, body: string): BackendError {
  const detail = body.trim().slice(0, 200);
  if (status === 401 || status === 403) {
    return new BackendError(`Lock API rejected the credentials (HTTP ${status})`, status);
  }
  if (status === 404) {
    return new BackendError(`Lock API resource not found (HTTP 404)${detail ? `: ${detail}` : ""}`, status);
  }
  if (status === 429) {
    return new BackendError("Lock API rate limit exceeded (HTTP 429)", status);
  }
  return new BackendError(`Lock API returned HTTP ${status}${detail ? `: ${detail}` : ""}`, status);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
