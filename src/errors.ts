import type { SampleErrorKind } from "./types.js";

export type ErrorKind = SampleErrorKind | "config" | "archive" | "not_found";

export abstract class AmmeterError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Device I/O
// ---------------------------------------------------------------------------

export class ConnectionError extends AmmeterError {
  readonly kind = "connection" as const;
}

export class TimeoutError extends AmmeterError {
  readonly kind = "timeout" as const;
}

export class ProtocolError extends AmmeterError {
  readonly kind = "protocol" as const;
}

export class ParseError extends AmmeterError {
  readonly kind = "parse" as const;
}

export type DeviceError = ConnectionError | TimeoutError | ProtocolError | ParseError;

export function isDeviceError(err: unknown): err is DeviceError {
  return (
    err instanceof ConnectionError ||
    err instanceof TimeoutError ||
    err instanceof ProtocolError ||
    err instanceof ParseError
  );
}

/** Connection and timeout failures are worth another attempt. */
export function isTransient(err: unknown): err is ConnectionError | TimeoutError {
  return err instanceof ConnectionError || err instanceof TimeoutError;
}

// ---------------------------------------------------------------------------
// Configuration / archive
// ---------------------------------------------------------------------------

export class ConfigError extends AmmeterError {
  readonly kind = "config" as const;

  constructor(readonly issues: string[]) {
    super(`invalid sampling config: ${issues.join("; ")}`);
  }
}

export class ArchiveError extends AmmeterError {
  readonly kind: "archive" | "not_found" = "archive";
}

export class NotFoundError extends ArchiveError {
  override readonly kind = "not_found" as const;

  constructor(readonly runId: string) {
    super(`run not found: ${runId}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
