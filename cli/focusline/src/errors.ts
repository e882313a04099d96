export type FocusErrorCode =
  | "out_of_order_input"
  | "invalid_signal"
  | "configuration_error"
  | "session_not_found"
  | "session_limit_reached"
  | "session_not_active";

export class FocusError extends Error {
  readonly code: FocusErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: FocusErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class OutOfOrderInput extends FocusError {
  constructor(previous: number, received: number) {
    super(
      "out_of_order_input",
      `timestamp ${received} is not after previous timestamp ${previous}`,
      { previous, received }
    );
  }
}

export class InvalidSignal extends FocusError {
  constructor(field: string, reason: string, value?: unknown) {
    super("invalid_signal", `invalid signal field ${field}: ${reason}`, { field, value });
  }
}

export class ConfigurationError extends FocusError {
  constructor(field: string, reason: string, value?: unknown) {
    super("configuration_error", `invalid config ${field}: ${reason}`, { field, value });
  }
}

export class SessionError extends FocusError {
  constructor(
    code: "session_not_found" | "session_limit_reached" | "session_not_active",
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(code, message, details);
  }
}

export function isFocusError(err: unknown): err is FocusError {
  return err instanceof FocusError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
