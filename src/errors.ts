export class SubsystemLogError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SubsystemLogError";
    this.code = code;
  }
}

// ── Domain errors ──

export class SinkError extends SubsystemLogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SINK", options);
    this.name = "SinkError";
  }
}

export class ConfigError extends SubsystemLogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Wrap whatever a sink threw so the facade's error hook always sees a SinkError. */
export function toSinkError(value: unknown): SinkError {
  if (value instanceof SinkError) return value;
  return new SinkError(`Sink rejected entry: ${errorMessage(value)}`, { cause: value });
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  try {
    return String(value);
  } catch {
    // Null-prototype objects and throwing toString() have no string form
    return "Unknown error";
  }
}
