/**
 * Error taxonomy for the bridge.
 *
 * Protocol errors skip a single query, transport errors send the session back
 * to reopen, bus errors drop a single publish. Only ConfigError stops startup.
 */

export type ErrorCategory = "protocol" | "transport" | "bus" | "config";

export class Pi30Error extends Error {
  public readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "Pi30Error";
    this.category = category;
  }
}

// ---------- Protocol ----------

export class FramingError extends Pi30Error {
  constructor(message: string) {
    super(message, "protocol");
    this.name = "FramingError";
  }
}

export class ChecksumError extends Pi30Error {
  public readonly expected: number;
  public readonly received: number;

  constructor(expected: number, received: number) {
    super(
      `Frame checksum mismatch: expected 0x${expected.toString(16).padStart(4, "0")}, ` +
        `received 0x${received.toString(16).padStart(4, "0")}`,
      "protocol"
    );
    this.name = "ChecksumError";
    this.expected = expected;
    this.received = received;
  }
}

/** The inverter answered `(NAK`: it does not support the command. */
export class CommandRejectedError extends Pi30Error {
  constructor(public readonly command: string) {
    super(`Inverter rejected command ${command} (NAK)`, "protocol");
    this.name = "CommandRejectedError";
  }
}

export class TokenCountError extends Pi30Error {
  constructor(
    public readonly command: string,
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`${command} response has ${received} tokens, expected ${expected}`, "protocol");
    this.name = "TokenCountError";
  }
}

export class FieldFormatError extends Pi30Error {
  constructor(
    public readonly command: string,
    public readonly field: string,
    public readonly token: string
  ) {
    super(`${command} field "${field}" cannot be parsed from token "${token}"`, "protocol");
    this.name = "FieldFormatError";
  }
}

export class ResponseTimeoutError extends Pi30Error {
  constructor(public readonly timeoutMs: number) {
    super(`No response within ${timeoutMs} ms`, "protocol");
    this.name = "ResponseTimeoutError";
  }
}

// ---------- Transport ----------

export class PortOpenError extends Pi30Error {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Cannot open serial port ${path}: ${describeError(cause)}`, "transport", { cause });
    this.name = "PortOpenError";
  }
}

export class PortIOError extends Pi30Error {
  constructor(public readonly path: string, cause?: unknown) {
    super(`I/O error on serial port ${path}: ${describeError(cause)}`, "transport", { cause });
    this.name = "PortIOError";
  }
}

// ---------- Bus ----------

export class PublishError extends Pi30Error {
  constructor(public readonly topic: string, cause?: unknown) {
    super(`Publish to ${topic} failed: ${describeError(cause)}`, "bus", { cause });
    this.name = "PublishError";
  }
}

// ---------- Config ----------

export class ConfigError extends Pi30Error {
  constructor(message: string, cause?: unknown) {
    super(message, "config", { cause });
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return "unknown error";
  return String(err);
}
