export type CostMcpErrorCode =
  | "PROCESS_START"
  | "HANDSHAKE"
  | "PROTOCOL"
  | "BROKEN_PIPE"
  | "INVALID_CALL"
  | "TOOL_EXECUTION"
  | "CONFIG";

export class CostMcpError extends Error {
  readonly code: CostMcpErrorCode;

  constructor(code: CostMcpErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The server executable could not be located or spawned. */
export class ProcessStartError extends CostMcpError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("PROCESS_START", message, options);
  }
}

/** The initialize exchange was rejected, or the session is not ready. */
export class HandshakeError extends CostMcpError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("HANDSHAKE", message, options);
  }
}

/** A wire message could not be parsed, was uncorrelated, or never arrived. */
export class ProtocolError extends CostMcpError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("PROTOCOL", message, options);
  }
}

export class BrokenPipeError extends CostMcpError {
  constructor(message = "MCP server connection lost. Please try again.", options?: {cause?: unknown}) {
    super("BROKEN_PIPE", message, options);
  }
}

export class InvalidCallError extends CostMcpError {
  constructor(message: string) {
    super("INVALID_CALL", message);
  }
}

/** The server answered with a JSON-RPC error or an isError tool result. */
export class ToolExecutionError extends CostMcpError {
  constructor(message: string) {
    super("TOOL_EXECUTION", message);
  }
}

export class ConfigError extends CostMcpError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
