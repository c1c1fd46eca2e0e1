/**
 * Outcome of one tool call. Every failure is a value, never a thrown error,
 * so callers switch on `ok` and then on `failure.error`.
 */
export type CommandResult = JsonResult | TextResult | FailureResult;

export interface JsonResult {
  readonly ok: true;
  readonly kind: "json";
  readonly data: unknown;
}

export interface TextResult {
  readonly ok: true;
  readonly kind: "text";
  readonly text: string;
}

export interface FailureResult {
  readonly ok: false;
  readonly failure: FailureDescriptor;
}

// The `error` strings below are relayed verbatim to MCP clients.

export interface MissingCredential {
  readonly error: "missing credential";
  readonly details: string;
}

export interface ToolNotFound {
  readonly error: "tool not found";
  readonly details: string;
}

export interface ExecutionError {
  readonly error: "execution error";
  readonly details: string;
  readonly exit_code: number | null;
  readonly stderr: string;
  readonly stdout: string;
  readonly timed_out?: boolean;
}

export interface UnexpectedOutputShape {
  readonly error: "unexpected output shape";
  readonly details: string;
  readonly raw: string;
}

export interface UnexpectedExecutionError {
  readonly error: "unexpected execution error";
  readonly details: string;
}

/** Rejected by a tool wrapper before anything was executed. */
export interface ArgumentError {
  readonly error: "missing parameter" | "invalid parameter";
  readonly param: string;
  readonly details: string;
}

export type FailureDescriptor =
  | MissingCredential
  | ToolNotFound
  | ExecutionError
  | UnexpectedOutputShape
  | UnexpectedExecutionError
  | ArgumentError;

export function json(data: unknown): JsonResult {
  return { ok: true, kind: "json", data };
}

export function text(value: string): TextResult {
  return { ok: true, kind: "text", text: value };
}

export function failure(descriptor: FailureDescriptor): FailureResult {
  return { ok: false, failure: descriptor };
}
