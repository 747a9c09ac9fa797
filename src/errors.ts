/**
 * Structured error types for crewline.
 *
 * Error boundaries wrap failures with crewError instead of stringifying
 * e.message, so the kind, retry hint and cause survive into the logs.
 */

export type CrewErrorKind =
  | "tool_error"
  | "config_error"
  | "backend_error"
  | "rewind_error"
  | "session_error"
  | "mcp_error"
  | "cancelled";

export interface CrewError extends Error {
  kind: CrewErrorKind;
  retryable: boolean;
  provider?: string;
  agent?: string;
  cause?: unknown;
}

/**
 * Create a CrewError with structured fields.
 */
export function crewError(
  kind: CrewErrorKind,
  message: string,
  opts: {
    provider?: string;
    agent?: string;
    retryable?: boolean;
    cause?: unknown;
  } = {},
): CrewError {
  const fields: Pick<CrewError, "kind" | "retryable" | "provider" | "agent" | "cause"> = {
    kind,
    retryable: opts.retryable ?? false,
  };
  if (opts.provider) fields.provider = opts.provider;
  if (opts.agent) fields.agent = opts.agent;
  if (opts.cause !== undefined) fields.cause = opts.cause;
  return Object.assign(new Error(message), fields);
}

/**
 * Normalize an unknown thrown value into an Error.
 * Strings become the message; null and undefined become "Unknown error".
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

/**
 * Check if an error is a CrewError with structured fields.
 */
export function isCrewError(e: unknown): e is CrewError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/** True when the value is an abort raised by an AbortSignal or a cancelled turn. */
export function isAbortError(e: unknown): boolean {
  if (isCrewError(e)) return e.kind === "cancelled";
  return e instanceof Error && e.name === "AbortError";
}

/**
 * Format a CrewError for structured logging.
 */
export function errorLogFields(e: CrewError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.provider) fields.provider = e.provider;
  if (e.agent) fields.agent = e.agent;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
