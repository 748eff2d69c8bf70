export type MalformedTraceCode =
  | "E_TRACE_TRUNCATED"
  | "E_TRACE_COUNT"
  | "E_TRACE_KEY"
  | "E_TRACE_INTERVAL"
  | "E_TRACE_TRAILING";

export class MalformedTraceError extends Error {
  readonly code: MalformedTraceCode;
  /** Byte offset at which the offending field starts. */
  readonly offset: number;
  readonly field: string;

  constructor(code: MalformedTraceCode, message: string, offset: number, field: string) {
    super(`${message} (field ${field} at byte ${offset})`);
    this.name = "MalformedTraceError";
    this.code = code;
    this.offset = offset;
    this.field = field;
  }
}

export function isMalformedTraceError(error: unknown): error is MalformedTraceError {
  return error instanceof MalformedTraceError;
}
