import type { ErrorInfo, TrialConfig } from "./types.js";

export type HarnessErrorCode =
  | "E_CONFIG_INVALID"
  | "E_TRIAL_CONFIG"
  | "E_SWEEP_AXIS_LENGTH"
  | "E_SWEEP_PARAM_DUPLICATE"
  | "E_SWEEP_PARAM_MISSING"
  | "E_SWEEP_VALUE"
  | "E_SWEEP_UNKNOWN"
  | "E_LAUNCH_SPAWN"
  | "E_MISSING_TRACE_FILE"
  | "E_MALFORMED_TRACE";

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = "HarnessError";
    this.code = code;
    this.details = details;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, explain: this.message, details: this.details };
  }
}

export class ConfigError extends HarnessError {
  constructor(code: "E_CONFIG_INVALID" | "E_TRIAL_CONFIG", message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = "ConfigError";
  }
}

export class SweepError extends HarnessError {
  constructor(
    code: "E_SWEEP_AXIS_LENGTH" | "E_SWEEP_PARAM_DUPLICATE" | "E_SWEEP_PARAM_MISSING" | "E_SWEEP_VALUE" | "E_SWEEP_UNKNOWN",
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(code, message, details);
    this.name = "SweepError";
  }
}

export class LaunchError extends HarnessError {
  constructor(message: string, details: Record<string, unknown>, cause: unknown) {
    super("E_LAUNCH_SPAWN", message, details, { cause });
    this.name = "LaunchError";
  }
}

/**
 * A trial that cannot produce a result: the engine exited cleanly but its
 * trace is missing or does not decode. Aborts that trial only.
 */
export class TrialError extends HarnessError {
  readonly config: TrialConfig;
  readonly wallSeconds: number;

  constructor(
    code: "E_MISSING_TRACE_FILE" | "E_MALFORMED_TRACE",
    message: string,
    config: TrialConfig,
    wallSeconds: number,
    details: Record<string, unknown>,
    cause: unknown
  ) {
    super(code, message, { ...details, config }, { cause });
    this.name = "TrialError";
    this.config = config;
    this.wallSeconds = wallSeconds;
  }
}
