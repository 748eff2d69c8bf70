import type { ProfilerDump } from "@vbench/trace-format";

export const TRIAL_PARAMS = [
  "nodeCount",
  "gpusPerNode",
  "batchSize",
  "batchesPerWorkItem",
  "tasksInQueuePerGpu",
  "loadWorkersPerNode",
] as const;

export type TrialParam = (typeof TRIAL_PARAMS)[number];

export type TrialParams = { readonly [K in TrialParam]: number };

export interface TrialConfig extends TrialParams {
  readonly videoManifest: string;
}

/** How a failed trial reports its elapsed time. */
export type FailedTrialTiming = "wall-clock" | "sentinel";

export const FAILED_TRIAL_SENTINEL = -1;

export interface ProcessExit {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly wallSeconds: number;
  readonly timedOut: boolean;
}

export interface LaunchResult extends ProcessExit {
  /** Absolute path of the trace the engine writes when it succeeds. */
  readonly traceFile: string;
}

export interface ProcessLauncher {
  run(config: TrialConfig): Promise<LaunchResult>;
}

export interface TrialSucceeded {
  readonly status: "succeeded";
  /** Engine-reported duration of the run. */
  readonly elapsedSeconds: number;
  readonly wallSeconds: number;
  readonly dump: ProfilerDump;
  readonly traceFile: string;
}

export interface TrialFailed {
  readonly status: "failed";
  /** Wall-clock seconds, or the sentinel when configured. */
  readonly elapsedSeconds: number;
  readonly wallSeconds: number;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
}

export type TrialResult = TrialSucceeded | TrialFailed;

export interface ErrorInfo {
  readonly code: string;
  readonly explain: string;
  readonly details?: Record<string, unknown>;
}

export interface TrialErrored {
  readonly status: "errored";
  readonly wallSeconds: number;
  readonly error: ErrorInfo;
}

export type TrialOutcome = TrialResult | TrialErrored;

export interface TrialRecord {
  readonly config: TrialConfig;
  readonly outcome: TrialOutcome;
}

export interface TrialExecutor {
  execute(config: TrialConfig): Promise<TrialResult>;
}
