import {
  isMalformedTraceError,
  readProfilerDump,
  type ProfilerDump,
} from "@vbench/trace-format";

import { TrialError } from "./errors.js";
import {
  FAILED_TRIAL_SENTINEL,
  type FailedTrialTiming,
  type LaunchResult,
  type ProcessLauncher,
  type TrialConfig,
  type TrialExecutor,
  type TrialResult,
} from "./types.js";

export type TraceReader = (path: string) => Promise<ProfilerDump>;

export interface TrialRunnerOptions {
  failedTrialTiming?: FailedTrialTiming;
  /** Treat bytes after the eval section as a malformed trace. */
  rejectTrailingBytes?: boolean;
  readTrace?: TraceReader;
}

function isFsError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string" && "syscall" in error;
}

export class TrialRunner implements TrialExecutor {
  private readonly launcher: ProcessLauncher;
  private readonly failedTrialTiming: FailedTrialTiming;
  private readonly readTrace: TraceReader;

  constructor(launcher: ProcessLauncher, options: TrialRunnerOptions = {}) {
    this.launcher = launcher;
    this.failedTrialTiming = options.failedTrialTiming ?? "wall-clock";
    const rejectTrailingBytes = options.rejectTrailingBytes ?? false;
    this.readTrace = options.readTrace ?? ((file) => readProfilerDump(file, { rejectTrailingBytes }));
  }

  async execute(config: TrialConfig): Promise<TrialResult> {
    const launch = await this.launcher.run(config);
    if (launch.exitCode !== 0 || launch.signal !== null || launch.timedOut) {
      return {
        status: "failed",
        elapsedSeconds: this.failedTrialTiming === "sentinel" ? FAILED_TRIAL_SENTINEL : launch.wallSeconds,
        wallSeconds: launch.wallSeconds,
        exitCode: launch.exitCode,
        signal: launch.signal,
        timedOut: launch.timedOut,
      };
    }

    const dump = await this.loadTrace(config, launch);
    return {
      status: "succeeded",
      elapsedSeconds: Number(dump.globalEndNs - dump.globalStartNs) / 1e9,
      wallSeconds: launch.wallSeconds,
      dump,
      traceFile: launch.traceFile,
    };
  }

  private async loadTrace(config: TrialConfig, launch: LaunchResult): Promise<ProfilerDump> {
    try {
      return await this.readTrace(launch.traceFile);
    } catch (error) {
      if (isMalformedTraceError(error)) {
        throw new TrialError(
          "E_MALFORMED_TRACE",
          `trace ${launch.traceFile} is malformed: ${error.message}`,
          config,
          launch.wallSeconds,
          { traceFile: launch.traceFile, traceCode: error.code, offset: error.offset, field: error.field },
          error
        );
      }
      if (isFsError(error)) {
        throw new TrialError(
          "E_MISSING_TRACE_FILE",
          `engine exited cleanly but trace ${launch.traceFile} could not be read (${error.code})`,
          config,
          launch.wallSeconds,
          { traceFile: launch.traceFile, fsCode: error.code },
          error
        );
      }
      throw error;
    }
  }
}
