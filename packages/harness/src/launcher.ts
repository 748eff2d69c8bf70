import { spawn } from "node:child_process";
import { rm } from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";

import { LaunchError } from "./errors.js";
import type { LaunchResult, ProcessExit, ProcessLauncher, TrialConfig } from "./types.js";

export const DEFAULT_LAUNCHER = "mpirun";
export const DEFAULT_LAUNCHER_ARGS: readonly string[] = ["--bind-to", "none"];
export const DEFAULT_TRACE_FILE = "profiler_0.bin";

export type Clock = () => number;

export interface SpawnAndWaitOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Milliseconds, monotonic. */
  clock?: Clock;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: SpawnAndWaitOptions
) => Promise<ProcessExit>;

/**
 * Runs a command to completion with stdio discarded. Wall-clock time covers
 * spawn to close. A timeout sends SIGTERM and is reported through `timedOut`.
 */
export async function spawnAndWait(
  command: string,
  args: readonly string[],
  options: SpawnAndWaitOptions = {}
): Promise<ProcessExit> {
  const clock = options.clock ?? (() => performance.now());
  const started = clock();
  const child = spawn(command, args, {
    cwd: options.cwd,
    shell: false,
    env: { ...process.env, ...options.env },
    stdio: "ignore",
  });

  let timedOut = false;
  const timer =
    options.timeoutMs !== undefined && options.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, options.timeoutMs)
      : undefined;

  try {
    const result = await new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve, reject) => {
      child.once("error", (error) => {
        reject(new LaunchError(`failed to start ${command}: ${error.message}`, { command, args: [...args] }, error));
      });
      child.once("close", (code, signal) => resolve({ code, signal }));
    });
    return {
      exitCode: result.code,
      signal: result.signal,
      wallSeconds: (clock() - started) / 1000,
      timedOut,
    };
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

export interface MpiLauncherOptions {
  /** Path of the engine executable. */
  program: string;
  launcher?: string;
  launcherArgs?: readonly string[];
  cwd?: string;
  traceFile?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  clock?: Clock;
  runProcess?: ProcessRunner;
}

export interface EngineCommand {
  command: string;
  args: string[];
}

export function buildEngineCommand(config: TrialConfig, options: MpiLauncherOptions): EngineCommand {
  return {
    command: options.launcher ?? DEFAULT_LAUNCHER,
    args: [
      "-n",
      String(config.nodeCount),
      ...(options.launcherArgs ?? DEFAULT_LAUNCHER_ARGS),
      options.program,
      "--video_paths_file",
      config.videoManifest,
      "--gpus_per_node",
      String(config.gpusPerNode),
      "--batch_size",
      String(config.batchSize),
      "--batches_per_work_item",
      String(config.batchesPerWorkItem),
      "--tasks_in_queue_per_gpu",
      String(config.tasksInQueuePerGpu),
      "--load_workers_per_node",
      String(config.loadWorkersPerNode),
    ],
  };
}

export class MpiLauncher implements ProcessLauncher {
  private readonly options: MpiLauncherOptions;
  private readonly cwd: string;
  private readonly runProcess: ProcessRunner;

  constructor(options: MpiLauncherOptions) {
    this.options = options;
    this.cwd = path.resolve(options.cwd ?? process.cwd());
    this.runProcess = options.runProcess ?? spawnAndWait;
  }

  get traceFile(): string {
    return path.resolve(this.cwd, this.options.traceFile ?? DEFAULT_TRACE_FILE);
  }

  async run(config: TrialConfig): Promise<LaunchResult> {
    const traceFile = this.traceFile;
    // A trace left by an earlier trial must not be read as this one's.
    await rm(traceFile, { force: true });
    const { command, args } = buildEngineCommand(config, this.options);
    const exit = await this.runProcess(command, args, {
      cwd: this.cwd,
      env: this.options.env,
      timeoutMs: this.options.timeoutMs,
      clock: this.options.clock,
    });
    return { ...exit, traceFile };
  }
}
