import type { Interval, ProfilerDump, WorkerProfile } from "@vbench/trace-format";

import type { LaunchResult, ProcessLauncher, TrialConfig } from "../../src/index.js";

export const worker = (workerType: string, intervals: Interval[]): WorkerProfile => ({
  node: 0n,
  workerType,
  workerNum: 0n,
  intervals,
});

/** One load worker, no decode workers, one eval worker. */
export const scenarioDump: ProfilerDump = {
  globalStartNs: 0n,
  globalEndNs: 2_000_000_000n,
  profiles: {
    load: [worker("load", [{ key: "task", startNs: 0n, endNs: 500_000_000n }])],
    decode: [],
    eval: [worker("eval", [{ key: "task", startNs: 100n, endNs: 1_900_000_000n }])],
  },
};

export const trialConfig: TrialConfig = Object.freeze({
  videoManifest: "videos.txt",
  nodeCount: 1,
  gpusPerNode: 1,
  batchSize: 256,
  batchesPerWorkItem: 4,
  tasksInQueuePerGpu: 4,
  loadWorkersPerNode: 8,
});

export class StubLauncher implements ProcessLauncher {
  readonly calls: TrialConfig[] = [];
  private readonly results: LaunchResult[];

  constructor(...results: LaunchResult[]) {
    this.results = results;
  }

  async run(config: TrialConfig): Promise<LaunchResult> {
    const result = this.results[this.calls.length % this.results.length];
    this.calls.push(config);
    return result;
  }
}

export function launchResult(overrides: Partial<LaunchResult> = {}): LaunchResult {
  return {
    exitCode: 0,
    signal: null,
    wallSeconds: 2.5,
    timedOut: false,
    traceFile: "/tmp/vbench-test/profiler_0.bin",
    ...overrides,
  };
}
