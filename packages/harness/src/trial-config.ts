import { ConfigError } from "./errors.js";
import { TRIAL_PARAMS, type TrialConfig, type TrialParams } from "./types.js";

export function createTrialConfig(input: TrialParams & { videoManifest: string }): TrialConfig {
  if (input.videoManifest.length === 0) {
    throw new ConfigError("E_TRIAL_CONFIG", "videoManifest must not be empty", { field: "videoManifest" });
  }
  for (const param of TRIAL_PARAMS) {
    const value = input[param];
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new ConfigError("E_TRIAL_CONFIG", `${param} must be a positive integer, got ${value}`, {
        field: param,
        value,
      });
    }
  }
  return Object.freeze({
    videoManifest: input.videoManifest,
    nodeCount: input.nodeCount,
    gpusPerNode: input.gpusPerNode,
    batchSize: input.batchSize,
    batchesPerWorkItem: input.batchesPerWorkItem,
    tasksInQueuePerGpu: input.tasksInQueuePerGpu,
    loadWorkersPerNode: input.loadWorkersPerNode,
  });
}

export function describeTrialConfig(config: TrialConfig): string {
  return (
    `nodes=${config.nodeCount} gpus/node=${config.gpusPerNode} batch=${config.batchSize} ` +
    `batches/item=${config.batchesPerWorkItem} queue/gpu=${config.tasksInQueuePerGpu} ` +
    `loaders=${config.loadWorkersPerNode}`
  );
}
