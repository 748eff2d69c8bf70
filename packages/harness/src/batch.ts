import { TrialError } from "./errors.js";
import { createLogger, type Logger } from "./log.js";
import { describeTrialConfig } from "./trial-config.js";
import type { TrialConfig, TrialExecutor, TrialRecord } from "./types.js";

export interface RunBatchOptions {
  onTrial?: (record: TrialRecord, index: number) => void;
  logger?: Logger;
}

// Trials share the machine and the trace file, so they never overlap.
export async function runBatch(
  configs: readonly TrialConfig[],
  runner: TrialExecutor,
  options: RunBatchOptions = {}
): Promise<TrialRecord[]> {
  const logger = options.logger ?? createLogger("harness");
  const records: TrialRecord[] = [];
  for (const [index, config] of configs.entries()) {
    logger.info(`trial ${index + 1}/${configs.length}: ${describeTrialConfig(config)}`);
    let record: TrialRecord;
    try {
      const outcome = await runner.execute(config);
      if (outcome.status === "succeeded") {
        logger.info(`trial succeeded, took ${outcome.elapsedSeconds.toFixed(3)}s`);
      } else {
        logger.warn(`trial FAILED after ${outcome.wallSeconds.toFixed(3)}s (exit ${outcome.exitCode ?? outcome.signal})`);
      }
      record = { config, outcome };
    } catch (error) {
      if (!(error instanceof TrialError)) {
        throw error;
      }
      logger.warn(`trial errored: ${error.code} ${error.message}`);
      record = { config, outcome: { status: "errored", wallSeconds: error.wallSeconds, error: error.toInfo() } };
    }
    records.push(record);
    options.onTrial?.(record, index);
  }
  return records;
}
