import type { ProfilerDump } from "@vbench/trace-format";

import type { TrialConfig, TrialOutcome, TrialRecord, TrialResult } from "./types.js";

export const EVAL_TASK_KEY = "task";

const TITLE_WIDTH = 58;
const RULE = " =========================================================== ";
const HEADER = " Nodes | GPUs/n | Batch | Loaders | Total Time | Eval Time ";

export type EvalTime =
  | { kind: "value"; seconds: number }
  | { kind: "unavailable"; reason: "no-eval-workers" | "no-dump" };

/**
 * Mean per eval worker of the time spent in `task` intervals. A trial with no
 * dump, or a dump without eval workers, has no average.
 */
export function averageEvalTaskSeconds(dump: ProfilerDump | undefined, taskKey: string = EVAL_TASK_KEY): EvalTime {
  if (dump === undefined) {
    return { kind: "unavailable", reason: "no-dump" };
  }
  const workers = dump.profiles.eval;
  if (workers.length === 0) {
    return { kind: "unavailable", reason: "no-eval-workers" };
  }
  let totalNs = 0n;
  for (const worker of workers) {
    for (const interval of worker.intervals) {
      if (interval.key === taskKey) {
        totalNs += interval.endNs - interval.startNs;
      }
    }
  }
  return { kind: "value", seconds: Number(totalNs) / workers.length / 1e9 };
}

export function evalTimeOf(outcome: TrialOutcome): EvalTime {
  return averageEvalTaskSeconds(outcome.status === "succeeded" ? outcome.dump : undefined);
}

function centre(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return " ".repeat(left) + text + " ".repeat(padding - left);
}

function seconds(value: number, suffix: string): string {
  return value.toFixed(3).padStart(9) + suffix;
}

function totalCell(outcome: TrialOutcome): string {
  switch (outcome.status) {
    case "succeeded":
      return seconds(outcome.elapsedSeconds, "s");
    case "failed":
      return seconds(outcome.elapsedSeconds, "!");
    case "errored":
      return "error".padStart(10);
  }
}

function evalCell(outcome: TrialOutcome): string {
  const time = evalTimeOf(outcome);
  return time.kind === "value" ? seconds(time.seconds, "s") : "n/a".padStart(10);
}

function row(config: TrialConfig, outcome: TrialOutcome): string {
  return (
    ` ${String(config.nodeCount).padStart(5)} | ${String(config.gpusPerNode).padStart(6)}` +
    ` | ${String(config.batchSize).padStart(5)} | ${String(config.loadWorkersPerNode).padStart(7)}` +
    ` | ${totalCell(outcome)} | ${evalCell(outcome)} `
  );
}

export function formatTrialTable(title: string, records: readonly TrialRecord[]): string {
  const lines = [` ${centre(title, TITLE_WIDTH)} `, RULE, HEADER];
  for (const record of records) {
    lines.push(row(record.config, record.outcome));
  }
  return `${lines.join("\n")}\n`;
}

export function formatTrials(
  title: string,
  configs: readonly TrialConfig[],
  results: readonly TrialResult[]
): string {
  if (configs.length !== results.length) {
    throw new RangeError(`got ${configs.length} trial configs but ${results.length} results`);
  }
  return formatTrialTable(
    title,
    configs.map((config, index) => ({ config, outcome: results[index] }))
  );
}
