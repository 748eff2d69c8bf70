import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { exit } from "node:process";

import {
  isMalformedTraceError,
  readProfilerDump,
  summarizeDump,
  type ProfilerDump,
} from "@vbench/trace-format";
import {
  assertValidTraceDocument,
  exportTraceDocument,
  writeTraceDocument,
} from "@vbench/trace-export";
import { canonicalJson, errorMessage, parseFlagArgs, prettyCanonicalJson, type ParsedFlags } from "@vbench/utils";

import { runBatch } from "./batch.js";
import { loadHarnessConfig, type HarnessConfig } from "./config.js";
import { HarnessError } from "./errors.js";
import { MpiLauncher, buildEngineCommand } from "./launcher.js";
import { evalTimeOf, formatTrialTable } from "./report.js";
import { TrialRunner } from "./runner.js";
import { enumerateSweep, loadSweeps, selectSweep } from "./sweep.js";
import type { ProcessLauncher, TrialRecord } from "./types.js";

export const HELP_TEXT = [
  "Usage: vbench <command> [options]",
  "",
  "Commands:",
  "  run --sweep <name> [--config <path>] [--json <out>] [--dry-run]",
  "      Run every trial of a sweep and print the timing table.",
  "  decode [--input <path>] [--config <path>] [--summary] [--strict]",
  "      Decode a profiler dump and print it as canonical JSON.",
  "  export [--input <path>] [--out <path>] [--config <path>] [--validate] [--strict]",
  "      Convert a profiler dump into a Chrome trace document.",
  "  sweeps [--config <path>]",
  "      List the known sweeps and their trial counts.",
  "",
  "decode and export read the engine's trace file from the config when --input",
  "is omitted. --strict rejects bytes after the eval section.",
].join("\n");

export interface RunDeps {
  /** Replaces the mpirun launcher built from the config. */
  launcher?: ProcessLauncher;
}

function usageError(message: string): number {
  process.stderr.write(`${message}\n`);
  return 2;
}

function failure(error: unknown): number {
  if (error instanceof HarnessError && error.code === "E_SWEEP_UNKNOWN") {
    return usageError(error.message);
  }
  const prefix = error instanceof HarnessError || isMalformedTraceError(error) ? `${error.code}: ` : "";
  process.stderr.write(`${prefix}${errorMessage(error)}\n`);
  return 1;
}

function parseOrUsage(
  args: string[],
  valueFlags: string[],
  toggleFlags: string[]
): ParsedFlags | number {
  try {
    return parseFlagArgs(args, valueFlags, [...toggleFlags, "--help", "-h"]);
  } catch (error) {
    return usageError(errorMessage(error));
  }
}

function wantsHelp(parsed: ParsedFlags): boolean {
  return parsed.toggles.has("--help") || parsed.toggles.has("-h");
}

function recordJson(record: TrialRecord): Record<string, unknown> {
  const { config, outcome } = record;
  const evalTime = evalTimeOf(outcome);
  const evalSeconds = evalTime.kind === "value" ? evalTime.seconds : null;
  switch (outcome.status) {
    case "succeeded":
      return {
        config,
        status: outcome.status,
        elapsedSeconds: outcome.elapsedSeconds,
        wallSeconds: outcome.wallSeconds,
        evalSeconds,
        traceFile: outcome.traceFile,
        summary: summarizeDump(outcome.dump),
      };
    case "failed":
      return {
        config,
        status: outcome.status,
        elapsedSeconds: outcome.elapsedSeconds,
        wallSeconds: outcome.wallSeconds,
        evalSeconds,
        exitCode: outcome.exitCode,
        signal: outcome.signal,
        timedOut: outcome.timedOut,
      };
    case "errored":
      return { config, status: outcome.status, wallSeconds: outcome.wallSeconds, evalSeconds, error: outcome.error };
  }
}

async function writeReport(
  name: string,
  title: string,
  records: readonly TrialRecord[],
  jsonPath: string | undefined
): Promise<void> {
  process.stdout.write(formatTrialTable(title, records));
  if (jsonPath) {
    const target = path.resolve(jsonPath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, prettyCanonicalJson({ sweep: name, title, trials: records.map(recordJson) }), "utf-8");
  }
}

function readInputDump(parsed: ParsedFlags, config: HarnessConfig): Promise<ProfilerDump> {
  const input = parsed.values["--input"] || path.resolve(config.engine.cwd, config.engine.traceFile);
  return readProfilerDump(input, {
    rejectTrailingBytes: config.rejectTrailingBytes || parsed.toggles.has("--strict"),
  });
}

export async function runSweepCommand(args: string[], deps: RunDeps = {}): Promise<number> {
  const parsed = parseOrUsage(args, ["--sweep", "--config", "--json"], ["--dry-run"]);
  if (typeof parsed === "number") {
    return parsed;
  }
  if (wantsHelp(parsed)) {
    process.stdout.write("Usage: vbench run --sweep <name> [--config <path>] [--json <out>] [--dry-run]\n");
    return 0;
  }
  const name = parsed.values["--sweep"];
  if (!name) {
    return usageError("--sweep <name> is required");
  }
  try {
    const config = await loadHarnessConfig({ path: parsed.values["--config"] });
    const spec = selectSweep(await loadSweeps(config.sweepFiles), name);
    const trials = enumerateSweep(spec);

    if (parsed.toggles.has("--dry-run")) {
      for (const trial of trials) {
        const { command, args: commandArgs } = buildEngineCommand(trial, config.engine);
        process.stdout.write(`${[command, ...commandArgs].join(" ")}\n`);
      }
      return 0;
    }

    const launcher = deps.launcher ?? new MpiLauncher(config.engine);
    const runner = new TrialRunner(launcher, {
      failedTrialTiming: config.failedTrialTiming,
      rejectTrailingBytes: config.rejectTrailingBytes,
    });
    const finished: TrialRecord[] = [];
    let aborted: { error: unknown } | undefined;
    try {
      await runBatch(trials, runner, { onTrial: (record) => finished.push(record) });
    } catch (error) {
      aborted = { error };
    }
    // Trials that completed before an abort are still reported.
    if (aborted === undefined || finished.length > 0) {
      await writeReport(name, spec.title, finished, parsed.values["--json"]);
    }
    if (aborted !== undefined) {
      return failure(aborted.error);
    }
    return finished.every((record) => record.outcome.status === "succeeded") ? 0 : 1;
  } catch (error) {
    return failure(error);
  }
}

export async function runDecodeCommand(args: string[]): Promise<number> {
  const parsed = parseOrUsage(args, ["--input", "--config"], ["--summary", "--strict"]);
  if (typeof parsed === "number") {
    return parsed;
  }
  if (wantsHelp(parsed)) {
    process.stdout.write("Usage: vbench decode [--input <path>] [--config <path>] [--summary] [--strict]\n");
    return 0;
  }
  try {
    const config = await loadHarnessConfig({ path: parsed.values["--config"] });
    const dump = await readInputDump(parsed, config);
    process.stdout.write(canonicalJson(parsed.toggles.has("--summary") ? summarizeDump(dump) : dump));
    return 0;
  } catch (error) {
    return failure(error);
  }
}

export async function runExportCommand(args: string[]): Promise<number> {
  const parsed = parseOrUsage(args, ["--input", "--out", "--config"], ["--validate", "--strict"]);
  if (typeof parsed === "number") {
    return parsed;
  }
  if (wantsHelp(parsed)) {
    process.stdout.write(
      "Usage: vbench export [--input <path>] [--out <path>] [--config <path>] [--validate] [--strict]\n"
    );
    return 0;
  }
  try {
    const config = await loadHarnessConfig({ path: parsed.values["--config"] });
    const dump = await readInputDump(parsed, config);
    if (parsed.toggles.has("--validate")) {
      const parsedDocument: unknown = JSON.parse(exportTraceDocument(dump));
      assertValidTraceDocument(parsedDocument);
    }
    const out = parsed.values["--out"] ?? config.traceOutput;
    const result = await writeTraceDocument(out, dump);
    process.stdout.write(`Exported ${result.events} events to ${result.path}\n`);
    return 0;
  } catch (error) {
    return failure(error);
  }
}

export async function runSweepsCommand(args: string[]): Promise<number> {
  const parsed = parseOrUsage(args, ["--config"], []);
  if (typeof parsed === "number") {
    return parsed;
  }
  if (wantsHelp(parsed)) {
    process.stdout.write("Usage: vbench sweeps [--config <path>]\n");
    return 0;
  }
  try {
    const config = await loadHarnessConfig({ path: parsed.values["--config"] });
    const catalog = await loadSweeps(config.sweepFiles);
    for (const name of Object.keys(catalog).sort()) {
      const spec = catalog[name];
      process.stdout.write(`${name}\t${enumerateSweep(spec).length}\t${spec.title}\n`);
    }
    return 0;
  } catch (error) {
    return failure(error);
  }
}

export async function runCli(argv: string[], deps: RunDeps = {}): Promise<number> {
  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h") {
    process.stdout.write(`${HELP_TEXT}\n`);
    return 0;
  }
  switch (command) {
    case "run":
      return runSweepCommand(rest, deps);
    case "decode":
      return runDecodeCommand(rest);
    case "export":
      return runExportCommand(rest);
    case "sweeps":
      return runSweepsCommand(rest);
    default:
      process.stderr.write(`unknown command: ${command}\n${HELP_TEXT}\n`);
      return 2;
  }
}

if (!process.env.VITEST) {
  runCli(process.argv.slice(2))
    .then((code) => exit(code))
    .catch((error: unknown) => {
      process.stderr.write(`${errorMessage(error)}\n`);
      exit(2);
    });
}
