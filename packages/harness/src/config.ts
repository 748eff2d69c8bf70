import { readFile } from "node:fs/promises";
import path from "node:path";

import { DEFAULT_TRACE_OUTPUT } from "@vbench/trace-export";
import { errorMessage } from "@vbench/utils";

import { ConfigError } from "./errors.js";
import { DEFAULT_LAUNCHER, DEFAULT_LAUNCHER_ARGS, DEFAULT_TRACE_FILE } from "./launcher.js";
import { compileSchema } from "./schema.js";
import type { FailedTrialTiming } from "./types.js";

export const DEFAULT_CONFIG_FILE = "vbench.config.json";
export const DEFAULT_ENGINE_PROGRAM = "build/debug/lightscanner";

export interface EngineConfig {
  readonly program: string;
  readonly launcher: string;
  readonly launcherArgs: readonly string[];
  readonly cwd: string;
  readonly traceFile: string;
  /** 0 disables the timeout. */
  readonly timeoutMs: number;
}

export interface HarnessConfig {
  readonly engine: EngineConfig;
  readonly failedTrialTiming: FailedTrialTiming;
  /** Reject engine traces with bytes after the eval section. */
  readonly rejectTrailingBytes: boolean;
  readonly traceOutput: string;
  readonly sweepFiles: readonly string[];
  /** Absolute path of the file the config came from, if any. */
  readonly source?: string;
}

interface HarnessConfigFile {
  engine?: {
    program?: string;
    launcher?: string;
    launcherArgs?: string[];
    cwd?: string;
    traceFile?: string;
    timeoutMs?: number;
  };
  failedTrialTiming?: FailedTrialTiming;
  rejectTrailingBytes?: boolean;
  traceOutput?: string;
  sweepFiles?: string[];
}

const validateConfigFile = compileSchema<HarnessConfigFile>("harness-config.schema.json");

export interface LoadConfigOptions {
  /** Config file; when omitted, vbench.config.json in `cwd` is used if present. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

async function readConfigText(file: string, required: boolean): Promise<string | undefined> {
  try {
    return await readFile(file, "utf-8");
  } catch (error) {
    if (!required && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw new ConfigError("E_CONFIG_INVALID", `cannot read config ${file}: ${errorMessage(error)}`, { file });
  }
}

function parseConfigFile(text: string, file: string): HarnessConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError("E_CONFIG_INVALID", `config ${file} is not valid JSON: ${errorMessage(error)}`, { file });
  }
  if (!validateConfigFile(parsed)) {
    const issues = (validateConfigFile.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`
    );
    throw new ConfigError("E_CONFIG_INVALID", `config ${file} is invalid: ${issues.join("; ")}`, { file, issues });
  }
  return parsed;
}

function parseTimeout(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError("E_CONFIG_INVALID", `VBENCH_TIMEOUT_MS must be a non-negative integer, got "${raw}"`, {
      variable: "VBENCH_TIMEOUT_MS",
    });
  }
  return value;
}

export async function loadHarnessConfig(options: LoadConfigOptions = {}): Promise<HarnessConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const file = path.resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);
  const text = await readConfigText(file, options.path !== undefined);
  const raw = text === undefined ? {} : parseConfigFile(text, file);
  // Paths in a config file are relative to the file itself.
  const base = text === undefined ? cwd : path.dirname(file);
  const engine = raw.engine ?? {};

  const program = env.VBENCH_ENGINE
    ? path.resolve(cwd, env.VBENCH_ENGINE)
    : path.resolve(base, engine.program ?? DEFAULT_ENGINE_PROGRAM);
  const timeoutMs = env.VBENCH_TIMEOUT_MS !== undefined ? parseTimeout(env.VBENCH_TIMEOUT_MS) : engine.timeoutMs ?? 0;

  return {
    engine: {
      program,
      launcher: engine.launcher ?? DEFAULT_LAUNCHER,
      launcherArgs: engine.launcherArgs ?? DEFAULT_LAUNCHER_ARGS,
      cwd: path.resolve(base, engine.cwd ?? "."),
      traceFile: engine.traceFile ?? DEFAULT_TRACE_FILE,
      timeoutMs,
    },
    failedTrialTiming: raw.failedTrialTiming ?? "wall-clock",
    rejectTrailingBytes: raw.rejectTrailingBytes ?? false,
    traceOutput: path.resolve(base, raw.traceOutput ?? DEFAULT_TRACE_OUTPUT),
    sweepFiles: (raw.sweepFiles ?? []).map((entry) => path.resolve(base, entry)),
    source: text === undefined ? undefined : file,
  };
}
