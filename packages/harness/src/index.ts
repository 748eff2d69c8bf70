export * from "./types.js";
export {
  ConfigError,
  HarnessError,
  LaunchError,
  SweepError,
  TrialError,
} from "./errors.js";
export type { HarnessErrorCode } from "./errors.js";
export { createLogger, quietEnabled, resetQuietCache } from "./log.js";
export type { Logger } from "./log.js";
export { createTrialConfig, describeTrialConfig } from "./trial-config.js";
export {
  DEFAULT_LAUNCHER,
  DEFAULT_LAUNCHER_ARGS,
  DEFAULT_TRACE_FILE,
  MpiLauncher,
  buildEngineCommand,
  spawnAndWait,
} from "./launcher.js";
export type { Clock, EngineCommand, MpiLauncherOptions, ProcessRunner, SpawnAndWaitOptions } from "./launcher.js";
export { TrialRunner } from "./runner.js";
export type { TraceReader, TrialRunnerOptions } from "./runner.js";
export { DEFAULT_SWEEPS_URL, enumerateSweep, loadSweeps, parseSweepFile, selectSweep } from "./sweep.js";
export type { SweepAxis, SweepCatalog, SweepSpec } from "./sweep.js";
export { runBatch } from "./batch.js";
export type { RunBatchOptions } from "./batch.js";
export { EVAL_TASK_KEY, averageEvalTaskSeconds, evalTimeOf, formatTrialTable, formatTrials } from "./report.js";
export type { EvalTime } from "./report.js";
export { DEFAULT_CONFIG_FILE, DEFAULT_ENGINE_PROGRAM, loadHarnessConfig } from "./config.js";
export type { EngineConfig, HarnessConfig, LoadConfigOptions } from "./config.js";
