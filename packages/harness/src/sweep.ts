import { readFile } from "node:fs/promises";

import { SweepError } from "./errors.js";
import { compileSchema } from "./schema.js";
import { createTrialConfig } from "./trial-config.js";
import { TRIAL_PARAMS, type TrialConfig, type TrialParam, type TrialParams } from "./types.js";

export type SweepAxis = { readonly [K in TrialParam]?: readonly number[] };

export interface SweepSpec {
  readonly title: string;
  readonly videoManifest: string;
  readonly base?: Partial<TrialParams>;
  /** Parameters inside one axis move together; axes are crossed, first outermost. */
  readonly axes: readonly SweepAxis[];
}

export type SweepCatalog = Readonly<Record<string, SweepSpec>>;

interface SweepFile {
  sweeps: Record<string, SweepSpec>;
}

export const DEFAULT_SWEEPS_URL = new URL("../sweeps/default.json", import.meta.url);

const validateSweepFile = compileSchema<SweepFile>("sweep-file.schema.json");

type ParamRow = { -readonly [K in TrialParam]?: number };

function axisEntries(axis: SweepAxis, axisIndex: number): Array<[TrialParam, readonly number[]]> {
  const entries: Array<[TrialParam, readonly number[]]> = [];
  for (const param of TRIAL_PARAMS) {
    const values = axis[param];
    if (values !== undefined) {
      entries.push([param, values]);
    }
  }
  const lengths = new Set(entries.map(([, values]) => values.length));
  if (entries.length === 0 || lengths.has(0) || lengths.size > 1) {
    throw new SweepError(
      "E_SWEEP_AXIS_LENGTH",
      `axis ${axisIndex} must list at least one parameter, each with the same non-zero number of values`,
      { axis: axisIndex, lengths: Object.fromEntries(entries.map(([param, values]) => [param, values.length])) }
    );
  }
  return entries;
}

function requireParam(row: ParamRow, param: TrialParam, title: string): number {
  const value = row[param];
  if (value === undefined) {
    throw new SweepError("E_SWEEP_PARAM_MISSING", `sweep "${title}" never assigns ${param}`, { param });
  }
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new SweepError("E_SWEEP_VALUE", `sweep "${title}" gives ${param} the value ${value}; expected a positive integer`, {
      param,
      value,
    });
  }
  return value;
}

export function enumerateSweep(spec: SweepSpec): TrialConfig[] {
  const assigned = new Set<TrialParam>();
  const seed: ParamRow = {};
  for (const param of TRIAL_PARAMS) {
    const value = spec.base?.[param];
    if (value !== undefined) {
      seed[param] = value;
      assigned.add(param);
    }
  }

  let rows: ParamRow[] = [seed];
  spec.axes.forEach((axis, axisIndex) => {
    const entries = axisEntries(axis, axisIndex);
    for (const [param] of entries) {
      if (assigned.has(param)) {
        throw new SweepError("E_SWEEP_PARAM_DUPLICATE", `sweep "${spec.title}" assigns ${param} more than once`, {
          param,
          axis: axisIndex,
        });
      }
      assigned.add(param);
    }
    const count = entries[0][1].length;
    const next: ParamRow[] = [];
    for (const row of rows) {
      for (let index = 0; index < count; index += 1) {
        const expanded: ParamRow = { ...row };
        for (const [param, values] of entries) {
          expanded[param] = values[index];
        }
        next.push(expanded);
      }
    }
    rows = next;
  });

  if (spec.videoManifest.length === 0) {
    throw new SweepError("E_SWEEP_VALUE", `sweep "${spec.title}" has an empty videoManifest`, { param: "videoManifest" });
  }

  return rows.map((row) =>
    createTrialConfig({
      videoManifest: spec.videoManifest,
      nodeCount: requireParam(row, "nodeCount", spec.title),
      gpusPerNode: requireParam(row, "gpusPerNode", spec.title),
      batchSize: requireParam(row, "batchSize", spec.title),
      batchesPerWorkItem: requireParam(row, "batchesPerWorkItem", spec.title),
      tasksInQueuePerGpu: requireParam(row, "tasksInQueuePerGpu", spec.title),
      loadWorkersPerNode: requireParam(row, "loadWorkersPerNode", spec.title),
    })
  );
}

export function parseSweepFile(value: unknown, source: string): SweepCatalog {
  if (!validateSweepFile(value)) {
    const issues = (validateSweepFile.errors ?? []).map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`);
    throw new SweepError("E_SWEEP_VALUE", `sweep file ${source} is invalid: ${issues.join("; ")}`, { source, issues });
  }
  return value.sweeps;
}

/**
 * Loads the shipped sweeps followed by any extra files; a later file replaces
 * a sweep of the same name.
 */
export async function loadSweeps(extraFiles: readonly string[] = []): Promise<SweepCatalog> {
  const sources: Array<string | URL> = [DEFAULT_SWEEPS_URL, ...extraFiles];
  const catalog: Record<string, SweepSpec> = {};
  for (const source of sources) {
    const label = typeof source === "string" ? source : source.pathname;
    const parsed: unknown = JSON.parse(await readFile(source, "utf-8"));
    Object.assign(catalog, parseSweepFile(parsed, label));
  }
  return catalog;
}

export function selectSweep(catalog: SweepCatalog, name: string): SweepSpec {
  const spec = catalog[name];
  if (spec === undefined) {
    throw new SweepError("E_SWEEP_UNKNOWN", `unknown sweep: ${name} (known: ${Object.keys(catalog).sort().join(", ")})`, {
      name,
    });
  }
  return spec;
}
