import { WORKER_CATEGORIES, type ProfilerDump, type WorkerCategory } from "./types.js";

export interface CategorySummary {
  workers: number;
  intervals: number;
  ns_by_key: Record<string, bigint>;
}

export interface DumpSummary {
  window_ns: bigint;
  categories: Record<WorkerCategory, CategorySummary>;
}

function toSortedObject(map: Map<string, bigint>): Record<string, bigint> {
  const entries = Array.from(map.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const output: Record<string, bigint> = {};
  for (const [key, value] of entries) {
    output[key] = value;
  }
  return output;
}

function summarizeCategory(dump: ProfilerDump, category: WorkerCategory): CategorySummary {
  const nsByKey = new Map<string, bigint>();
  let intervals = 0;
  for (const profile of dump.profiles[category]) {
    for (const interval of profile.intervals) {
      intervals += 1;
      nsByKey.set(interval.key, (nsByKey.get(interval.key) ?? 0n) + (interval.endNs - interval.startNs));
    }
  }
  return {
    workers: dump.profiles[category].length,
    intervals,
    ns_by_key: toSortedObject(nsByKey),
  };
}

export function summarizeDump(dump: ProfilerDump): DumpSummary {
  return {
    window_ns: dump.globalEndNs - dump.globalStartNs,
    categories: {
      load: summarizeCategory(dump, WORKER_CATEGORIES[0]),
      decode: summarizeCategory(dump, WORKER_CATEGORIES[1]),
      eval: summarizeCategory(dump, WORKER_CATEGORIES[2]),
    },
  };
}
