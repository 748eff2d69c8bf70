import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import type { ProfilerDump } from "@vbench/trace-format";

import { toTraceEvents, type ExportOptions, type TraceEvent } from "./events.js";

export const DEFAULT_TRACE_OUTPUT = "profile.trace";

export interface WriteTraceResult {
  readonly path: string;
  readonly events: number;
}

export function serializeTraceDocument(events: readonly TraceEvent[]): string {
  return JSON.stringify(events);
}

export function exportTraceDocument(dump: ProfilerDump, options: ExportOptions = {}): string {
  return serializeTraceDocument(toTraceEvents(dump, options));
}

/** Replaces whatever is at `path` with the dump's trace document. */
export async function writeTraceDocument(
  path: string,
  dump: ProfilerDump,
  options: ExportOptions = {}
): Promise<WriteTraceResult> {
  const target = resolve(path);
  const events = toTraceEvents(dump, options);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, serializeTraceDocument(events), "utf-8");
  return { path: target, events: events.length };
}
