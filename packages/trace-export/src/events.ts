import { WORKER_CATEGORIES, type ProfilerDump, type WorkerCategory } from "@vbench/trace-format";

export const TRACE_PID = 1;

export interface ThreadNameEvent {
  readonly name: "thread_name";
  readonly ph: "M";
  readonly pid: number;
  readonly tid: number;
  readonly args: { readonly name: string };
}

export interface CompleteEvent {
  readonly name: string;
  readonly cat: WorkerCategory;
  readonly ph: "X";
  /** Microseconds, truncated. */
  readonly ts: number;
  /** Microseconds, truncated. */
  readonly dur: number;
  readonly pid: number;
  readonly tid: number;
  readonly args: Record<string, never>;
}

export type TraceEvent = ThreadNameEvent | CompleteEvent;

export interface ExportOptions {
  readonly pid?: number;
}

/**
 * Integer nanoseconds to integer microseconds, rounding toward negative
 * infinity. Exact while the result stays within `Number.MAX_SAFE_INTEGER`
 * (about 285 years); beyond that the nearest double is returned.
 */
export function nsToUs(ns: bigint): number {
  const quotient = ns / 1000n;
  return Number(ns < 0n && quotient * 1000n !== ns ? quotient - 1n : quotient);
}

/**
 * Flattens a dump into viewer events. Thread ids are handed out load, decode,
 * eval and in list order within a category; each worker's name event comes
 * before its intervals, which keep decode order.
 */
export function toTraceEvents(dump: ProfilerDump, options: ExportOptions = {}): TraceEvent[] {
  const pid = options.pid ?? TRACE_PID;
  const events: TraceEvent[] = [];
  let nextTid = 0;

  for (const category of WORKER_CATEGORIES) {
    dump.profiles[category].forEach((profile, index) => {
      const tid = nextTid;
      nextTid += 1;
      events.push({
        name: "thread_name",
        ph: "M",
        pid,
        tid,
        args: { name: `${category}_${index}` },
      });
      for (const interval of profile.intervals) {
        events.push({
          name: interval.key,
          cat: category,
          ph: "X",
          ts: nsToUs(interval.startNs),
          dur: nsToUs(interval.endNs - interval.startNs),
          pid,
          tid,
          args: {},
        });
      }
    });
  }

  return events;
}

export function isCompleteEvent(event: TraceEvent): event is CompleteEvent {
  return event.ph === "X";
}
