import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { Interval, ProfilerDump, WorkerProfile } from "@vbench/trace-format";
import { withTmpDir } from "@vbench/utils";

import {
  exportTraceDocument,
  isCompleteEvent,
  nsToUs,
  toTraceEvents,
  validateTraceDocument,
  writeTraceDocument,
} from "../src/index.js";

const worker = (workerType: string, intervals: Interval[]): WorkerProfile => ({
  node: 0n,
  workerType,
  workerNum: 0n,
  intervals,
});

const scenario: ProfilerDump = {
  globalStartNs: 0n,
  globalEndNs: 2_000_000_000n,
  profiles: {
    load: [worker("load", [{ key: "task", startNs: 0n, endNs: 500_000_000n }])],
    decode: [],
    eval: [worker("eval", [{ key: "task", startNs: 100n, endNs: 1_900_000_000n }])],
  },
};

const intervalArb: fc.Arbitrary<Interval> = fc
  .record({
    key: fc.constantFrom("task", "idle", "feed"),
    startNs: fc.bigInt({ min: 0n, max: 10n ** 15n }),
    duration: fc.bigInt({ min: 0n, max: 10n ** 12n }),
  })
  .map(({ key, startNs, duration }) => ({ key, startNs, endNs: startNs + duration }));

const workerArb = fc.array(intervalArb, { maxLength: 5 }).map((intervals) => worker("w", intervals));

const dumpArb: fc.Arbitrary<ProfilerDump> = fc
  .record({
    load: fc.array(workerArb, { maxLength: 3 }),
    decode: fc.array(workerArb, { maxLength: 3 }),
    eval: fc.array(workerArb, { maxLength: 3 }),
  })
  .map((profiles) => ({ globalStartNs: 0n, globalEndNs: 10n ** 16n, profiles }));

describe("toTraceEvents", () => {
  it("emits a name event per worker followed by its intervals", () => {
    expect(toTraceEvents(scenario)).toEqual([
      { name: "thread_name", ph: "M", pid: 1, tid: 0, args: { name: "load_0" } },
      { name: "task", cat: "load", ph: "X", ts: 0, dur: 500_000, pid: 1, tid: 0, args: {} },
      { name: "thread_name", ph: "M", pid: 1, tid: 1, args: { name: "eval_0" } },
      { name: "task", cat: "eval", ph: "X", ts: 0, dur: 1_899_999, pid: 1, tid: 1, args: {} },
    ]);
  });

  it("allocates thread ids load, decode, eval and by position", () => {
    const dump: ProfilerDump = {
      globalStartNs: 0n,
      globalEndNs: 0n,
      profiles: {
        load: [worker("load", []), worker("load", [])],
        decode: [worker("decode", [])],
        eval: [worker("eval", [])],
      },
    };
    const names = toTraceEvents(dump).map((event) => (isCompleteEvent(event) ? event.name : `${event.tid}:${event.args.name}`));
    expect(names).toEqual(["0:load_0", "1:load_1", "2:decode_0", "3:eval_0"]);
  });

  it("keeps interval order within a worker", () => {
    const dump: ProfilerDump = {
      globalStartNs: 0n,
      globalEndNs: 0n,
      profiles: {
        load: [],
        decode: [
          worker("decode", [
            { key: "b", startNs: 5_000n, endNs: 6_000n },
            { key: "a", startNs: 1_000n, endNs: 2_000n },
          ]),
        ],
        eval: [],
      },
    };
    const keys = toTraceEvents(dump)
      .filter(isCompleteEvent)
      .map((event) => event.name);
    expect(keys).toEqual(["b", "a"]);
  });

  it("honours a custom pid", () => {
    expect(toTraceEvents(scenario, { pid: 7 }).every((event) => event.pid === 7)).toBe(true);
  });
});

describe("nsToUs", () => {
  it("floors to whole microseconds", () => {
    expect(nsToUs(0n)).toBe(0);
    expect(nsToUs(999n)).toBe(0);
    expect(nsToUs(1_000n)).toBe(1);
    expect(nsToUs(1_999n)).toBe(1);
    expect(nsToUs(-1n)).toBe(-1);
    expect(nsToUs(-1_000n)).toBe(-1);
    expect(nsToUs(-1_500n)).toBe(-2);
  });

  it("stays exact up to the largest safe integer", () => {
    const maxUs = BigInt(Number.MAX_SAFE_INTEGER);
    expect(nsToUs(maxUs * 1000n + 999n)).toBe(Number.MAX_SAFE_INTEGER);
    expect(nsToUs(-maxUs * 1000n)).toBe(-Number.MAX_SAFE_INTEGER);
  });
});

describe("trace document", () => {
  it("serializes events in viewer field order", () => {
    expect(exportTraceDocument(scenario)).toBe(
      '[{"name":"thread_name","ph":"M","pid":1,"tid":0,"args":{"name":"load_0"}},' +
        '{"name":"task","cat":"load","ph":"X","ts":0,"dur":500000,"pid":1,"tid":0,"args":{}},' +
        '{"name":"thread_name","ph":"M","pid":1,"tid":1,"args":{"name":"eval_0"}},' +
        '{"name":"task","cat":"eval","ph":"X","ts":0,"dur":1899999,"pid":1,"tid":1,"args":{}}]'
    );
  });

  it("overwrites an existing document", async () => {
    await withTmpDir("trace-export-", async (dir) => {
      const target = path.join(dir, "nested", "profile.trace");
      await writeTraceDocument(target, {
        ...scenario,
        profiles: { load: [], decode: [], eval: [] },
      });
      expect(await readFile(target, "utf-8")).toBe("[]");
      const result = await writeTraceDocument(target, scenario);
      expect(result).toEqual({ path: target, events: 4 });
      expect(await readFile(target, "utf-8")).toBe(exportTraceDocument(scenario));
    });
  });

  it("replaces longer prior content entirely", async () => {
    await withTmpDir("trace-export-", async (dir) => {
      const target = path.join(dir, "profile.trace");
      await writeFile(target, "x".repeat(4096), "utf-8");
      await writeTraceDocument(target, scenario);
      const written = await readFile(target, "utf-8");
      expect(written).toBe(exportTraceDocument(scenario));
      expect(validateTraceDocument(JSON.parse(written)).ok).toBe(true);
    });
  });

  it("reports schema issues", () => {
    const result = validateTraceDocument([{ name: "thread_name", ph: "M", pid: 1, tid: -1, args: { name: "x" } }]);
    expect(result.ok).toBe(false);
  });
});

describe("export properties", () => {
  it("emits one event per worker plus one per interval", () => {
    fc.assert(
      fc.property(dumpArb, (dump) => {
        const profiles = [...dump.profiles.load, ...dump.profiles.decode, ...dump.profiles.eval];
        const intervals = profiles.reduce((sum, profile) => sum + profile.intervals.length, 0);
        expect(toTraceEvents(dump)).toHaveLength(profiles.length + intervals);
      })
    );
  });

  it("converts every interval exactly", () => {
    fc.assert(
      fc.property(dumpArb, (dump) => {
        const intervals = [...dump.profiles.load, ...dump.profiles.decode, ...dump.profiles.eval].flatMap(
          (profile) => profile.intervals
        );
        const events = toTraceEvents(dump).filter(isCompleteEvent);
        expect(events).toHaveLength(intervals.length);
        events.forEach((event, index) => {
          const interval = intervals[index];
          expect(event.ts).toBe(Number(interval.startNs / 1000n));
          expect(event.dur).toBe(Number((interval.endNs - interval.startNs) / 1000n));
        });
      })
    );
  });

  it("exports the same dump to identical text that passes the schema", () => {
    fc.assert(
      fc.property(dumpArb, (dump) => {
        const first = exportTraceDocument(dump);
        expect(exportTraceDocument(dump)).toBe(first);
        expect(validateTraceDocument(JSON.parse(first)).ok).toBe(true);
      })
    );
  });
});
