import { readFile } from "node:fs/promises";

import { MalformedTraceError } from "./errors.js";
import { ByteReader } from "./reader.js";
import type {
  Interval,
  ProfilerDump,
  WorkerCategory,
  WorkerProfile,
} from "./types.js";

// node + empty worker_type + worker_num + num_keys + num_intervals
const WORKER_MIN_BYTES = 8 + 1 + 8 + 8 + 8;
// empty key name + key_index
const KEY_ENTRY_MIN_BYTES = 1 + 1;
// key_index + start_ns + end_ns
const INTERVAL_BYTES = 1 + 8 + 8;

export interface DecodeOptions {
  /** Reject bytes after the eval section; by default they are ignored. */
  readonly rejectTrailingBytes?: boolean;
}

export function decodeProfilerDump(buffer: Uint8Array, options: DecodeOptions = {}): ProfilerDump {
  const reader = new ByteReader(buffer);
  const globalStartNs = reader.readInt64("global_start_ns");
  const endOffset = reader.offset;
  const globalEndNs = reader.readInt64("global_end_ns");
  if (globalEndNs < globalStartNs) {
    throw new MalformedTraceError(
      "E_TRACE_INTERVAL",
      `global window ends (${globalEndNs}) before it starts (${globalStartNs})`,
      endOffset,
      "global_end_ns"
    );
  }

  const load = readCategory(reader, "load");
  const decode = readCategory(reader, "decode");
  const evaluate = readCategory(reader, "eval");

  if (options.rejectTrailingBytes) {
    reader.expectEnd("end_of_trace");
  }

  return Object.freeze({
    globalStartNs,
    globalEndNs,
    profiles: Object.freeze({ load, decode, eval: evaluate }),
  });
}

export async function readProfilerDump(path: string, options: DecodeOptions = {}): Promise<ProfilerDump> {
  const bytes = await readFile(path);
  return decodeProfilerDump(bytes, options);
}

function readCategory(reader: ByteReader, category: WorkerCategory): readonly WorkerProfile[] {
  const count = reader.readSmallCount(`${category}.worker_count`, WORKER_MIN_BYTES);
  const profiles: WorkerProfile[] = [];
  for (let index = 0; index < count; index += 1) {
    profiles.push(readWorker(reader, `${category}[${index}]`));
  }
  return Object.freeze(profiles);
}

function readWorker(reader: ByteReader, field: string): WorkerProfile {
  const node = reader.readInt64(`${field}.node`);
  const workerType = reader.readCString(`${field}.worker_type`);
  const workerNum = reader.readInt64(`${field}.worker_num`);

  // The dictionary precedes every interval that refers to it.
  const keyCount = reader.readCount(`${field}.num_keys`, KEY_ENTRY_MIN_BYTES);
  const dictionary = new Map<number, string>();
  for (let index = 0; index < keyCount; index += 1) {
    const name = reader.readCString(`${field}.keys[${index}].name`);
    const keyIndex = reader.readUint8(`${field}.keys[${index}].index`);
    dictionary.set(keyIndex, name);
  }

  const intervalCount = reader.readCount(`${field}.num_intervals`, INTERVAL_BYTES);
  const intervals: Interval[] = [];
  for (let index = 0; index < intervalCount; index += 1) {
    const intervalField = `${field}.intervals[${index}]`;
    const keyOffset = reader.offset;
    const keyIndex = reader.readUint8(`${intervalField}.key_index`);
    const key = dictionary.get(keyIndex);
    if (key === undefined) {
      throw new MalformedTraceError(
        "E_TRACE_KEY",
        `key index ${keyIndex} is not in the worker dictionary`,
        keyOffset,
        `${intervalField}.key_index`
      );
    }
    const startNs = reader.readInt64(`${intervalField}.start_ns`);
    const endOffset = reader.offset;
    const endNs = reader.readInt64(`${intervalField}.end_ns`);
    if (endNs < startNs) {
      throw new MalformedTraceError(
        "E_TRACE_INTERVAL",
        `interval ends (${endNs}) before it starts (${startNs})`,
        endOffset,
        `${intervalField}.end_ns`
      );
    }
    intervals.push(Object.freeze({ key, startNs, endNs }));
  }

  return Object.freeze({
    node,
    workerType,
    workerNum,
    intervals: Object.freeze(intervals),
  });
}
