import { WORKER_CATEGORIES, type ProfilerDump, type WorkerProfile } from "./types.js";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const MAX_WORKERS_PER_CATEGORY = 0xff;
const MAX_KEYS_PER_WORKER = 0x100;

class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  writeUint8(value: number): void {
    this.push(Uint8Array.of(value));
  }

  writeInt64(value: bigint, field: string): void {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new RangeError(`${field} ${value} does not fit in int64`);
    }
    const chunk = new Uint8Array(8);
    new DataView(chunk.buffer).setBigInt64(0, value, true);
    this.push(chunk);
  }

  writeCString(value: string, field: string): void {
    const chunk = new Uint8Array(value.length + 1);
    for (let index = 0; index < value.length; index += 1) {
      const code = value.charCodeAt(index);
      if (code === 0 || code > 0xff) {
        throw new RangeError(`${field} contains a character that cannot be written as a single non-zero byte`);
      }
      chunk[index] = code;
    }
    this.push(chunk);
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return out;
  }

  private push(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.length += chunk.byteLength;
  }
}

/**
 * Writes a dump in the engine's profiler layout. Used to build fixtures and
 * to check the decoder against its inverse.
 */
export function encodeProfilerDump(dump: ProfilerDump): Uint8Array {
  const writer = new ByteWriter();
  writer.writeInt64(dump.globalStartNs, "global_start_ns");
  writer.writeInt64(dump.globalEndNs, "global_end_ns");
  for (const category of WORKER_CATEGORIES) {
    const profiles = dump.profiles[category];
    if (profiles.length > MAX_WORKERS_PER_CATEGORY) {
      throw new RangeError(`${category} has ${profiles.length} workers; at most ${MAX_WORKERS_PER_CATEGORY} fit`);
    }
    writer.writeUint8(profiles.length);
    profiles.forEach((profile, index) => writeWorker(writer, profile, `${category}[${index}]`));
  }
  return writer.toBytes();
}

function writeWorker(writer: ByteWriter, profile: WorkerProfile, field: string): void {
  const dictionary = new Map<string, number>();
  for (const interval of profile.intervals) {
    if (!dictionary.has(interval.key)) {
      dictionary.set(interval.key, dictionary.size);
    }
  }
  if (dictionary.size > MAX_KEYS_PER_WORKER) {
    throw new RangeError(`${field} uses ${dictionary.size} distinct keys; at most ${MAX_KEYS_PER_WORKER} fit`);
  }

  writer.writeInt64(profile.node, `${field}.node`);
  writer.writeCString(profile.workerType, `${field}.worker_type`);
  writer.writeInt64(profile.workerNum, `${field}.worker_num`);
  writer.writeInt64(BigInt(dictionary.size), `${field}.num_keys`);
  for (const [name, keyIndex] of dictionary) {
    writer.writeCString(name, `${field}.keys`);
    writer.writeUint8(keyIndex);
  }
  writer.writeInt64(BigInt(profile.intervals.length), `${field}.num_intervals`);
  for (const interval of profile.intervals) {
    const keyIndex = dictionary.get(interval.key) ?? 0;
    writer.writeUint8(keyIndex);
    writer.writeInt64(interval.startNs, `${field}.start_ns`);
    writer.writeInt64(interval.endNs, `${field}.end_ns`);
  }
}
