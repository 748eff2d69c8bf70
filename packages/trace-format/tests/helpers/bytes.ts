export function i64(value: bigint | number): number[] {
  const view = new DataView(new ArrayBuffer(8));
  view.setBigInt64(0, BigInt(value), true);
  return Array.from(new Uint8Array(view.buffer));
}

export function u8(value: number): number[] {
  return [value & 0xff];
}

export function cstr(value: string): number[] {
  return [...Array.from(value, (ch) => ch.charCodeAt(0)), 0];
}

export function bytes(...parts: number[][]): Uint8Array {
  return Uint8Array.from(parts.flat());
}

/** Header plus a single load worker with key "task" at index 0, ready for interval bytes. */
export function loadWorkerPrefix(numIntervals: number): number[][] {
  return [
    i64(0),
    i64(1_000),
    u8(1),
    i64(0),
    cstr("load"),
    i64(0),
    i64(1),
    cstr("task"),
    u8(0),
    i64(numIntervals),
  ];
}
