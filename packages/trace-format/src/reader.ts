import { MalformedTraceError } from "./errors.js";

const INT64_BYTES = 8;

/**
 * Forward-only cursor over a little-endian byte buffer. Every read names the
 * field it is reading so a failure can report where the buffer went wrong.
 */
export class ByteReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private position = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.position;
  }

  readUint8(field: string): number {
    this.require(1, field);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readInt64(field: string): bigint {
    this.require(INT64_BYTES, field);
    const value = this.view.getBigInt64(this.position, true);
    this.position += INT64_BYTES;
    return value;
  }

  /** Reads single-byte characters up to a 0 byte; the terminator is consumed but not returned. */
  readCString(field: string): string {
    const terminator = this.bytes.indexOf(0, this.position);
    if (terminator === -1) {
      throw new MalformedTraceError(
        "E_TRACE_TRUNCATED",
        "string is missing its terminator",
        this.position,
        field
      );
    }
    let value = "";
    for (let index = this.position; index < terminator; index += 1) {
      value += String.fromCharCode(this.bytes[index]);
    }
    this.position = terminator + 1;
    return value;
  }

  /**
   * Reads an int64 element count and checks that `count` elements of at least
   * `minItemBytes` each can still fit in the buffer.
   */
  readCount(field: string, minItemBytes: number): number {
    const start = this.position;
    const count = this.readInt64(field);
    return this.checkCount(count, start, field, minItemBytes);
  }

  /** Same as {@link readCount} for a uint8 count. */
  readSmallCount(field: string, minItemBytes: number): number {
    const start = this.position;
    const count = BigInt(this.readUint8(field));
    return this.checkCount(count, start, field, minItemBytes);
  }

  expectEnd(field: string): void {
    if (this.remaining !== 0) {
      throw new MalformedTraceError(
        "E_TRACE_TRAILING",
        `${this.remaining} unexpected trailing bytes`,
        this.position,
        field
      );
    }
  }

  private checkCount(count: bigint, start: number, field: string, minItemBytes: number): number {
    if (count < 0n) {
      throw new MalformedTraceError("E_TRACE_COUNT", `negative count ${count}`, start, field);
    }
    const needed = count * BigInt(minItemBytes);
    if (needed > BigInt(this.remaining)) {
      throw new MalformedTraceError(
        "E_TRACE_COUNT",
        `count ${count} needs at least ${needed} bytes but only ${this.remaining} remain`,
        start,
        field
      );
    }
    return Number(count);
  }

  private require(size: number, field: string): void {
    if (this.remaining < size) {
      throw new MalformedTraceError(
        "E_TRACE_TRUNCATED",
        `needs ${size} bytes but only ${this.remaining} remain`,
        this.position,
        field
      );
    }
  }
}
