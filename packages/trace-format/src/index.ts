export { WORKER_CATEGORIES } from "./types.js";
export type { Interval, ProfilerDump, ProfilesByCategory, WorkerCategory, WorkerProfile } from "./types.js";
export { MalformedTraceError, isMalformedTraceError } from "./errors.js";
export type { MalformedTraceCode } from "./errors.js";
export { ByteReader } from "./reader.js";
export { decodeProfilerDump, readProfilerDump } from "./decode.js";
export type { DecodeOptions } from "./decode.js";
export { encodeProfilerDump } from "./encode.js";
export { summarizeDump } from "./summary.js";
export type { CategorySummary, DumpSummary } from "./summary.js";
