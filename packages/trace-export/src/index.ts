export { TRACE_PID, isCompleteEvent, nsToUs, toTraceEvents } from "./events.js";
export type { CompleteEvent, ExportOptions, ThreadNameEvent, TraceEvent } from "./events.js";
export {
  DEFAULT_TRACE_OUTPUT,
  exportTraceDocument,
  serializeTraceDocument,
  writeTraceDocument,
} from "./document.js";
export type { WriteTraceResult } from "./document.js";
export { assertValidTraceDocument, validateTraceDocument } from "./schema.js";
export type { TraceDocumentValidation } from "./schema.js";
