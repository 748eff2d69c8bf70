import { readFileSync } from "node:fs";

import AjvModule from "ajv";
import type { ErrorObject, SchemaObject } from "ajv";
import { isPlainObject } from "@vbench/utils";

import type { TraceEvent } from "./events.js";

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

const schemaUrl = new URL("../schema/trace-document.schema.json", import.meta.url);

function isSchemaObject(value: unknown): value is SchemaObject {
  return isPlainObject(value);
}

function loadSchema(): SchemaObject {
  const parsed: unknown = JSON.parse(readFileSync(schemaUrl, "utf-8"));
  if (!isSchemaObject(parsed)) {
    throw new Error(`trace document schema at ${schemaUrl.pathname} is not a JSON object`);
  }
  return parsed;
}

const validateDocument = ajv.compile<TraceEvent[]>(loadSchema());

export type TraceDocumentValidation =
  | { ok: true; events: TraceEvent[] }
  | { ok: false; issues: string[] };

function describeIssue(error: ErrorObject): string {
  return `${error.instancePath || "/"} ${error.message ?? "is invalid"}`;
}

export function validateTraceDocument(value: unknown): TraceDocumentValidation {
  if (validateDocument(value)) {
    return { ok: true, events: value };
  }
  return { ok: false, issues: (validateDocument.errors ?? []).map(describeIssue) };
}

export function assertValidTraceDocument(value: unknown): TraceEvent[] {
  const result = validateTraceDocument(value);
  if (!result.ok) {
    throw new Error(`Trace document failed validation: ${result.issues.join("; ")}`);
  }
  return result.events;
}
