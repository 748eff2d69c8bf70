import { readFileSync } from "node:fs";

import AjvModule from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import { isPlainObject } from "@vbench/utils";

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

function isSchemaObject(value: unknown): value is SchemaObject {
  return isPlainObject(value);
}

export function compileSchema<T>(fileName: string): ValidateFunction<T> {
  const url = new URL(`../schema/${fileName}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf-8"));
  if (!isSchemaObject(parsed)) {
    throw new Error(`schema at ${url.pathname} is not a JSON object`);
  }
  return ajv.compile<T>(parsed);
}
