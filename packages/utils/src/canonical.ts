export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

export function canonicalize(value: unknown): CanonicalValue {
  return canonicalizeInner(value);
}

export function canonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value))}\n`;
}

export function prettyCanonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value), null, 2)}\n`;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonicalizeInner(value: unknown): CanonicalValue {
  if (value === null) {
    return null;
  }

  if (value === undefined) {
    throw new TypeError("cannot canonicalize undefined");
  }

  if (typeof value === "number") {
    return canonicalizeNumber(value);
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  // int64 fields from the trace format stay exact as decimal strings
  if (typeof value === "bigint") {
    return value.toString();
  }

  if (typeof value === "symbol" || typeof value === "function") {
    throw new TypeError(`cannot canonicalize ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return value.map((entry) => canonicalizeInner(entry));
  }

  if (isPlainObject(value)) {
    return canonicalizeObject(value);
  }

  throw new TypeError(`cannot canonicalize value of type ${typeof value}`);
}

function canonicalizeNumber(value: number): number | string {
  if (!Number.isFinite(value)) {
    return value.toString();
  }
  const formatted = Number.parseFloat(value.toFixed(12));
  return Object.is(formatted, -0) ? 0 : formatted;
}

function canonicalizeObject(value: Record<string, unknown>): { [key: string]: CanonicalValue } {
  const entries = Object.entries(value)
    .filter(([, entryValue]) => entryValue !== undefined)
    .map(([key, entryValue]) => [key, canonicalizeInner(entryValue)] as const)
    .sort(([a], [b]) => compareLabels(a, b));

  const result: { [key: string]: CanonicalValue } = {};
  for (const [key, entryValue] of entries) {
    result[key] = entryValue;
  }
  return result;
}

function compareLabels(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}
