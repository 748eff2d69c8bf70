import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

export {
  canonicalJson,
  canonicalize,
  isPlainObject,
  prettyCanonicalJson,
} from "./canonical.js";
export type { CanonicalValue } from "./canonical.js";
export { parseFlagArgs } from "./flags.js";
export type { ParsedFlags } from "./flags.js";

export async function withTmpDir<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
