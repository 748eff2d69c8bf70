// Progress lines go to stdout, warnings to stderr. VBENCH_QUIET silences progress.
let _quiet: boolean | undefined;
export function quietEnabled(): boolean {
  if (_quiet === undefined) {
    const v = (process.env.VBENCH_QUIET || "").toLowerCase();
    _quiet = v === "1" || v === "true";
  }
  return _quiet;
}

export function resetQuietCache(): void {
  _quiet = undefined;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string, quiet: boolean = quietEnabled()): Logger {
  return {
    info(message) {
      if (!quiet) {
        console.log(`[${scope}] ${message}`);
      }
    },
    warn(message) {
      console.warn(`[${scope}] ${message}`);
    },
  };
}
