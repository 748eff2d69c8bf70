import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";
import { withTmpDir } from "@vbench/utils";

import { ConfigError, loadHarnessConfig } from "../src/index.js";

async function configErrorCode(promise: Promise<unknown>): Promise<string | undefined> {
  const error = await promise.then(
    () => undefined,
    (caught: unknown) => caught
  );
  return error instanceof ConfigError ? error.code : undefined;
}

describe("loadHarnessConfig", () => {
  it("falls back to defaults without a config file", async () => {
    await withTmpDir("vbench-config-", async (dir) => {
      const config = await loadHarnessConfig({ cwd: dir, env: {} });
      expect(config).toEqual({
        engine: {
          program: path.join(dir, "build/debug/lightscanner"),
          launcher: "mpirun",
          launcherArgs: ["--bind-to", "none"],
          cwd: dir,
          traceFile: "profiler_0.bin",
          timeoutMs: 0,
        },
        failedTrialTiming: "wall-clock",
        rejectTrailingBytes: false,
        traceOutput: path.join(dir, "profile.trace"),
        sweepFiles: [],
        source: undefined,
      });
    });
  });

  it("resolves paths against the config file", async () => {
    await withTmpDir("vbench-config-", async (dir) => {
      const configDir = path.join(dir, "bench");
      await mkdir(configDir);
      const file = path.join(configDir, "custom.json");
      await writeFile(
        file,
        JSON.stringify({
          engine: { program: "../engine/scanner", cwd: "runs", timeoutMs: 60000, launcherArgs: [] },
          failedTrialTiming: "sentinel",
          rejectTrailingBytes: true,
          traceOutput: "out/profile.trace",
          sweepFiles: ["sweeps.json"],
        }),
        "utf-8"
      );
      const config = await loadHarnessConfig({ path: file, cwd: dir, env: {} });
      expect(config.engine.program).toBe(path.join(dir, "engine/scanner"));
      expect(config.engine.cwd).toBe(path.join(configDir, "runs"));
      expect(config.engine.launcherArgs).toEqual([]);
      expect(config.engine.timeoutMs).toBe(60000);
      expect(config.failedTrialTiming).toBe("sentinel");
      expect(config.rejectTrailingBytes).toBe(true);
      expect(config.traceOutput).toBe(path.join(configDir, "out/profile.trace"));
      expect(config.sweepFiles).toEqual([path.join(configDir, "sweeps.json")]);
      expect(config.source).toBe(file);
    });
  });

  it("picks up vbench.config.json from the working directory", async () => {
    await withTmpDir("vbench-config-", async (dir) => {
      await writeFile(path.join(dir, "vbench.config.json"), JSON.stringify({ traceOutput: "t.json" }), "utf-8");
      const config = await loadHarnessConfig({ cwd: dir, env: {} });
      expect(config.traceOutput).toBe(path.join(dir, "t.json"));
    });
  });

  it("applies environment overrides", async () => {
    await withTmpDir("vbench-config-", async (dir) => {
      const config = await loadHarnessConfig({
        cwd: dir,
        env: { VBENCH_ENGINE: "bin/engine", VBENCH_TIMEOUT_MS: "1500" },
      });
      expect(config.engine.program).toBe(path.join(dir, "bin/engine"));
      expect(config.engine.timeoutMs).toBe(1500);
    });
  });

  it("rejects invalid configuration", async () => {
    await withTmpDir("vbench-config-", async (dir) => {
      const file = path.join(dir, "bad.json");
      await writeFile(file, JSON.stringify({ failedTrialTiming: "never" }), "utf-8");
      expect(await configErrorCode(loadHarnessConfig({ path: file, cwd: dir, env: {} }))).toBe("E_CONFIG_INVALID");

      await writeFile(file, "{ not json", "utf-8");
      expect(await configErrorCode(loadHarnessConfig({ path: file, cwd: dir, env: {} }))).toBe("E_CONFIG_INVALID");

      expect(await configErrorCode(loadHarnessConfig({ path: "missing.json", cwd: dir, env: {} }))).toBe(
        "E_CONFIG_INVALID"
      );
      expect(await configErrorCode(loadHarnessConfig({ cwd: dir, env: { VBENCH_TIMEOUT_MS: "soon" } }))).toBe(
        "E_CONFIG_INVALID"
      );
    });
  });
});
