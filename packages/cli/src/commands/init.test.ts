import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildInitConfig, initConfig, normalizeMode } from "./init";

const ORIGIN = "https://git.example.com/team/auth-tool.git";

let testDir: string;

describe("initConfig", () => {
  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "cli-init-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("creates a pinned-package dockhand.json by default", async () => {
    const result = await initConfig({ directory: testDir });

    expect(result.configPath).toBe(join(testDir, "dockhand.json"));
    expect(result.warnings).toEqual([]);

    const parsed: unknown = JSON.parse(
      await readFile(result.configPath, "utf8")
    );
    expect(parsed).toEqual({
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
      },
    });
  });

  it("creates a source-checkout config and reports its warning", async () => {
    const result = await initConfig({
      directory: testDir,
      mode: "source",
      originUrl: ORIGIN,
    });

    expect(result.config).toEqual({
      acquisition: { mode: "source-checkout", originUrl: ORIGIN },
    });
    expect(result.warnings).toEqual([
      "source-checkout tracks the origin's default branch; builds are not reproducible across time.",
    ]);
  });

  it("rejects an invalid pin before writing", async () => {
    await expect(
      initConfig({ directory: testDir, version: "1.x" })
    ).rejects.toThrow(
      "Invalid configuration:\n  - acquisition.version: Must be an exact release version (e.g., 1.1.1)"
    );
  });

  it("throws if config already exists without --force", async () => {
    await initConfig({ directory: testDir });

    await expect(initConfig({ directory: testDir })).rejects.toThrow(
      "dockhand.json already exists. Use --force to overwrite."
    );
  });

  it("overwrites with --force", async () => {
    await initConfig({ directory: testDir });

    const result = await initConfig({
      directory: testDir,
      version: "1.2.0",
      force: true,
    });

    const parsed: unknown = JSON.parse(
      await readFile(result.configPath, "utf8")
    );
    expect(parsed).toMatchObject({ acquisition: { version: "1.2.0" } });
  });
});

describe("buildInitConfig", () => {
  it("writes only the fields that were given", () => {
    expect(
      buildInitConfig({
        workdir: "/opt/auth",
        runtimeVersion: "3.12",
        command: "spotizerr-auth",
      })
    ).toEqual({
      runtime: { version: "3.12" },
      workdir: "/opt/auth",
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
        command: "spotizerr-auth",
      },
    });
  });

  it("never mixes pinned fields into a source checkout", () => {
    expect(
      buildInitConfig({
        mode: "source-checkout",
        originUrl: ORIGIN,
        version: "1.1.1",
        scriptPath: "main.py",
      })
    ).toEqual({
      acquisition: {
        mode: "source-checkout",
        originUrl: ORIGIN,
        scriptPath: "main.py",
      },
    });
  });

  it("requires an origin for source checkouts", () => {
    expect(() => buildInitConfig({ mode: "source-checkout" })).toThrow(
      "source-checkout requires an origin URL (--origin)."
    );
  });
});

describe("normalizeMode", () => {
  it("accepts full names and short forms", () => {
    expect(normalizeMode("pinned-package")).toBe("pinned-package");
    expect(normalizeMode(" Pinned ")).toBe("pinned-package");
    expect(normalizeMode("source")).toBe("source-checkout");
  });

  it("rejects unknown modes", () => {
    expect(() => normalizeMode("nightly")).toThrow(
      'Unknown acquisition mode "nightly". Supported: pinned-package, source-checkout'
    );
  });
});
