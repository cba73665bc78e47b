import { provisionConfigSchema } from "@dockhand/core";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFakeTool } from "@/test-utils/process";
import { runTool } from "./run";

let workdir: string;

describe("runTool", () => {
  beforeEach(async () => {
    workdir = await mkdtemp(join(tmpdir(), "cli-run-"));
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  it("invokes the installed command in the working directory", async () => {
    const tool = createFakeTool(0);
    const config = provisionConfigSchema.parse({
      workdir,
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
      },
    });

    const result = await runTool({ config, tool });

    expect(result).toEqual({ argv: ["spotizerr-auth"], exitCode: 0 });
    expect(tool.invocations).toEqual([
      { argv: ["spotizerr-auth"], options: { cwd: workdir } },
    ]);
  });

  it("runs the checkout's script with the interpreter", async () => {
    const tool = createFakeTool(0);
    const config = provisionConfigSchema.parse({
      workdir,
      acquisition: {
        mode: "source-checkout",
        originUrl: "https://git.example.com/team/auth-tool.git",
      },
    });

    const result = await runTool({ config, tool });

    expect(result.argv).toEqual(["python", "spotizerr-auth.py"]);
  });

  it("returns the tool's exit code unchanged", async () => {
    const tool = createFakeTool(3);
    const config = provisionConfigSchema.parse({
      workdir,
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
      },
    });

    const result = await runTool({ config, tool });

    expect(result.exitCode).toBe(3);
    expect(tool.invocations).toHaveLength(1);
  });

  it("runs a configured entrypoint override as given", async () => {
    const tool = createFakeTool(0);
    const config = provisionConfigSchema.parse({
      workdir,
      entrypoint: ["spotizerr-auth", "--headless"],
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
      },
    });

    const result = await runTool({ config, tool });

    expect(result.argv).toEqual(["spotizerr-auth", "--headless"]);
  });

  it("refuses to start before provisioning", async () => {
    const tool = createFakeTool(0);
    const missing = join(workdir, "missing");
    const config = provisionConfigSchema.parse({
      workdir: missing,
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
      },
    });

    await expect(runTool({ config, tool })).rejects.toThrow(
      `Working directory ${missing} does not exist. Run "dockhand provision" first.`
    );
    expect(tool.invocations).toHaveLength(0);
  });
});
