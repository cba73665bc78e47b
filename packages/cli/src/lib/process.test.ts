import { afterEach, describe, expect, it } from "vitest";
import {
  COMMAND_NOT_FOUND,
  createCommandRunner,
  createToolProcess,
  forwardedSignals,
  signalExitCode,
} from "./process";

const MISSING_BINARY = "dockhand-test-missing-binary";

/** argv that runs a snippet in a fresh Node.js process */
const node = (script: string) => [process.execPath, "-e", script];

describe("signalExitCode", () => {
  it("maps signals to 128 + signal number", () => {
    expect(signalExitCode("SIGINT")).toBe(130);
    expect(signalExitCode("SIGKILL")).toBe(137);
    expect(signalExitCode("SIGTERM")).toBe(143);
  });

  it("treats a missing signal as a plain failure", () => {
    expect(signalExitCode(null)).toBe(1);
  });
});

describe("forwardedSignals", () => {
  it("forwards only SIGTERM while the tool shares the terminal", () => {
    expect(forwardedSignals(true)).toEqual(["SIGTERM"]);
  });

  it("forwards every handled signal without a terminal", () => {
    expect(forwardedSignals(false)).toEqual(["SIGINT", "SIGTERM", "SIGHUP"]);
  });
});

describe("createCommandRunner", () => {
  afterEach(() => {
    delete process.env.DOCKHAND_TEST_VALUE;
  });

  it("rejects an empty command", async () => {
    await expect(createCommandRunner().run([])).rejects.toThrow(
      "Cannot run an empty command"
    );
  });

  it("passes the exit code through", async () => {
    const result = await createCommandRunner().run(node("process.exit(3)"));

    expect(result.exitCode).toBe(3);
  });

  it("captures stdout and stderr", async () => {
    const result = await createCommandRunner().run(
      node("process.stdout.write('out'); process.stderr.write('err')"),
      { capture: true }
    );

    expect(result).toEqual({ exitCode: 0, stdout: "out", stderr: "err" });
  });

  it("applies env to that command only", async () => {
    const runner = createCommandRunner();
    const script = "process.stdout.write(process.env.DOCKHAND_TEST_VALUE ?? '-')";

    const withEnv = await runner.run(node(script), {
      capture: true,
      env: { DOCKHAND_TEST_VALUE: "per-command" },
    });
    const without = await runner.run(node(script), { capture: true });

    expect(withEnv.stdout).toBe("per-command");
    expect(without.stdout).toBe("-");
    expect(process.env.DOCKHAND_TEST_VALUE).toBeUndefined();
  });

  it("runs in the given directory", async () => {
    const result = await createCommandRunner().run(
      node("process.stdout.write(process.cwd())"),
      { capture: true, cwd: "/" }
    );

    expect(result.stdout).toBe("/");
  });

  it("reports a missing executable as command not found", async () => {
    const result = await createCommandRunner().run([MISSING_BINARY], {
      capture: true,
    });

    expect(result.exitCode).toBe(COMMAND_NOT_FOUND);
    expect(result.stderr).toContain("ENOENT");
  });

  it("maps death by signal to 128 + signal number", async () => {
    const result = await createCommandRunner().run(
      node("process.kill(process.pid, 'SIGTERM')")
    );

    expect(result.exitCode).toBe(143);
  });
});

describe("createToolProcess", () => {
  it("rejects an empty entrypoint", async () => {
    await expect(createToolProcess().invoke([])).rejects.toThrow(
      "Entrypoint is empty"
    );
  });

  it("returns the tool's exit code unchanged", async () => {
    const tool = createToolProcess({ sharesTerminal: false });

    expect(await tool.invoke(node("process.exit(3)"))).toBe(3);
  });

  it("returns 127 when the tool cannot be started", async () => {
    const tool = createToolProcess({ sharesTerminal: false });

    expect(await tool.invoke([MISSING_BINARY])).toBe(COMMAND_NOT_FOUND);
  });

  it("returns 128 + signal number when the tool is killed", async () => {
    const tool = createToolProcess({ sharesTerminal: false });

    expect(
      await tool.invoke(node("process.kill(process.pid, 'SIGTERM')"))
    ).toBe(143);
  });

  it("passes env to the tool", async () => {
    const tool = createToolProcess({ sharesTerminal: false });

    const exitCode = await tool.invoke(
      node("process.exit(process.env.DOCKHAND_TEST_VALUE === 'set' ? 0 : 9)"),
      { env: { DOCKHAND_TEST_VALUE: "set" } }
    );

    expect(exitCode).toBe(0);
  });

  it("forwards SIGINT when there is no shared terminal", async () => {
    const before = process.listeners("SIGINT");
    const tool = createToolProcess({ sharesTerminal: false });

    const exited = tool.invoke(node("setTimeout(() => {}, 5000)"));
    const added = process.listeners("SIGINT").filter((l) => !before.includes(l));
    expect(added).toHaveLength(1);
    added[0]?.("SIGINT");

    expect(await exited).toBe(130);
    expect(process.listeners("SIGINT")).toEqual(before);
  });

  it("leaves SIGINT to the terminal when it shares one", async () => {
    const before = process.listeners("SIGINT");
    const tool = createToolProcess({ sharesTerminal: true });

    const exited = tool.invoke(node("setTimeout(() => process.exit(4), 300)"));
    const added = process.listeners("SIGINT").filter((l) => !before.includes(l));
    expect(added).toHaveLength(1);
    added[0]?.("SIGINT");

    expect(await exited).toBe(4);
    expect(process.listeners("SIGINT")).toEqual(before);
  });
});
