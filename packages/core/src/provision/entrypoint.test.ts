import { describe, expect, it } from "vitest";
import { resolveEntrypoint } from "./entrypoint";

describe("resolveEntrypoint", () => {
  it("uses the package name as command when none is given", () => {
    expect(
      resolveEntrypoint({
        acquisition: {
          mode: "pinned-package",
          packageName: "spotizerr-auth",
          version: "1.1.1",
        },
      })
    ).toEqual(["spotizerr-auth"]);
  });

  it("uses the declared console command", () => {
    expect(
      resolveEntrypoint({
        acquisition: {
          mode: "pinned-package",
          packageName: "auth-tool",
          version: "1.0.0",
          command: "auth-tool-cli",
        },
      })
    ).toEqual(["auth-tool-cli"]);
  });

  it("runs the script through the interpreter for source checkouts", () => {
    expect(
      resolveEntrypoint({
        acquisition: {
          mode: "source-checkout",
          originUrl: "https://git.example.com/team/auth-tool.git",
          manifestPath: "requirements.txt",
          scriptPath: "bin/auth.py",
          interpreter: "python3",
        },
      })
    ).toEqual(["python3", "bin/auth.py"]);
  });

  it("prefers an explicit entrypoint", () => {
    expect(
      resolveEntrypoint({
        acquisition: {
          mode: "pinned-package",
          packageName: "spotizerr-auth",
          version: "1.1.1",
        },
        entrypoint: ["spotizerr-auth", "--verbose"],
      })
    ).toEqual(["spotizerr-auth", "--verbose"]);
  });
});
