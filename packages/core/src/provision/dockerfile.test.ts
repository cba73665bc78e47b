import { describe, expect, it } from "vitest";
import { formatExecForm, renderDockerfile } from "./dockerfile";
import { createProvisionPlan } from "./plan";
import { provisionConfigSchema } from "./schema";
import type { RawProvisionConfig } from "./types";

function render(raw: RawProvisionConfig, comments?: string[]) {
  const plan = createProvisionPlan(provisionConfigSchema.parse(raw));
  return renderDockerfile(plan, comments ? { comments } : {});
}

describe("renderDockerfile", () => {
  it("renders the pinned-package descriptor", () => {
    const output = render({
      acquisition: {
        mode: "pinned-package",
        packageName: "spotizerr-auth",
        version: "1.1.1",
      },
    });

    expect(output).toBe(
      [
        "# Acquisition: pinned-package",
        "FROM python:3.11-slim",
        "",
        "RUN DEBIAN_FRONTEND=noninteractive apt-get update && \\",
        "    DEBIAN_FRONTEND=noninteractive apt-get install -y git && \\",
        "    rm -rf /var/lib/apt/lists/*",
        "",
        "WORKDIR /spotizerr-auth",
        "",
        "RUN PIP_NO_INPUT=1 pip install --no-input spotizerr-auth==1.1.1",
        "",
        'CMD ["spotizerr-auth"]',
        "",
      ].join("\n")
    );
  });

  it("renders the source-checkout descriptor", () => {
    const output = render(
      {
        acquisition: {
          mode: "source-checkout",
          originUrl: "https://git.example.com/team/auth-tool.git",
        },
      },
      []
    );

    expect(output).toBe(
      [
        "FROM python:3.11-slim",
        "",
        "RUN DEBIAN_FRONTEND=noninteractive apt-get update && \\",
        "    DEBIAN_FRONTEND=noninteractive apt-get install -y git && \\",
        "    rm -rf /var/lib/apt/lists/*",
        "",
        "WORKDIR /spotizerr-auth",
        "",
        "RUN GIT_TERMINAL_PROMPT=0 git clone --depth 1 https://git.example.com/team/auth-tool.git .",
        "",
        "RUN test -s requirements.txt",
        "",
        "RUN PIP_NO_INPUT=1 pip install --no-input -r requirements.txt",
        "",
        'CMD ["python", "spotizerr-auth.py"]',
        "",
      ].join("\n")
    );
  });

  it("skips the system dependency layer when there are no packages", () => {
    const output = render(
      {
        systemPackages: [],
        nonInteractive: false,
        runtime: { version: "3.12", slim: false },
        workdir: "/opt/tool/",
        acquisition: {
          mode: "pinned-package",
          packageName: "auth-tool",
          version: "2.0.0",
          command: "auth-tool-cli",
        },
      },
      []
    );

    expect(output).toBe(
      [
        "FROM python:3.12",
        "",
        "WORKDIR /opt/tool",
        "",
        "RUN pip install auth-tool==2.0.0",
        "",
        'CMD ["auth-tool-cli"]',
        "",
      ].join("\n")
    );
  });
});

describe("formatExecForm", () => {
  it("escapes arguments as JSON strings", () => {
    expect(formatExecForm(["python", 'say "hi".py'])).toBe(
      '["python", "say \\"hi\\".py"]'
    );
  });
});
