import { describe, expect, it } from "vitest";
import { assertStageOrder, createProvisionPlan, getBaseImage } from "./plan";
import { provisionConfigSchema } from "./schema";
import type { ProvisionPlan, RawProvisionConfig } from "./types";

function planFor(raw: RawProvisionConfig) {
  return createProvisionPlan(provisionConfigSchema.parse(raw));
}

const PINNED: RawProvisionConfig = {
  acquisition: {
    mode: "pinned-package",
    packageName: "spotizerr-auth",
    version: "1.1.1",
  },
};

const SOURCE: RawProvisionConfig = {
  acquisition: {
    mode: "source-checkout",
    originUrl: "https://git.example.com/team/auth-tool.git",
  },
};

describe("getBaseImage", () => {
  it("appends -slim for minimized runtimes", () => {
    expect(getBaseImage({ name: "python", version: "3.11", slim: true })).toBe(
      "python:3.11-slim"
    );
    expect(getBaseImage({ name: "python", version: "3.12", slim: false })).toBe(
      "python:3.12"
    );
  });
});

describe("createProvisionPlan", () => {
  it("orders stages environment → system-dependencies → acquisition → entrypoint", () => {
    const plan = planFor(PINNED);

    expect(plan.stages.map((s) => s.name)).toEqual([
      "environment",
      "system-dependencies",
      "acquisition",
      "entrypoint",
    ]);
    expect(plan.baseImage).toBe("python:3.11-slim");
    expect(plan.workdir).toBe("/spotizerr-auth");
  });

  it("installs exactly the pinned version", () => {
    const plan = planFor(PINNED);
    const acquisition = plan.stages[2];

    expect(acquisition?.steps).toEqual([
      {
        kind: "workdir",
        path: "/spotizerr-auth",
        requireEmpty: false,
        failure: "package-install-failure",
      },
      {
        kind: "run",
        argv: ["pip", "install", "--no-input", "spotizerr-auth==1.1.1"],
        env: { PIP_NO_INPUT: "1" },
        failure: "package-install-failure",
      },
    ]);
    expect(plan.entrypoint).toEqual(["spotizerr-auth"]);
  });

  it("threads non-interactive settings into each apt step", () => {
    const plan = planFor(PINNED);
    const system = plan.stages[1];

    expect(system?.steps).toEqual([
      {
        kind: "run",
        argv: ["apt-get", "update"],
        env: { DEBIAN_FRONTEND: "noninteractive" },
        failure: "package-install-failure",
      },
      {
        kind: "run",
        argv: ["apt-get", "install", "-y", "git"],
        env: { DEBIAN_FRONTEND: "noninteractive" },
        failure: "package-install-failure",
      },
      {
        kind: "clean",
        path: "/var/lib/apt/lists",
        failure: "package-install-failure",
      },
    ]);
  });

  it("omits non-interactive flags when disabled", () => {
    const plan = planFor({ ...PINNED, nonInteractive: false });
    const install = plan.stages[1]?.steps[1];
    const pip = plan.stages[2]?.steps[1];

    expect(install).toMatchObject({
      argv: ["apt-get", "install", "git"],
      env: {},
    });
    expect(pip).toMatchObject({
      argv: ["pip", "install", "spotizerr-auth==1.1.1"],
      env: {},
    });
  });

  it("has no system dependency steps when none are configured", () => {
    const plan = planFor({ ...PINNED, systemPackages: [] });
    expect(plan.stages[1]?.steps).toEqual([]);
  });

  it("clones, checks the manifest, then installs it for source checkouts", () => {
    const plan = planFor(SOURCE);
    const steps = plan.stages[2]?.steps ?? [];

    expect(steps.map((s) => s.kind)).toEqual([
      "workdir",
      "run",
      "check-manifest",
      "run",
    ]);
    expect(steps[0]).toMatchObject({ requireEmpty: true, failure: "clone-failure" });
    expect(steps[1]).toEqual({
      kind: "run",
      argv: [
        "git",
        "clone",
        "--depth",
        "1",
        "https://git.example.com/team/auth-tool.git",
        ".",
      ],
      env: { GIT_TERMINAL_PROMPT: "0" },
      failure: "clone-failure",
    });
    expect(steps[2]).toEqual({
      kind: "check-manifest",
      path: "requirements.txt",
      failure: "manifest-invalid",
    });
    expect(steps[3]).toMatchObject({
      argv: ["pip", "install", "--no-input", "-r", "requirements.txt"],
    });
    expect(plan.entrypoint).toEqual(["python", "spotizerr-auth.py"]);
  });

  it("ends with a single handoff to the entrypoint override", () => {
    const plan = planFor({ ...PINNED, entrypoint: ["spotizerr-auth", "--help"] });
    expect(plan.stages[3]?.steps).toEqual([
      { kind: "handoff", argv: ["spotizerr-auth", "--help"] },
    ]);
  });
});

describe("assertStageOrder", () => {
  function clonePlan(plan: ProvisionPlan): ProvisionPlan {
    return structuredClone(plan);
  }

  it("rejects reordered stages", () => {
    const plan = clonePlan(planFor(PINNED));
    plan.stages.reverse();
    expect(() => assertStageOrder(plan)).toThrow(/Stages out of order/);
  });

  it("rejects acquisition before the working directory exists", () => {
    const plan = clonePlan(planFor(PINNED));
    plan.stages[2]?.steps.reverse();
    expect(() => assertStageOrder(plan)).toThrow(
      "Working directory must be created before dependencies are acquired"
    );
  });

  it("rejects a pinned plan carrying a clone step", () => {
    const pinned = clonePlan(planFor(PINNED));
    const source = planFor(SOURCE);
    const clone = source.stages[2]?.steps[1];
    if (!clone) throw new Error("expected clone step");
    pinned.stages[2]?.steps.push(clone);

    expect(() => assertStageOrder(pinned)).toThrow(
      "Pinned-package plan cannot contain source checkout steps"
    );
  });

  it("rejects a source plan without a clone", () => {
    const plan = clonePlan(planFor(SOURCE));
    plan.stages[2]?.steps.splice(1, 1);
    expect(() => assertStageOrder(plan)).toThrow(
      "Source-checkout plan is missing its clone step"
    );
  });
});
