import { describe, expect, it } from "vitest";
import { ui } from "./ui";

describe("ui", () => {
  it("formats stage progress", () => {
    expect(ui.stripAnsi(ui.step(2, 4, "system-dependencies: apt-get update"))).toBe(
      "[2/4] system-dependencies: apt-get update"
    );
  });

  it("aligns verification checks", () => {
    expect(
      ui.stripAnsi(ui.check(true, "installed-version", "spotizerr-auth 1.1.1"))
    ).toBe("✓ installed-version    spotizerr-auth 1.1.1");
    expect(ui.stripAnsi(ui.check(false, "revision", "no checkout"))).toBe(
      "✗ revision             no checkout"
    );
  });

  it("pads by visible width", () => {
    expect(ui.pad(ui.path("ab"), 4)).toBe(`${ui.path("ab")}  `);
  });

  it("renders bulleted lists", () => {
    expect(ui.stripAnsi(ui.list(["one", "two"]))).toBe("  • one\n  • two");
  });
});
