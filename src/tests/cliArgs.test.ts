import { describe, it, expect } from "vitest";
import { parseCliArgs } from "../cli/args.js";

describe("parseCliArgs", () => {
  it("should join prompt words and keep defaults", () => {
    expect(parseCliArgs(["Create", "a", "red", "cube"])).toEqual({
      ok: true,
      options: {
        prompt: "Create a red cube",
        validate: true,
        dryRun: false,
        interactive: false,
        help: false,
      },
    });
  });

  it("should parse every flag", () => {
    const result = parseCliArgs([
      "a", "lamp",
      "--mode", "gui",
      "--render",
      "--export",
      "--save",
      "--no-validate",
      "--provider", "local",
      "--dry-run",
    ]);

    expect(result).toEqual({
      ok: true,
      options: {
        prompt: "a lamp",
        mode: "gui",
        render: true,
        export: true,
        save: true,
        validate: false,
        provider: "local",
        dryRun: true,
        interactive: false,
        help: false,
      },
    });
  });

  it("should let --no-render override", () => {
    const result = parseCliArgs(["--no-render", "cube"]);
    expect(result.ok && result.options.render).toBe(false);
  });

  it("should fall back to interactive mode without a prompt", () => {
    const result = parseCliArgs(["--save"]);
    expect(result.ok && result.options.interactive).toBe(true);
  });

  it("should accept short flags", () => {
    const result = parseCliArgs(["-i", "-h"]);
    expect(result).toMatchObject({ ok: true, options: { interactive: true, help: true } });
  });

  it("should reject bad values and unknown options", () => {
    expect(parseCliArgs(["--mode", "fast"])).toEqual({
      ok: false,
      error: "--mode expects one of: background, gui",
    });
    expect(parseCliArgs(["--provider"])).toEqual({
      ok: false,
      error: "--provider expects one of: claude, openai, local, mock",
    });
    expect(parseCliArgs(["--verbose"])).toEqual({ ok: false, error: "Unknown option: --verbose" });
  });
});
