import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import type { Command } from "commander";
import { CliError, SilentError } from "./errors.js";

const logError = vi.hoisted(() => vi.fn());

vi.mock("@clack/prompts", async () => {
  const actual = await vi.importActual<Record<string, unknown>>("@clack/prompts");
  return {
    ...actual,
    log: {
      error: logError,
      message: vi.fn()
    }
  };
});

function programThatThrows(error: unknown): () => Command {
  const fakeProgram: Partial<Command> & { parseAsync: () => Promise<void> } = {
    parseAsync: vi.fn(async () => {
      throw error;
    })
  };
  return () => fakeProgram as Command;
}

describe("createCliMain", () => {
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    exitSpy = vi.spyOn(process, "exit").mockImplementation((code?: string | number | null) => {
      throw new Error(`exit:${code ?? "undefined"}`);
    });
  });

  afterEach(() => {
    exitSpy.mockRestore();
    vi.clearAllMocks();
  });

  it("prints user errors as they are and exits with status 1", async () => {
    const { createCliMain } = await import("./bootstrap.js");
    const main = createCliMain(programThatThrows(new CliError("Config file not found: /repo/x.yaml")));

    await expect(main()).rejects.toThrow("exit:1");

    expect(logError).toHaveBeenCalledWith("Config file not found: /repo/x.yaml");
  });

  it("prefixes unexpected errors", async () => {
    const { createCliMain } = await import("./bootstrap.js");
    const main = createCliMain(programThatThrows(new Error("boom")));

    await expect(main()).rejects.toThrow("exit:1");

    expect(logError).toHaveBeenCalledWith("Error: boom");
  });

  it("does not treat silent exits as errors", async () => {
    const { createCliMain } = await import("./bootstrap.js");
    const main = createCliMain(programThatThrows(new SilentError()));

    await expect(main()).resolves.toBeUndefined();

    expect(logError).not.toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();
  });
});

describe("isCliInvocation", () => {
  it("matches the entry script against the module url", async () => {
    const { isCliInvocation } = await import("./bootstrap.js");

    expect(isCliInvocation(["node", "/opt/deskpanel/dist/src/index.js"], "file:///opt/deskpanel/dist/src/index.js")).toBe(
      true
    );
    expect(isCliInvocation(["node"], "file:///opt/deskpanel/dist/src/index.js")).toBe(false);
  });

  it("follows symlinked bin entries", async () => {
    const { isCliInvocation } = await import("./bootstrap.js");

    const matched = isCliInvocation(
      ["node", "/usr/local/bin/deskpanel"],
      "file:///opt/deskpanel/dist/src/index.js",
      () => "/opt/deskpanel/dist/src/index.js"
    );

    expect(matched).toBe(true);
  });
});
