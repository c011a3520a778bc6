import { describe, it, expect, vi, beforeEach } from "vitest";
import chalk from "chalk";

const logMessage = vi.hoisted(() => vi.fn());
const logWarn = vi.hoisted(() => vi.fn());
const logError = vi.hoisted(() => vi.fn());
const introFn = vi.hoisted(() => vi.fn());

vi.mock("@clack/prompts", () => ({
  log: {
    message: logMessage,
    warn: logWarn,
    error: logError
  },
  intro: introFn
}));

import { createLoggerFactory } from "../src/cli/logger.js";

describe("createLoggerFactory", () => {
  beforeEach(() => {
    logMessage.mockClear();
    logWarn.mockClear();
    logError.mockClear();
    introFn.mockClear();
  });

  it("uses purple symbols for info and success without a custom emitter", () => {
    const logger = createLoggerFactory().create();

    logger.info("Hello");
    logger.success("Done");

    expect(logMessage).toHaveBeenCalledWith("Hello", {
      symbol: chalk.magenta("●")
    });
    expect(logMessage).toHaveBeenCalledWith("Done", {
      symbol: chalk.magenta("◆")
    });
  });

  it("routes warnings and errors to clack", () => {
    const logger = createLoggerFactory().create();

    logger.warn("weather: failed to persist (EACCES)");
    logger.error("boom");

    expect(logWarn).toHaveBeenCalledWith("weather: failed to persist (EACCES)");
    expect(logError).toHaveBeenCalledWith("boom");
  });

  it("renders intro as a clack intro header", () => {
    const logger = createLoggerFactory().create();

    logger.intro("deskpanel status");

    expect(introFn).toHaveBeenCalledWith("deskpanel status");
  });

  it("suppresses verbose output unless enabled", () => {
    const messages: string[] = [];
    const factory = createLoggerFactory((message) => messages.push(message));

    factory.create({ scope: "poller" }).verbose("hidden");
    factory.create({ scope: "poller", verbose: true }).verbose("weather: HTTP 500");

    expect(messages).toEqual(["[poller] weather: HTTP 500"]);
  });

  it("prefixes the scope only in verbose mode", () => {
    const messages: string[] = [];
    const factory = createLoggerFactory((message) => messages.push(message));

    factory.create({ scope: "panel" }).warn("quiet");
    factory.create({ scope: "panel", verbose: true }).warn("loud");

    expect(messages).toEqual(["quiet", "[panel] loud"]);
  });

  it("inherits context in child loggers", () => {
    const messages: string[] = [];
    const parent = createLoggerFactory((message) => messages.push(message)).create({
      verbose: true,
      scope: "cli"
    });

    const child = parent.child({ scope: "network" });
    child.verbose("probe ok");

    expect(child.context).toEqual({ verbose: true, scope: "network" });
    expect(messages).toEqual(["[network] probe ok"]);
  });
});
