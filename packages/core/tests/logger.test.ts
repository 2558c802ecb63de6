import { afterEach, describe, it, expect } from "vitest";
import { config } from "../src/config.js";
import { createLogger, type LogLevel } from "../src/logger.js";

function capture(): { lines: Array<[LogLevel, string]>; sink: (level: LogLevel, line: string) => void } {
  const lines: Array<[LogLevel, string]> = [];
  return { lines, sink: (level, line) => lines.push([level, line]) };
}

describe("createLogger", () => {
  afterEach(() => {
    config.reset();
  });

  it("prefixes every line with its scope", () => {
    const { lines, sink } = capture();
    const logger = createLogger("cli", { verbose: false, sink });
    logger.info("hello");
    logger.warn("careful");
    logger.error("broken");
    expect(lines).toEqual([
      ["info", "[rxmacro:cli] hello"],
      ["warn", "[rxmacro:cli] careful"],
      ["error", "[rxmacro:cli] broken"],
    ]);
  });

  it("drops debug output unless verbose", () => {
    const { lines, sink } = capture();
    createLogger("quiet", { verbose: false, sink }).debug("hidden");
    createLogger("loud", { verbose: true, sink }).debug("shown");
    expect(lines).toEqual([["debug", "[rxmacro:loud] shown"]]);
  });

  it("follows config.debug when verbosity is not given", () => {
    const { lines, sink } = capture();
    config.load(undefined, {});
    config.set({ debug: true });
    createLogger("cfg", { sink }).debug("from config");
    expect(lines).toEqual([["debug", "[rxmacro:cfg] from config"]]);
  });

  it("times a step and returns its result", () => {
    const { lines, sink } = capture();
    const result = createLogger("t", { verbose: true, sink }).time("step", () => 42);
    expect(result).toBe(42);
    expect(lines).toHaveLength(1);
    expect(lines[0][1]).toMatch(/^\[rxmacro:t\] step \(\d+\.\d{2}ms\)$/);
  });

  it("does not log timings when quiet", () => {
    const { lines, sink } = capture();
    expect(createLogger("t", { verbose: false, sink }).time("step", () => "x")).toBe("x");
    expect(lines).toEqual([]);
  });
});
