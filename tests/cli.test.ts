import { describe, it, expect } from "vitest";
import { parseCliArgs } from "../src/cliArgs";

describe("parseCliArgs", () => {
  it("takes an input file with defaults", () => {
    expect(parseCliArgs(["a.js"])).toEqual({ input: "a.js", timers: { kind: "none" }, trace: false });
  });

  it("reads every flag", () => {
    expect(parseCliArgs(["a.js", "--config", "c.json", "--advance", "50", "--trace"])).toEqual({
      input: "a.js",
      configPath: "c.json",
      timers: { kind: "advance", ms: 50 },
      trace: true,
    });
    expect(parseCliArgs(["--flush", "a.js"])).toEqual({
      input: "a.js",
      timers: { kind: "flush" },
      trace: false,
    });
  });

  it("rejects bad argument lists", () => {
    expect(parseCliArgs([])).toBeUndefined();
    expect(parseCliArgs(["a.js", "b.js"])).toBeUndefined();
    expect(parseCliArgs(["--bogus", "a.js"])).toBeUndefined();
    expect(parseCliArgs(["a.js", "--config"])).toBeUndefined();
    expect(parseCliArgs(["a.js", "--advance", "-1"])).toBeUndefined();
    expect(parseCliArgs(["a.js", "--flush", "--advance", "5"])).toBeUndefined();
  });
});
