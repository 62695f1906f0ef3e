import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";

import { DEFAULT_OPTIONS, loadOptionsFile, optionsFromJson, resolveOptions } from "../src/config";
import { ScriptRuntimeError } from "../src/errors";

describe("resolveOptions", () => {
  it("fills in defaults", () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
    expect(resolveOptions({ maxCallDepth: 9 }).maxCallDepth).toBe(9);
  });

  it("copies the localStorage seed", () => {
    const seed = { a: "1" };
    const options = resolveOptions({ localStorage: seed });
    seed.a = "2";
    expect(options.localStorage).toEqual({ a: "1" });
  });

  it("rejects invalid limits", () => {
    expect(() => resolveOptions({ timerStepLimit: 0 })).toThrow(
      "invalid option timerStepLimit: must be an integer >= 1"
    );
    expect(() => resolveOptions({ startTimeMs: -1 })).toThrow(
      "invalid option startTimeMs: must be a finite number >= 0"
    );
    expect(() => resolveOptions({ randomSeed: 0.5 })).toThrow(
      "invalid option randomSeed: must be an integer"
    );
  });
});

describe("optionsFromJson", () => {
  it("reads known keys", () => {
    expect(
      optionsFromJson({ maxCallDepth: 5, traceTimers: true, logLevel: "debug", localStorage: { a: "b" } })
    ).toEqual({ maxCallDepth: 5, traceTimers: true, logLevel: "debug", localStorage: { a: "b" } });
  });

  it("rejects bad shapes", () => {
    expect(() => optionsFromJson([])).toThrow("invalid option config: must be a JSON object");
    expect(() => optionsFromJson({ colour: 1 })).toThrow("invalid option colour: unknown option");
    expect(() => optionsFromJson({ traceTimers: "yes" })).toThrow(
      "invalid option traceTimers: must be a boolean"
    );
    expect(() => optionsFromJson({ maxCallDepth: "5" })).toThrow(
      "invalid option maxCallDepth: must be a number"
    );
    expect(() => optionsFromJson({ localStorage: { a: 1 } })).toThrow(
      "invalid option localStorage.a: must be a string"
    );
  });
});

describe("loadOptionsFile", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "scriptharness-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads and validates a JSON file", async () => {
    const path = join(dir, "ok.json");
    await writeFile(path, JSON.stringify({ maxCallDepth: 7 }), "utf8");
    const loaded = await loadOptionsFile(path);
    expect(loaded.ok).toBe(true);
    if (loaded.ok) expect(loaded.value).toEqual({ ...DEFAULT_OPTIONS, maxCallDepth: 7 });
  });

  it("reports JSON syntax errors with the path", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{", "utf8");
    const loaded = await loadOptionsFile(path);
    expect(loaded.ok).toBe(false);
    if (!loaded.ok) expect(loaded.error.message.startsWith(`${path}: `)).toBe(true);
  });

  it("returns option errors as values", async () => {
    const path = join(dir, "invalid.json");
    await writeFile(path, JSON.stringify({ maxCallDepth: 0 }), "utf8");
    const loaded = await loadOptionsFile(path);
    expect(loaded.ok).toBe(false);
    if (!loaded.ok) {
      expect(loaded.error).toBeInstanceOf(ScriptRuntimeError);
      expect(loaded.error.message).toBe("invalid option maxCallDepth: must be an integer >= 1");
    }
  });

  it("returns a missing file as an error", async () => {
    const loaded = await loadOptionsFile(join(dir, "missing.json"));
    expect(loaded.ok).toBe(false);
  });
});
