import { describe, it, expect } from "vitest";
import { Harness } from "../src/harness";

describe("dialogs", () => {
  it("records alerts and answers confirm from the queue", () => {
    const h = new Harness();
    h.enqueueConfirmResponse(true);
    h.run("alert('hello'); console.log(confirm('sure?'), confirm('again?'), prompt('name', 'anon'))");
    expect(h.takeAlertMessages()).toEqual(["hello"]);
    expect(h.takeAlertMessages()).toEqual([]);
    expect(h.takeConsoleLogs()).toEqual(["true false anon"]);
  });

  it("answers prompt from the queue, then the default", () => {
    const h = new Harness();
    h.enqueuePromptResponse(null);
    h.setDefaultPromptResponse("fallback");
    h.run("console.log(prompt('x'), prompt('y', 'z'))");
    expect(h.takeConsoleLogs()).toEqual(["null fallback"]);
  });

  it("uses the default confirm answer once the queue is empty", () => {
    const h = new Harness();
    h.setDefaultConfirmResponse(true);
    expect(h.evaluate("confirm('ok?')")).toEqual({ kind: "Bool", value: true });
  });
});

describe("console entries", () => {
  it("keeps the level of each line", () => {
    const h = new Harness();
    h.run("console.warn('careful'); console.error('broken')");
    expect(h.takeConsoleEntries()).toEqual([
      { level: "warn", line: "careful" },
      { level: "error", line: "broken" },
    ]);
    expect(h.takeConsoleEntries()).toEqual([]);
  });
});

describe("localStorage", () => {
  it("seeds from options and stringifies stored values", () => {
    const h = new Harness({ localStorage: { theme: "dark" } });
    h.run(
      "localStorage.setItem('n', 1); console.log(localStorage.getItem('theme'), localStorage.getItem('missing'))"
    );
    expect(h.takeConsoleLogs()).toEqual(["dark null"]);
    expect(h.localStorage()).toEqual({ theme: "dark", n: "1" });
  });

  it("removes items", () => {
    const h = new Harness({ localStorage: { a: "1", b: "2" } });
    h.run("localStorage.removeItem('a')");
    expect(h.localStorage()).toEqual({ b: "2" });
  });
});

describe("events", () => {
  it("binds the event and reports preventDefault", () => {
    const h = new Harness();
    const state = h.runWithEvent("event.preventDefault(); console.log(event.type)", "event", {
      type: "submit",
    });
    expect(state.defaultPrevented).toBe(true);
    expect(h.takeConsoleLogs()).toEqual(["submit"]);
  });

  it("ignores preventDefault on events that cannot be canceled", () => {
    const h = new Harness();
    const state = h.runWithEvent("e.preventDefault()", "e", { cancelable: false });
    expect(state.defaultPrevented).toBe(false);
  });
});

describe("randomness", () => {
  it("is deterministic for a seed", () => {
    const a = new Harness({ randomSeed: 7 }).evaluate("Math.random()");
    const b = new Harness({ randomSeed: 7 }).evaluate("Math.random()");
    expect(a).toEqual(b);
    expect(a.kind).toBe("Float");
    if (a.kind === "Float") {
      expect(a.value).toBeGreaterThanOrEqual(0);
      expect(a.value).toBeLessThan(1);
    }
  });

  it("restarts the sequence on reseed", () => {
    const h = new Harness();
    h.setRandomSeed(3);
    const first = h.evaluate("Math.random()");
    h.setRandomSeed(3);
    expect(h.evaluate("Math.random()")).toEqual(first);
  });
});

describe("timer trace", () => {
  it("records timer activity when enabled", () => {
    const h = new Harness({ traceTimers: true });
    h.run("setTimeout(() => {}, 10)");
    h.advanceTime(10);
    expect(h.takeTraceLogs()).toEqual([
      "[timer] schedule timeout id=1 due_at=10 delay_ms=10",
      "[timer] run id=1 due_at=10 interval_ms=none now_ms=10",
      "[timer] advance delta_ms=10 from=0 to=10 ran_due=1",
    ]);
    expect(h.takeTraceLogs()).toEqual([]);
  });

  it("keeps only the newest lines within the limit", () => {
    const h = new Harness({ traceTimers: true });
    h.run("setTimeout(() => {}, 10)");
    h.advanceTime(10);
    h.setTraceLogLimit(1);
    expect(h.takeTraceLogs()).toEqual(["[timer] advance delta_ms=10 from=0 to=10 ran_due=1"]);
    expect(() => h.setTraceLogLimit(0)).toThrow(
      "invalid option traceLogLimit: must be an integer >= 1"
    );
  });

  it("records nothing while disabled", () => {
    const h = new Harness();
    h.run("setTimeout(() => {}, 10)");
    h.flush();
    expect(h.takeTraceLogs()).toEqual([]);
  });

  it("clears every pending timer", () => {
    const h = new Harness();
    h.run("setTimeout(() => {}, 10); setInterval(() => {}, 5)");
    expect(h.pendingTimers()).toHaveLength(2);
    expect(h.clearAllTimers()).toBe(2);
    expect(h.flush()).toBe(0);
  });
});
