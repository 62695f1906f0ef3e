import { describe, it, expect } from "vitest";
import { Harness } from "../src/harness";
import type { HarnessOptions } from "../src/config";
import { num } from "../src/runtime/value";

function logs(src: string, options: Partial<HarnessOptions> = {}): string[] {
  const h = new Harness(options);
  h.run(src);
  return h.takeConsoleLogs();
}

describe("arithmetic and values", () => {
  it("prints numbers the way console.log does", () => {
    expect(logs("console.log(1 + 2, 1.5 * 2, 'a' + 1, 7 / 2)")).toEqual(["3 3 a1 3.5"]);
    expect(logs("console.log(2 ** 10, 10 % 3, 5 - 7)")).toEqual(["1024 1 -2"]);
  });

  it("coerces booleans and strings in +, *, / the way Number() does", () => {
    expect(logs("console.log(true + 1, true * 2, 'abc' * 2, [2] * 3, true / 2)")).toEqual([
      "2 2 NaN 6 0.5",
    ]);
    expect(logs("console.log(null + 1, '3' * '4', 2 ** true)")).toEqual(["1 12 2"]);
  });

  it("folds string concatenation left to right", () => {
    expect(logs("console.log('1' + 2 + 3, 1 + 2 + '3')")).toEqual(["123 33"]);
  });

  it("returns the last statement value", () => {
    const h = new Harness();
    expect(h.run("let x = 2; x * 3")).toEqual({ kind: "Float", value: 6 });
    expect(h.evaluate("[1, 2].includes(2)")).toEqual({ kind: "Bool", value: true });
  });

  it("keeps BigInt arithmetic separate", () => {
    expect(logs("console.log(10n * 3n, typeof 1n)")).toEqual(["30n bigint"]);
    expect(() => new Harness().run("1n + 1")).toThrow(
      "cannot mix BigInt and other types in addition"
    );
  });

  it("supports string and template helpers", () => {
    expect(
      logs("console.log('abc'.toUpperCase(), 'a-b-c'.split('-').length, `x=${1 + 1}`)")
    ).toEqual(["ABC 3 x=2"]);
  });

  it("inspects arrays and objects", () => {
    expect(
      logs("const a = [3, 1, 2]; a.sort(); console.log(a, a.map(x => x * 2).join(','))")
    ).toEqual(["[ 1, 2, 3 ] 2,4,6"]);
    expect(logs("const o = { a: 1, b: 'x', c: [1, 2] }; console.log(o)")).toEqual([
      "{ a: 1, b: 'x', c: [ 1, 2 ] }",
    ]);
  });

  it("round-trips JSON", () => {
    expect(
      logs("console.log(JSON.stringify({ a: [1, 'x'], b: null }), JSON.parse('[1,2]').length)")
    ).toEqual(['{"a":[1,"x"],"b":null} 2']);
  });
});

describe("bindings and control flow", () => {
  it("gives each loop iteration its own binding", () => {
    expect(
      logs(
        "const fs = []; for (let i = 0; i < 3; i++) { fs.push(() => i) } console.log(fs.map(f => f()).join(','))"
      )
    ).toEqual(["0,1,2"]);
  });

  it("shares arrays between bindings", () => {
    expect(
      logs("const a = [1]; const b = a; b.push(2); a[0] = 9; console.log(a, b.length, a === b)")
    ).toEqual(["[ 9, 2 ] 2 true"]);
  });

  it("destructures arrays and objects", () => {
    expect(
      logs(
        "const [x, , y = 5, ...rest] = [1, 2, undefined, 4, 5]; const { a, b: { c } } = { a: 1, b: { c: 2 } }; console.log(x, y, rest, a, c)"
      )
    ).toEqual(["1 5 [ 4, 5 ] 1 2"]);
  });

  it("short-circuits logical operators", () => {
    expect(
      logs(
        "let n = 0; const r = false && (n = 1); const s = null ?? 'd'; console.log(r, n, s, 0 || '' || 'last')"
      )
    ).toEqual(["false 0 d last"]);
  });

  it("falls through switch cases until break", () => {
    expect(
      logs(
        "switch (2) { case 1: console.log('one'); case 2: console.log('two'); case 3: console.log('three'); break; default: console.log('d') }"
      )
    ).toEqual(["two", "three"]);
  });

  it("rejects writes to const bindings and unknown names", () => {
    expect(() => new Harness().run("const k = 1; k = 2")).toThrow(
      "Assignment to constant variable 'k'"
    );
    expect(() => new Harness().run("nope + 1")).toThrow("unknown variable: nope");
  });

  it("exposes globals to the host", () => {
    const h = new Harness();
    h.set("x", num(41));
    h.run("x = x + 1");
    expect(h.get("x")).toEqual({ kind: "Number", value: 42 });
  });
});

describe("exceptions", () => {
  it("turns runtime errors into catchable Error objects", () => {
    expect(logs("try { null.x } catch (e) { console.log(e.name, e.message) }")).toEqual([
      "TypeError cannot read properties of null (reading 'x')",
    ]);
  });

  it("runs finally after catch", () => {
    expect(
      logs("try { throw 'x' } catch (e) { console.log('caught', e) } finally { console.log('done') }")
    ).toEqual(["caught x", "done"]);
  });

  it("reports uncaught throws to the host", () => {
    expect(() => new Harness().run("throw new Error('boom')")).toThrow("Uncaught Error: boom");
  });

  it("stops runaway loops and recursion", () => {
    const h = new Harness({ maxLoopIterations: 10 });
    expect(() => h.run("while (true) {}")).toThrow("loop iteration limit exceeded (10)");
    expect(() => h.run("try { while (true) {} } catch (e) { console.log('caught') }")).toThrow(
      "loop iteration limit exceeded (10)"
    );
    expect(h.takeConsoleLogs()).toEqual([]);
    expect(() =>
      new Harness({ maxCallDepth: 20 }).run("function f() { return f() } f()")
    ).toThrow("maximum call depth exceeded (20)");
  });
});

describe("promises and timers", () => {
  it("runs microtasks before timers", () => {
    const h = new Harness();
    h.run(
      "setTimeout(() => console.log('timeout'), 0); Promise.resolve().then(() => console.log('micro')); console.log('sync')"
    );
    expect(h.takeConsoleLogs()).toEqual(["sync", "micro"]);
    expect(h.flush()).toBe(1);
    expect(h.takeConsoleLogs()).toEqual(["timeout"]);
  });

  it("awaits settled promises inside async functions", () => {
    expect(
      logs(
        "async function f() { const v = await Promise.resolve(5); return v + 1 } f().then(v => console.log(v))"
      )
    ).toEqual(["6"]);
    expect(
      logs("async function g() { throw new Error('bad') } g().catch(e => console.log('caught', e.message))")
    ).toEqual(["caught bad"]);
    expect(
      logs(
        "async function h() { try { await Promise.reject(new Error('no')) } catch (e) { console.log(e.message) } } h()"
      )
    ).toEqual(["no"]);
  });

  it("settles once when resolve is called with a pending promise", () => {
    expect(
      logs(
        "let later; const p = new Promise(r => { later = r }); const q = new Promise(r => { r(p); r(5) }); q.then(v => console.log('q', v)); later(7)"
      )
    ).toEqual(["q 7"]);
    expect(
      logs(
        "let later; const p = new Promise(r => { later = r }); const q = new Promise((res, rej) => { res(p); rej('no') }); q.then(v => console.log('ok', v), e => console.log('err', e)); later(1)"
      )
    ).toEqual(["ok 1"]);
  });

  it("gives the same value to every reader of a settled promise", () => {
    expect(
      logs("const p = Promise.resolve(4); p.then(v => console.log('a', v)); p.then(v => console.log('b', v))")
    ).toEqual(["a 4", "b 4"]);
    expect(
      logs(
        "const p = Promise.resolve(4); async function f() { const x = await p; const y = await p; console.log(x, y, x === y) } f()"
      )
    ).toEqual(["4 4 true"]);
  });

  it("runs intervals until they clear themselves", () => {
    const h = new Harness();
    h.run(
      "let count = 0;\nconst id = setInterval(() => { count++; console.log('tick', count); if (count === 3) clearInterval(id) }, 10);"
    );
    expect(h.flush()).toBe(3);
    expect(h.takeConsoleLogs()).toEqual(["tick 1", "tick 2", "tick 3"]);
    expect(h.nowMs()).toBe(30);
    expect(h.pendingTimers()).toEqual([]);
  });

  it("lets a timer started inside a function cancel itself by id", () => {
    const h = new Harness();
    h.run(
      "function start() { const id = setInterval(() => { console.log('once', typeof id); clearInterval(id) }, 5) } start()"
    );
    expect(h.flush()).toBe(1);
    expect(h.takeConsoleLogs()).toEqual(["once number"]);
    expect(h.pendingTimers()).toEqual([]);
  });

  it("passes extra timer arguments and resolves references when fired", () => {
    const h = new Harness();
    h.run("function greet(name) { console.log('hi', name) } setTimeout(greet, 5, 'bob')");
    h.advanceTime(5);
    expect(h.takeConsoleLogs()).toEqual(["hi bob"]);

    h.run("let cb = () => console.log('old'); setTimeout(cb, 1); cb = () => console.log('new')");
    h.flush();
    expect(h.takeConsoleLogs()).toEqual(["new"]);
  });

  it("reads the virtual clock", () => {
    expect(
      logs("const d = new Date(0); console.log(Date.now(), d.toISOString())", { startTimeMs: 1000 })
    ).toEqual(["1000 1970-01-01T00:00:00.000Z"]);
  });
});
