import { describe, it, expect } from "vitest";
import type { HarnessOptions } from "../src/config";
import { Harness } from "../src/harness";

function logs(src: string, options: Partial<HarnessOptions> = {}): string[] {
  const h = new Harness(options);
  h.run(src);
  return h.takeConsoleLogs();
}

describe("collections", () => {
  it("keeps Map insertion order and Set uniqueness", () => {
    expect(
      logs(
        "const m = new Map(); m.set('a', 1).set('b', 2); const s = new Set([1, 2, 2]); console.log(m.size, m.get('b'), s.size, s.has(2), m)"
      )
    ).toEqual(["2 2 2 true Map(2) { 'a' => 1, 'b' => 2 }"]);
  });

  it("chains array callbacks", () => {
    expect(
      logs("console.log([1, 2, 3, 4].filter(x => x % 2 === 0).reduce((a, b) => a + b, 0))")
    ).toEqual(["6"]);
    expect(logs("console.log(Object.keys({ a: 1, b: 2 }).join('|'))")).toEqual(["a|b"]);
  });

  it("spreads arrays and objects", () => {
    expect(
      logs("const a = [1, 2]; const o = { ...{ x: 1 }, y: 2 }; console.log([...a, 3], o)")
    ).toEqual(["[ 1, 2, 3 ] { x: 1, y: 2 }"]);
  });
});

describe("strings", () => {
  it("trims, pads and indexes", () => {
    expect(
      logs("console.log('  hi '.trim().padStart(4, '*'), 'abc'.at(-1), 'ab'.repeat(2))")
    ).toEqual(["**hi c abab"]);
  });

  it("replaces and matches", () => {
    expect(logs("console.log('a,b,c'.replace(',', '-'), 'a,b,c'.replaceAll(',', ''))")).toEqual([
      "a-b,c abc",
    ]);
    expect(logs("console.log('a1b22'.match(/\\d+/g))")).toEqual(["[ '1', '22' ]"]);
  });

  it("formats numbers", () => {
    expect(logs("console.log((3.14159).toFixed(2), (255).toString(16))")).toEqual(["3.14 ff"]);
  });
});

describe("dates", () => {
  it("builds dates from UTC components", () => {
    expect(
      logs(
        "const d = new Date(2024, 1, 29, 12); console.log(d.getMonth(), d.getDate(), d.getHours(), d.toISOString())"
      )
    ).toEqual(["1 29 12 2024-02-29T12:00:00.000Z"]);
  });

  it("parses ISO strings", () => {
    expect(logs("console.log(Date.parse('1970-01-02T00:00:00Z'))")).toEqual(["86400000"]);
  });
});

describe("array buffers", () => {
  it("moves bytes on transfer and detaches the source", () => {
    expect(
      logs(
        "const buf = new ArrayBuffer(4); const view = new Uint8Array(buf); view[0] = 7; const moved = buf.transfer(); const out = new Uint8Array(moved); console.log(buf.detached, buf.byteLength, view.length, out[0], moved.byteLength)"
      )
    ).toEqual(["true 0 0 7 4"]);
  });

  it("throws when a detached buffer is used", () => {
    expect(
      logs(
        "const buf = new ArrayBuffer(2); buf.transfer(); try { buf.slice(0) } catch (e) { console.log(e.name, e.message) }"
      )
    ).toEqual(["TypeError ArrayBuffer is detached"]);
    expect(() =>
      new Harness().run("const b = new ArrayBuffer(2); b.transfer(); new Uint8Array(b)")
    ).toThrow("ArrayBuffer is detached");
  });
});

describe("URL", () => {
  it("reads components resolved against a base", () => {
    expect(
      logs(
        "const u = new URL('/a/b?x=1#top', 'https://example.com:8080'); console.log(u.hostname, u.port, u.pathname, u.search, u.hash, u.origin)"
      )
    ).toEqual(["example.com 8080 /a/b ?x=1 #top https://example.com:8080"]);
  });

  it("rewrites href when a component is assigned", () => {
    expect(
      logs(
        "const u = new URL('https://example.com/a?x=1'); u.pathname = '/c'; u.hash = 'h'; console.log(u.href, String(u))"
      )
    ).toEqual(["https://example.com/c?x=1#h https://example.com/c?x=1#h"]);
  });

  it("rejects unparseable input", () => {
    expect(logs("try { new URL('nope') } catch (e) { console.log(e.message) }")).toEqual([
      "URL invalid URL: nope",
    ]);
  });
});

describe("localStorage", () => {
  it("starts from the configured seed and keeps insertion order", () => {
    expect(
      logs(
        "localStorage.setItem('b', 2); console.log(localStorage.getItem('a'), localStorage.getItem('b'), localStorage.length, localStorage.key(1), localStorage.getItem('zz'))",
        { localStorage: { a: "1" } }
      )
    ).toEqual(["1 2 2 b null"]);
  });

  it("removes and clears items", () => {
    expect(
      logs(
        "localStorage.setItem('x', 'y'); localStorage.removeItem('a'); console.log(localStorage.length, localStorage.key(0)); localStorage.clear(); console.log(localStorage.length)",
        { localStorage: { a: "1" } }
      )
    ).toEqual(["1 x", "0"]);
  });
});
