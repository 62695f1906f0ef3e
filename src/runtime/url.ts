import { ErrorCode, throwRuntime } from "../errors";
import type { UrlValue, Value } from "./value";
import { str } from "./value";

/** Readable URL components; all but `origin` can be assigned. */
export const URL_COMPONENTS = [
  "href",
  "protocol",
  "username",
  "password",
  "host",
  "hostname",
  "port",
  "pathname",
  "search",
  "hash",
  "origin",
] as const;

export type UrlComponent = (typeof URL_COMPONENTS)[number];

export function isUrlComponent(name: string): name is UrlComponent {
  return URL_COMPONENTS.some((c) => c === name);
}

function parseUrl(input: string, base?: string): URL {
  try {
    return base === undefined ? new URL(input) : new URL(input, base);
  } catch {
    const shown = base === undefined ? input : `${input} (base ${base})`;
    return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
      callee: "URL",
      message: `invalid URL: ${shown}`,
    });
  }
}

export function createUrl(input: string, base?: string): UrlValue {
  return { kind: "Url", href: parseUrl(input, base).href, properties: new Map() };
}

export function urlGet(url: UrlValue, name: UrlComponent): Value {
  return str(new URL(url.href)[name]);
}

/** Writes one component through the host parser, which normalizes `href`. */
export function urlSet(url: UrlValue, name: UrlComponent, text: string): void {
  if (name === "origin") return;
  if (name === "href") {
    url.href = parseUrl(text).href;
    return;
  }
  const host = new URL(url.href);
  host[name] = text;
  url.href = host.href;
}
