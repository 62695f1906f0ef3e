import { typedArrayElements, typedArrayLength } from "./buffers";
import { formatFloat, isSymbolKey } from "./coerce";
import { formatIsoDate } from "./dates";
import type { Value } from "./value";

const IDENT_KEY = /^[_$A-Za-z][_$A-Za-z0-9]*$/;

function quote(text: string): string {
  return `'${text.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/\n/g, "\\n")}'`;
}

function formatKey(key: string): string {
  return IDENT_KEY.test(key) ? key : quote(key);
}

function braces(open: string, items: string[], close: string): string {
  return items.length === 0 ? `${open}${close}` : `${open} ${items.join(", ")} ${close}`;
}

/**
 * Console rendering of a value, close to what Node prints: nested strings are
 * quoted, containers list their contents and cycles print `[Circular]`.
 */
export function inspect(value: Value): string {
  const seen: Value[] = [];

  const visit = (v: Value, nested: boolean): string => {
    switch (v.kind) {
      case "Null":
        return "null";
      case "Undefined":
        return "undefined";
      case "Bool":
        return v.value ? "true" : "false";
      case "Number":
        return String(v.value);
      case "Float":
        return Object.is(v.value, -0) ? "-0" : formatFloat(v.value);
      case "BigInt":
        return `${v.value}n`;
      case "String":
        return nested ? quote(v.value) : v.value;
      case "Symbol":
        return `Symbol(${v.description ?? ""})`;
      case "Date":
        return formatIsoDate(v.ms) ?? "Invalid Date";
      case "RegExp":
        return `/${v.source}/${v.flags}`;
      case "Function":
        return v.name ? `[Function: ${v.name}]` : "[Function (anonymous)]";
      case "Resolver":
        return "[Function (anonymous)]";
      case "Builtin":
      case "Constructor":
        return `[Function: ${v.name}]`;
      case "ArrayBuffer":
        return `ArrayBuffer { byteLength: ${v.detached ? 0 : v.bytes.length} }`;
      case "Blob":
        return `Blob { size: ${v.bytes.length}, type: ${quote(v.type)} }`;
      case "Url":
        return `URL ${quote(v.href)}`;
      default:
        break;
    }
    if (seen.includes(v)) return "[Circular]";
    seen.push(v);
    try {
      return container(v);
    } finally {
      seen.pop();
    }
  };

  const props = (entries: Iterable<[string, Value]>): string[] => {
    const out: string[] = [];
    for (const [k, v] of entries) {
      if (!isSymbolKey(k)) out.push(`${formatKey(k)}: ${visit(v, true)}`);
    }
    return out;
  };

  const container = (v: Value): string => {
    switch (v.kind) {
      case "Array":
        return braces("[", [...v.elements.map((el) => visit(el, true)), ...props(v.properties)], "]");
      case "Object": {
        if (v.errorName !== undefined) {
          const message = v.entries.get("message");
          const text = message && message.kind === "String" ? message.value : "";
          return text === "" ? v.errorName : `${v.errorName}: ${text}`;
        }
        return braces("{", props(v.entries), "}");
      }
      case "Map": {
        const label = v.weak ? "WeakMap" : `Map(${v.entries.length})`;
        return braces(`${label} {`, v.entries.map(([k, val]) => `${visit(k, true)} => ${visit(val, true)}`), "}");
      }
      case "Set": {
        const label = v.weak ? "WeakSet" : `Set(${v.values.length})`;
        return braces(`${label} {`, v.values.map((el) => visit(el, true)), "}");
      }
      case "Promise": {
        const state = v.state;
        if (state.status === "pending") return "Promise { <pending> }";
        if (state.status === "fulfilled") return `Promise { ${visit(state.value, true)} }`;
        return `Promise { <rejected> ${visit(state.reason, true)} }`;
      }
      case "TypedArray":
        return braces(
          `${v.type}(${typedArrayLength(v)}) [`,
          typedArrayElements(v).map((el) => visit(el, true)),
          "]"
        );
      case "Storage":
        return braces("Storage {", [...v.items].map(([k, item]) => `${formatKey(k)}: ${quote(item)}`), "}");
      default:
        return visit(v, true);
    }
  };

  return visit(value, false);
}

/** A console line: arguments rendered and joined with single spaces. */
export function formatConsoleArgs(args: Value[]): string {
  return args.map(inspect).join(" ");
}
