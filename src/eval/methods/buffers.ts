import { ErrorCode, throwRuntime } from "../../errors";
import {
  BYTES_PER_ELEMENT,
  createTypedArray,
  readElement,
  resizeArrayBuffer,
  sliceArrayBuffer,
  transferArrayBuffer,
  typedArrayElements,
  typedArrayLength,
  writeElement,
} from "../../runtime/buffers";
import { asString, numericValue, relativeIndex, toIntegerOrInfinity } from "../../runtime/coerce";
import { sameValueZero, strictEqual } from "../../runtime/equality";
import type { ArrayBufferValue, TypedArrayValue, Value } from "../../runtime/value";
import { bool, num, str, undef } from "../../runtime/value";
import { iterableValues } from "../iterate";
import type { EvalContext } from "../context";
import type { MethodTable } from "./shared";
import { arg, callbackArg, optionalArg } from "./shared";

/** What a view stores for `value`: bigints stay bigints, everything else goes numeric. */
export function elementInput(value: Value): number | bigint {
  return value.kind === "BigInt" ? value.value : numericValue(value);
}

export const ARRAY_BUFFER_METHODS: MethodTable<ArrayBufferValue> = {
  slice: (_ctx, self, args) => {
    const n = self.bytes.length;
    return sliceArrayBuffer(self, relativeIndex(args[0], n, 0), relativeIndex(args[1], n, n));
  },
  resize: (_ctx, self, args) => {
    resizeArrayBuffer(self, toIntegerOrInfinity(arg(args, 0)));
    return undef();
  },
  transfer: (_ctx, self, args) => {
    const length = optionalArg(args, 0);
    return transferArrayBuffer(self, length ? toIntegerOrInfinity(length) : undefined);
  },
  transferToFixedLength: (_ctx, self, args) => {
    const length = optionalArg(args, 0);
    return transferArrayBuffer(self, length ? toIntegerOrInfinity(length) : undefined, false);
  },
};

function copyOf(view: TypedArrayValue, start: number, end: number): TypedArrayValue {
  const out = createTypedArray(view.type, Math.max(end - start, 0));
  for (let i = start; i < end; i++) writeElement(out, i - start, elementInput(readElement(view, i)));
  return out;
}

export const TYPED_ARRAY_METHODS: MethodTable<TypedArrayValue> = {
  set: (_ctx, self, args) => {
    const source = iterableValues(arg(args, 0));
    const offset = toIntegerOrInfinity(args[1]);
    if (offset < 0 || offset + source.length > typedArrayLength(self)) {
      return throwRuntime(ErrorCode.RANGE, { message: "offset is out of bounds" });
    }
    source.forEach((value, i) => writeElement(self, offset + i, elementInput(value)));
    return undef();
  },
  subarray: (_ctx, self, args) => {
    const n = typedArrayLength(self);
    const begin = relativeIndex(args[0], n, 0);
    const end = Math.max(relativeIndex(args[1], n, n), begin);
    return {
      kind: "TypedArray",
      type: self.type,
      buffer: self.buffer,
      byteOffset: self.byteOffset + begin * BYTES_PER_ELEMENT[self.type],
      fixedLength: end - begin,
    };
  },
  slice: (_ctx, self, args) => {
    const n = typedArrayLength(self);
    return copyOf(self, relativeIndex(args[0], n, 0), relativeIndex(args[1], n, n));
  },
  fill: (_ctx, self, args) => {
    const n = typedArrayLength(self);
    const value = elementInput(arg(args, 0));
    const end = relativeIndex(args[2], n, n);
    for (let i = relativeIndex(args[1], n, 0); i < end; i++) writeElement(self, i, value);
    return self;
  },
  at: (_ctx, self, args) => {
    const n = typedArrayLength(self);
    const i = toIntegerOrInfinity(args[0]);
    const idx = i < 0 ? n + i : i;
    return idx >= 0 && idx < n ? readElement(self, idx) : undef();
  },
  join: (_ctx, self, args) => {
    const sep = optionalArg(args, 0);
    return str(typedArrayElements(self).map(asString).join(sep ? asString(sep) : ","));
  },
  indexOf: (_ctx, self, args) => {
    const target = arg(args, 0);
    return num(typedArrayElements(self).findIndex((el) => strictEqual(el, target)));
  },
  includes: (_ctx, self, args) => {
    const target = arg(args, 0);
    return bool(typedArrayElements(self).some((el) => sameValueZero(el, target)));
  },
  forEach: (ctx, self, args) => {
    const fn = callbackArg(args, 0, "forEach");
    typedArrayElements(self).forEach((el, i) => ctx.callValue(fn, [el, num(i), self]));
    return undef();
  },
  map: (ctx, self, args) => {
    const fn = callbackArg(args, 0, "map");
    const out = createTypedArray(self.type, typedArrayLength(self));
    typedArrayElements(self).forEach((el, i) => {
      writeElement(out, i, elementInput(ctx.callValue(fn, [el, num(i), self])));
    });
    return out;
  },
  toString: (_ctx: EvalContext, self: TypedArrayValue) => str(asString(self)),
};

