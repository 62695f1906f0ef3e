import type { TypedArrayType } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import type { ArrayBufferValue, TypedArrayValue, Value } from "./value";
import { big, float, num } from "./value";

export const BYTES_PER_ELEMENT: Record<TypedArrayType, number> = {
  Int8Array: 1,
  Uint8Array: 1,
  Uint8ClampedArray: 1,
  Int16Array: 2,
  Uint16Array: 2,
  Int32Array: 4,
  Uint32Array: 4,
  Float32Array: 4,
  Float64Array: 8,
  BigInt64Array: 8,
  BigUint64Array: 8,
};

export function isBigIntArray(type: TypedArrayType): boolean {
  return type === "BigInt64Array" || type === "BigUint64Array";
}

function rangeError(message: string): never {
  return throwRuntime(ErrorCode.RANGE, { message });
}

function checkedLength(n: number, what: string): number {
  if (!Number.isInteger(n) || n < 0 || n > 2 ** 31) {
    return rangeError(`Invalid ${what} length`);
  }
  return n;
}

export function createArrayBuffer(byteLength: number, maxByteLength?: number): ArrayBufferValue {
  const length = checkedLength(byteLength, "array buffer");
  const buffer: ArrayBufferValue = {
    kind: "ArrayBuffer",
    bytes: new Uint8Array(length),
    detached: false,
  };
  if (maxByteLength !== undefined) {
    if (checkedLength(maxByteLength, "array buffer max") < length) {
      return rangeError("Invalid array buffer max length");
    }
    buffer.maxByteLength = maxByteLength;
  }
  return buffer;
}

export function bufferFromBytes(bytes: Uint8Array): ArrayBufferValue {
  return { kind: "ArrayBuffer", bytes, detached: false };
}

export function assertAttached(buffer: ArrayBufferValue): void {
  if (buffer.detached) throwRuntime(ErrorCode.DETACHED_BUFFER);
}

export function byteLengthOf(buffer: ArrayBufferValue): number {
  return buffer.detached ? 0 : buffer.bytes.length;
}

export function resizeArrayBuffer(buffer: ArrayBufferValue, newLength: number): void {
  assertAttached(buffer);
  if (buffer.maxByteLength === undefined) {
    throwRuntime(ErrorCode.INVALID_ARGUMENT, {
      callee: "ArrayBuffer.prototype.resize",
      message: "requires a resizable ArrayBuffer",
    });
  }
  if (!Number.isInteger(newLength) || newLength < 0 || newLength > buffer.maxByteLength) {
    rangeError("Invalid array buffer length");
  }
  const next = new Uint8Array(newLength);
  next.set(buffer.bytes.subarray(0, Math.min(newLength, buffer.bytes.length)));
  buffer.bytes = next;
}

/** Moves the bytes into a new buffer and detaches the old one. */
export function transferArrayBuffer(
  buffer: ArrayBufferValue,
  newLength?: number,
  preserveResizability = true
): ArrayBufferValue {
  assertAttached(buffer);
  const length = newLength ?? buffer.bytes.length;
  const next = new Uint8Array(checkedLength(length, "array buffer"));
  next.set(buffer.bytes.subarray(0, Math.min(length, buffer.bytes.length)));
  const moved = bufferFromBytes(next);
  if (preserveResizability && buffer.maxByteLength !== undefined) {
    moved.maxByteLength = Math.max(buffer.maxByteLength, length);
  }
  buffer.bytes = new Uint8Array(0);
  buffer.detached = true;
  return moved;
}

export function sliceArrayBuffer(buffer: ArrayBufferValue, start: number, end: number): ArrayBufferValue {
  assertAttached(buffer);
  return bufferFromBytes(buffer.bytes.slice(start, Math.max(start, end)));
}

// ============= TYPED ARRAY VIEWS =============

export function createTypedArrayView(
  type: TypedArrayType,
  buffer: ArrayBufferValue,
  byteOffset = 0,
  length?: number
): TypedArrayValue {
  assertAttached(buffer);
  const size = BYTES_PER_ELEMENT[type];
  if (byteOffset % size !== 0) {
    rangeError(`start offset of ${type} should be a multiple of ${size}`);
  }
  if (byteOffset > buffer.bytes.length) {
    rangeError(`Start offset ${byteOffset} is outside the bounds of the buffer`);
  }
  const view: TypedArrayValue = { kind: "TypedArray", type, buffer, byteOffset };
  if (length !== undefined) {
    if (byteOffset + length * size > buffer.bytes.length) {
      rangeError(`Invalid typed array length: ${length}`);
    }
    view.fixedLength = length;
  } else if (buffer.maxByteLength === undefined) {
    if ((buffer.bytes.length - byteOffset) % size !== 0) {
      rangeError(`byte length of ${type} should be a multiple of ${size}`);
    }
    view.fixedLength = (buffer.bytes.length - byteOffset) / size;
  }
  return view;
}

export function createTypedArray(type: TypedArrayType, length: number): TypedArrayValue {
  const count = checkedLength(length, "typed array");
  const buffer = createArrayBuffer(count * BYTES_PER_ELEMENT[type]);
  return { kind: "TypedArray", type, buffer, byteOffset: 0, fixedLength: count };
}

export function typedArrayLength(view: TypedArrayValue): number {
  const available = byteLengthOf(view.buffer) - view.byteOffset;
  const size = BYTES_PER_ELEMENT[view.type];
  if (view.fixedLength === undefined) return Math.max(0, Math.floor(available / size));
  // a view pushed out of bounds by a shrink reads as empty
  return view.fixedLength * size > available ? 0 : view.fixedLength;
}

export function typedArrayByteLength(view: TypedArrayValue): number {
  return typedArrayLength(view) * BYTES_PER_ELEMENT[view.type];
}

function dataView(view: TypedArrayValue): DataView {
  const bytes = view.buffer.bytes;
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function readElement(view: TypedArrayValue, index: number): Value {
  assertAttached(view.buffer);
  const at = view.byteOffset + index * BYTES_PER_ELEMENT[view.type];
  const dv = dataView(view);
  switch (view.type) {
    case "Int8Array":
      return num(dv.getInt8(at));
    case "Uint8Array":
    case "Uint8ClampedArray":
      return num(dv.getUint8(at));
    case "Int16Array":
      return num(dv.getInt16(at, true));
    case "Uint16Array":
      return num(dv.getUint16(at, true));
    case "Int32Array":
      return num(dv.getInt32(at, true));
    case "Uint32Array":
      return num(dv.getUint32(at, true));
    case "Float32Array":
      return float(dv.getFloat32(at, true));
    case "Float64Array":
      return float(dv.getFloat64(at, true));
    case "BigInt64Array":
      return big(dv.getBigInt64(at, true));
    case "BigUint64Array":
      return big(dv.getBigUint64(at, true));
  }
}

/** Writes a number (or bigint for the BigInt views) converted the way the view stores it. */
export function writeElement(view: TypedArrayValue, index: number, value: number | bigint): void {
  assertAttached(view.buffer);
  const at = view.byteOffset + index * BYTES_PER_ELEMENT[view.type];
  const dv = dataView(view);
  if (typeof value === "bigint") {
    if (view.type === "BigInt64Array") dv.setBigInt64(at, value, true);
    else if (view.type === "BigUint64Array") dv.setBigUint64(at, value, true);
    else throwRuntime(ErrorCode.BIGINT_TO_NUMBER);
    return;
  }
  switch (view.type) {
    case "Int8Array":
      dv.setInt8(at, value);
      break;
    case "Uint8Array":
      dv.setUint8(at, value);
      break;
    case "Uint8ClampedArray":
      dv.setUint8(at, Uint8ClampedArray.of(value)[0]);
      break;
    case "Int16Array":
      dv.setInt16(at, value, true);
      break;
    case "Uint16Array":
      dv.setUint16(at, value, true);
      break;
    case "Int32Array":
      dv.setInt32(at, value, true);
      break;
    case "Uint32Array":
      dv.setUint32(at, value, true);
      break;
    case "Float32Array":
      dv.setFloat32(at, value, true);
      break;
    case "Float64Array":
      dv.setFloat64(at, value, true);
      break;
    case "BigInt64Array":
    case "BigUint64Array":
      throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: view.type,
        message: "requires BigInt values",
      });
  }
}

export function typedArrayElements(view: TypedArrayValue): Value[] {
  const length = typedArrayLength(view);
  const out: Value[] = [];
  for (let i = 0; i < length; i++) out.push(readElement(view, i));
  return out;
}

/** Copy of the bytes a view covers. */
export function typedArrayBytes(view: TypedArrayValue): Uint8Array {
  assertAttached(view.buffer);
  return view.buffer.bytes.slice(view.byteOffset, view.byteOffset + typedArrayByteLength(view));
}
