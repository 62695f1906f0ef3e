import type { Value } from "../runtime/value";

// Control flow travels as exceptions; none of these is ever visible to a script.

export class ReturnSignal extends Error {
  constructor(readonly value: Value) {
    super("return outside of a function");
    Object.setPrototypeOf(this, ReturnSignal.prototype);
  }
}

export class BreakSignal extends Error {
  constructor() {
    super("break outside of a loop or switch");
    Object.setPrototypeOf(this, BreakSignal.prototype);
  }
}

export class ContinueSignal extends Error {
  constructor() {
    super("continue outside of a loop");
    Object.setPrototypeOf(this, ContinueSignal.prototype);
  }
}
