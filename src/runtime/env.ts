import type { DeclKind } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import type { Value } from "./value";

export interface EnvItem {
  value: Value;
  mutable: boolean;
}

/**
 * One lexical scope. Lookups walk outwards through `parent`; `var` and
 * function declarations land in the nearest function scope.
 */
export class Env {
  readonly vars = new Map<string, EnvItem>();

  constructor(
    readonly parent?: Env,
    readonly isFunctionScope = parent === undefined
  ) {}

  /** A nested block scope. */
  child(): Env {
    return new Env(this, false);
  }

  /** A fresh function-call scope whose outer scope is this one. */
  functionScope(): Env {
    return new Env(this, true);
  }

  lookupItem(name: string): EnvItem | undefined {
    for (let env: Env | undefined = this; env; env = env.parent) {
      const item = env.vars.get(name);
      if (item) return item;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookupItem(name) !== undefined;
  }

  get(name: string): Value | undefined {
    return this.lookupItem(name)?.value;
  }

  /** Binds `name` in this scope, replacing any binding of the same scope. */
  define(name: string, value: Value, mutable = true): void {
    this.vars.set(name, { value, mutable });
  }

  declare(kind: DeclKind, name: string, value: Value): void {
    const scope = kind === "var" ? this.nearestFunctionScope() : this;
    scope.define(name, value, kind !== "const");
  }

  /**
   * Writes to the nearest binding of `name`. Unbound names become globals,
   * as sloppy-mode assignment does.
   */
  assign(name: string, value: Value): void {
    const item = this.lookupItem(name);
    if (!item) {
      this.root().define(name, value);
      return;
    }
    if (!item.mutable) throwRuntime(ErrorCode.ASSIGN_TO_CONST, { name });
    item.value = value;
  }

  delete(name: string): boolean {
    for (let env: Env | undefined = this; env; env = env.parent) {
      if (env.vars.delete(name)) return true;
    }
    return false;
  }

  nearestFunctionScope(): Env {
    let env: Env = this;
    while (!env.isFunctionScope && env.parent) env = env.parent;
    return env;
  }

  root(): Env {
    let env: Env = this;
    while (env.parent) env = env.parent;
    return env;
  }
}
