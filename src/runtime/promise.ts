import { thrownValue } from "./thrown";
import type {
  PromiseReaction,
  PromiseState,
  PromiseValue,
  ResolverValue,
  Value,
} from "./value";
import { arr, errorObject, isCallable, obj, str, undef } from "./value";

export type SettledState = Exclude<PromiseState, { status: "pending" }>;

/** What the promise machinery needs from its owner. */
export interface PromiseHost {
  queueMicrotask(job: () => void): void;
  /** Calls a script callable; script throws surface as host exceptions. */
  call(fn: Value, args: Value[], thisValue?: Value): Value;
  nextPromiseId(): number;
}

export function createPromise(host: PromiseHost): PromiseValue {
  return {
    kind: "Promise",
    id: host.nextPromiseId(),
    state: { status: "pending" },
    reactions: [],
    handled: false,
  };
}

export function isSettled(promise: PromiseValue): boolean {
  return promise.state.status !== "pending";
}

function settle(host: PromiseHost, promise: PromiseValue, state: SettledState): void {
  if (promise.state.status !== "pending") return;
  promise.state = state;
  const reactions = promise.reactions;
  promise.reactions = [];
  for (const reaction of reactions) {
    host.queueMicrotask(() => runReaction(host, reaction, state));
  }
}

export function fulfillPromise(host: PromiseHost, promise: PromiseValue, value: Value): void {
  settle(host, promise, { status: "fulfilled", value });
}

export function rejectPromise(host: PromiseHost, promise: PromiseValue, reason: Value): void {
  settle(host, promise, { status: "rejected", reason });
}

/** Registers a host observer that runs as a microtask once `promise` settles. */
export function observePromise(
  host: PromiseHost,
  promise: PromiseValue,
  observer: (state: SettledState) => void
): void {
  promise.handled = true;
  const reaction: PromiseReaction = { isFinally: false, observer };
  const state = promise.state;
  if (state.status === "pending") {
    promise.reactions.push(reaction);
  } else {
    host.queueMicrotask(() => runReaction(host, reaction, state));
  }
}

export interface ResolvingFunctions {
  resolve: ResolverValue;
  reject: ResolverValue;
}

/** A fresh resolve/reject pair for `promise`, as handed to an executor or a thenable. */
export function createResolvingFunctions(promise: PromiseValue): ResolvingFunctions {
  const alreadyResolved = { value: false };
  return {
    resolve: { kind: "Resolver", promise, reject: false, alreadyResolved },
    reject: { kind: "Resolver", promise, reject: true, alreadyResolved },
  };
}

/** Calls a resolving function; once either of the pair has run, later calls do nothing. */
export function callResolver(host: PromiseHost, resolver: ResolverValue, value: Value): void {
  if (resolver.alreadyResolved.value) return;
  resolver.alreadyResolved.value = true;
  if (resolver.reject) rejectPromise(host, resolver.promise, value);
  else resolvePromise(host, resolver.promise, value);
}

function adopt(host: PromiseHost, promise: PromiseValue, source: PromiseValue): void {
  observePromise(host, source, (state) => settle(host, promise, state));
}

/**
 * Resolves `promise` with `value`. Promises and thenables are adopted; a
 * promise resolved with itself rejects with a TypeError. Settled promises
 * ignore later calls.
 */
export function resolvePromise(host: PromiseHost, promise: PromiseValue, value: Value): void {
  if (promise.state.status !== "pending") return;
  if (value === promise) {
    rejectPromise(host, promise, errorObject("TypeError", "Chaining cycle detected for promise"));
    return;
  }
  if (value.kind === "Promise") {
    adopt(host, promise, value);
    return;
  }
  const then = value.kind === "Object" ? value.entries.get("then") : undefined;
  if (then && isCallable(then)) {
    host.queueMicrotask(() => {
      const { resolve, reject } = createResolvingFunctions(promise);
      try {
        host.call(then, [resolve, reject], value);
      } catch (e) {
        const reason = thrownValue(e);
        if (reason === undefined) throw e;
        callResolver(host, reject, reason);
      }
    });
    return;
  }
  fulfillPromise(host, promise, value);
}

/** `Promise.resolve(value)`: promises pass through unchanged. */
export function promiseResolve(host: PromiseHost, value: Value): PromiseValue {
  if (value.kind === "Promise") return value;
  const promise = createPromise(host);
  resolvePromise(host, promise, value);
  return promise;
}

export function promiseReject(host: PromiseHost, reason: Value): PromiseValue {
  const promise = createPromise(host);
  rejectPromise(host, promise, reason);
  return promise;
}

function addReaction(host: PromiseHost, promise: PromiseValue, reaction: PromiseReaction): void {
  promise.handled = true;
  const state = promise.state;
  if (state.status === "pending") {
    promise.reactions.push(reaction);
  } else {
    host.queueMicrotask(() => runReaction(host, reaction, state));
  }
}

export function promiseThen(
  host: PromiseHost,
  promise: PromiseValue,
  onFulfilled?: Value,
  onRejected?: Value
): PromiseValue {
  const child = createPromise(host);
  const reaction: PromiseReaction = { isFinally: false, child };
  if (onFulfilled && isCallable(onFulfilled)) reaction.onFulfilled = onFulfilled;
  if (onRejected && isCallable(onRejected)) reaction.onRejected = onRejected;
  addReaction(host, promise, reaction);
  return child;
}

export function promiseFinally(host: PromiseHost, promise: PromiseValue, onFinally?: Value): PromiseValue {
  const child = createPromise(host);
  const reaction: PromiseReaction = { isFinally: true, child };
  if (onFinally && isCallable(onFinally)) reaction.onFulfilled = onFinally;
  addReaction(host, promise, reaction);
  return child;
}

function passThrough(host: PromiseHost, child: PromiseValue, state: SettledState): void {
  if (state.status === "fulfilled") resolvePromise(host, child, state.value);
  else rejectPromise(host, child, state.reason);
}

function runReaction(host: PromiseHost, reaction: PromiseReaction, state: SettledState): void {
  if (reaction.observer) {
    reaction.observer(state);
    return;
  }
  const child = reaction.child;
  if (!child) return;
  const handler = reaction.isFinally
    ? reaction.onFulfilled
    : state.status === "fulfilled"
      ? reaction.onFulfilled
      : reaction.onRejected;
  if (!handler) {
    passThrough(host, child, state);
    return;
  }
  let result: Value;
  try {
    const args = reaction.isFinally
      ? []
      : [state.status === "fulfilled" ? state.value : state.reason];
    result = host.call(handler, args);
  } catch (e) {
    const reason = thrownValue(e);
    if (reason === undefined) throw e;
    rejectPromise(host, child, reason);
    return;
  }
  if (!reaction.isFinally) {
    resolvePromise(host, child, result);
  } else if (result.kind === "Promise") {
    // `finally` waits for a returned promise, then keeps the original outcome
    observePromise(host, result, (inner) =>
      inner.status === "rejected" ? rejectPromise(host, child, inner.reason) : passThrough(host, child, state)
    );
  } else {
    passThrough(host, child, state);
  }
}

// ============= COMBINATORS =============

export function promiseAll(host: PromiseHost, items: Value[]): PromiseValue {
  const result = createPromise(host);
  const values: Value[] = items.map(() => undef());
  let remaining = items.length;
  if (remaining === 0) fulfillPromise(host, result, arr([]));
  items.forEach((item, index) => {
    observePromise(host, promiseResolve(host, item), (state) => {
      if (state.status === "rejected") {
        rejectPromise(host, result, state.reason);
        return;
      }
      values[index] = state.value;
      remaining--;
      if (remaining === 0) fulfillPromise(host, result, arr(values));
    });
  });
  return result;
}

export function promiseAllSettled(host: PromiseHost, items: Value[]): PromiseValue {
  const result = createPromise(host);
  const outcomes: Value[] = items.map(() => undef());
  let remaining = items.length;
  if (remaining === 0) fulfillPromise(host, result, arr([]));
  items.forEach((item, index) => {
    observePromise(host, promiseResolve(host, item), (state) => {
      outcomes[index] =
        state.status === "fulfilled"
          ? obj([
              ["status", str("fulfilled")],
              ["value", state.value],
            ])
          : obj([
              ["status", str("rejected")],
              ["reason", state.reason],
            ]);
      remaining--;
      if (remaining === 0) fulfillPromise(host, result, arr(outcomes));
    });
  });
  return result;
}

export function promiseRace(host: PromiseHost, items: Value[]): PromiseValue {
  const result = createPromise(host);
  for (const item of items) {
    observePromise(host, promiseResolve(host, item), (state) => settle(host, result, state));
  }
  return result;
}

export function promiseAny(host: PromiseHost, items: Value[]): PromiseValue {
  const result = createPromise(host);
  const reasons: Value[] = items.map(() => undef());
  let remaining = items.length;
  const rejectAll = (): void => {
    const error = errorObject("AggregateError", "All promises were rejected");
    error.entries.set("errors", arr(reasons));
    rejectPromise(host, result, error);
  };
  if (remaining === 0) rejectAll();
  items.forEach((item, index) => {
    observePromise(host, promiseResolve(host, item), (state) => {
      if (state.status === "fulfilled") {
        fulfillPromise(host, result, state.value);
        return;
      }
      reasons[index] = state.reason;
      remaining--;
      if (remaining === 0) rejectAll();
    });
  });
  return result;
}
