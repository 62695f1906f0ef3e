import type { TimerCallback } from "../ast/nodes";
import { ErrorCode, runtimeError, throwRuntime } from "../errors";
import type { Env } from "./env";
import type { Value } from "./value";

export interface ScheduledTask {
  id: number;
  dueAt: number;
  order: number;
  intervalMs?: number;
  callback: TimerCallback;
  args: Value[];
  /** Scope the callback was scheduled from; kept across interval runs. */
  env: Env;
}

export interface PendingTimer {
  id: number;
  dueAt: number;
  order: number;
  intervalMs?: number;
}

export type TaskRunner = (task: ScheduledTask) => void;

export interface SchedulerOptions {
  startTimeMs: number;
  timerStepLimit: number;
}

export const ANIMATION_FRAME_MS = 16;

/**
 * Virtual clock with a timer queue ordered by `(dueAt, order)` and a FIFO
 * microtask queue. Microtasks drain after every timer task.
 */
export class Scheduler {
  nowMs: number;
  private stepLimit: number;
  private readonly queue: ScheduledTask[] = [];
  private readonly microtasks: Array<() => void> = [];
  private nextTimerId = 1;
  private nextOrder = 0;
  private runningTimerId: number | undefined;
  private runningTimerCanceled = false;
  private microtaskDepth = 0;

  constructor(
    options: SchedulerOptions,
    private readonly runner: TaskRunner,
    private readonly trace: (line: string) => void = () => undefined
  ) {
    this.nowMs = options.startTimeMs;
    this.stepLimit = options.timerStepLimit;
  }

  setStepLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
      throwRuntime(ErrorCode.INVALID_OPTION, {
        name: "timerStepLimit",
        reason: "must be an integer >= 1",
      });
    }
    this.stepLimit = limit;
  }

  private allocateOrder(): number {
    return this.nextOrder++;
  }

  private push(
    callback: TimerCallback,
    delayMs: number,
    args: Value[],
    env: Env,
    intervalMs?: number
  ): ScheduledTask {
    const task: ScheduledTask = {
      id: this.nextTimerId++,
      dueAt: this.nowMs + Math.max(0, delayMs),
      order: this.allocateOrder(),
      callback,
      args,
      env,
    };
    if (intervalMs !== undefined) task.intervalMs = Math.max(0, intervalMs);
    this.queue.push(task);
    return task;
  }

  scheduleTimeout(callback: TimerCallback, delayMs: number, args: Value[], env: Env): number {
    const task = this.push(callback, delayMs, args, env);
    this.trace(
      `[timer] schedule timeout id=${task.id} due_at=${task.dueAt} delay_ms=${Math.max(0, delayMs)}`
    );
    return task.id;
  }

  scheduleInterval(callback: TimerCallback, intervalMs: number, args: Value[], env: Env): number {
    const task = this.push(callback, intervalMs, args, env, intervalMs);
    this.trace(
      `[timer] schedule interval id=${task.id} due_at=${task.dueAt} interval_ms=${task.intervalMs}`
    );
    return task.id;
  }

  /** Animation frames are 16 ms timeouts whose callback receives the frame time. */
  scheduleAnimationFrame(callback: TimerCallback, frameTime: (dueAt: number) => Value, env: Env): number {
    const dueAt = this.nowMs + ANIMATION_FRAME_MS;
    return this.scheduleTimeout(callback, ANIMATION_FRAME_MS, [frameTime(dueAt)], env);
  }

  clear(id: number): void {
    const before = this.queue.length;
    this.removeWhere((t) => t.id === id);
    const removed = before - this.queue.length;
    const runningCanceled = this.runningTimerId === id;
    if (runningCanceled) this.runningTimerCanceled = true;
    this.trace(`[timer] clear id=${id} removed=${removed} running_canceled=${runningCanceled}`);
  }

  /** Clears `id` and reports whether it was pending or running. */
  clearTimer(id: number): boolean {
    const existed = this.runningTimerId === id || this.queue.some((t) => t.id === id);
    this.clear(id);
    return existed;
  }

  clearAll(): number {
    const cleared = this.queue.length;
    this.queue.length = 0;
    if (this.runningTimerId !== undefined) this.runningTimerCanceled = true;
    this.trace(`[timer] clear_all cleared=${cleared}`);
    return cleared;
  }

  private removeWhere(predicate: (task: ScheduledTask) => boolean): void {
    for (let i = this.queue.length - 1; i >= 0; i--) {
      if (predicate(this.queue[i])) this.queue.splice(i, 1);
    }
  }

  pendingTimers(): PendingTimer[] {
    return [...this.queue]
      .sort((a, b) => a.dueAt - b.dueAt || a.order - b.order)
      .map((t) => {
        const timer: PendingTimer = { id: t.id, dueAt: t.dueAt, order: t.order };
        if (t.intervalMs !== undefined) timer.intervalMs = t.intervalMs;
        return timer;
      });
  }

  // ============= MICROTASKS =============

  queueMicrotask(job: () => void): void {
    this.microtasks.push(job);
  }

  get pendingMicrotasks(): number {
    return this.microtasks.length;
  }

  get inMicrotask(): boolean {
    return this.microtaskDepth > 0;
  }

  drainMicrotasks(): void {
    this.microtaskDepth++;
    try {
      for (let job = this.microtasks.shift(); job; job = this.microtasks.shift()) {
        job();
      }
    } finally {
      this.microtaskDepth--;
    }
  }

  // ============= CLOCK CONTROL =============

  advanceTime(deltaMs: number): number {
    if (deltaMs < 0) throwRuntime(ErrorCode.NEGATIVE_ADVANCE);
    const from = this.nowMs;
    this.nowMs += deltaMs;
    const ran = this.runQueue(this.nowMs, false);
    this.trace(`[timer] advance delta_ms=${deltaMs} from=${from} to=${this.nowMs} ran_due=${ran}`);
    return ran;
  }

  advanceTimeTo(targetMs: number): number {
    if (targetMs < this.nowMs) {
      throwRuntime(ErrorCode.ADVANCE_TO_PAST, { target: targetMs, nowMs: this.nowMs });
    }
    const from = this.nowMs;
    this.nowMs = targetMs;
    const ran = this.runQueue(this.nowMs, false);
    this.trace(`[timer] advance_to from=${from} to=${this.nowMs} ran_due=${ran}`);
    return ran;
  }

  /** Runs every queued task, moving the clock forward to each due time. */
  flush(): number {
    const from = this.nowMs;
    const ran = this.runQueue(undefined, true);
    this.trace(`[timer] flush from=${from} to=${this.nowMs} ran=${ran}`);
    return ran;
  }

  runDueTimers(): number {
    const ran = this.runQueue(this.nowMs, false);
    this.trace(`[timer] run_due now_ms=${this.nowMs} ran=${ran}`);
    return ran;
  }

  runNextTimer(): boolean {
    const task = this.takeNext(undefined);
    if (!task) {
      this.trace("[timer] run_next none");
      return false;
    }
    if (task.dueAt > this.nowMs) this.nowMs = task.dueAt;
    this.execute(task);
    return true;
  }

  runNextDueTimer(): boolean {
    const task = this.takeNext(this.nowMs);
    if (!task) {
      this.trace("[timer] run_next_due none");
      return false;
    }
    this.execute(task);
    return true;
  }

  private nextIndex(dueLimit: number | undefined): number {
    let best = -1;
    this.queue.forEach((task, idx) => {
      if (dueLimit !== undefined && task.dueAt > dueLimit) return;
      const current = best < 0 ? undefined : this.queue[best];
      if (!current || task.dueAt < current.dueAt || (task.dueAt === current.dueAt && task.order < current.order)) {
        best = idx;
      }
    });
    return best;
  }

  private takeNext(dueLimit: number | undefined): ScheduledTask | undefined {
    const idx = this.nextIndex(dueLimit);
    return idx < 0 ? undefined : this.queue.splice(idx, 1)[0];
  }

  private runQueue(dueLimit: number | undefined, advanceClock: boolean): number {
    let steps = 0;
    while (this.nextIndex(dueLimit) >= 0) {
      steps++;
      if (steps > this.stepLimit) throw this.stepLimitError(steps, dueLimit);
      const task = this.takeNext(dueLimit);
      if (!task) break;
      if (advanceClock && task.dueAt > this.nowMs) this.nowMs = task.dueAt;
      this.execute(task);
    }
    return steps;
  }

  private stepLimitError(steps: number, dueLimit: number | undefined): Error {
    const idx = this.nextIndex(dueLimit);
    const next = idx < 0 ? undefined : this.queue[idx];
    return runtimeError(ErrorCode.TIMER_STEP_LIMIT, {
      limit: this.stepLimit,
      steps,
      nowMs: this.nowMs,
      dueLimit: dueLimit === undefined ? "none" : dueLimit,
      pending: this.queue.length,
      next: next
        ? `id=${next.id},due_at=${next.dueAt},order=${next.order},interval_ms=${next.intervalMs ?? "none"}`
        : "none",
    });
  }

  private execute(task: ScheduledTask): void {
    this.trace(
      `[timer] run id=${task.id} due_at=${task.dueAt} interval_ms=${task.intervalMs ?? "none"} now_ms=${this.nowMs}`
    );
    this.runningTimerId = task.id;
    this.runningTimerCanceled = false;
    let canceled: boolean;
    try {
      this.runner(task);
      this.drainMicrotasks();
    } finally {
      canceled = this.runningTimerCanceled;
      this.runningTimerId = undefined;
      this.runningTimerCanceled = false;
    }
    if (task.intervalMs === undefined || canceled) return;
    const requeued: ScheduledTask = {
      ...task,
      dueAt: task.dueAt + task.intervalMs,
      order: this.allocateOrder(),
    };
    this.queue.push(requeued);
    this.trace(
      `[timer] requeue id=${task.id} due_at=${requeued.dueAt} interval_ms=${task.intervalMs}`
    );
  }
}
