import { describe, it, expect } from "vitest";
import type { TimerCallback } from "../src/ast";
import { Env } from "../src/runtime/env";
import type { ScheduledTask } from "../src/runtime/scheduler";
import { Scheduler } from "../src/runtime/scheduler";

const callback: TimerCallback = { kind: "Reference", expr: { kind: "Var", name: "tick" } };

function makeScheduler(
  onRun: (task: ScheduledTask, scheduler: Scheduler) => void = () => undefined,
  stepLimit = 100
) {
  const ran: number[] = [];
  const trace: string[] = [];
  const scheduler: Scheduler = new Scheduler(
    { startTimeMs: 0, timerStepLimit: stepLimit },
    (task) => {
      ran.push(task.id);
      onRun(task, scheduler);
    },
    (line) => trace.push(line)
  );
  return { scheduler, ran, trace };
}

describe("scheduler", () => {
  it("runs timers by due time, then by scheduling order", () => {
    const { scheduler, ran } = makeScheduler();
    const env = new Env();
    scheduler.scheduleTimeout(callback, 10, [], env);
    scheduler.scheduleTimeout(callback, 5, [], env);
    scheduler.scheduleTimeout(callback, 5, [], env);
    expect(scheduler.flush()).toBe(3);
    expect(ran).toEqual([2, 3, 1]);
    expect(scheduler.nowMs).toBe(10);
  });

  it("advances only as far as asked", () => {
    const { scheduler, ran } = makeScheduler();
    const env = new Env();
    scheduler.scheduleTimeout(callback, 10, [], env);
    scheduler.scheduleTimeout(callback, 5, [], env);
    expect(scheduler.advanceTime(7)).toBe(1);
    expect(ran).toEqual([2]);
    expect(scheduler.nowMs).toBe(7);
    expect(scheduler.pendingTimers()).toEqual([{ id: 1, dueAt: 10, order: 0 }]);
  });

  it("requeues intervals after each run", () => {
    const { scheduler, ran } = makeScheduler();
    scheduler.scheduleInterval(callback, 10, [], new Env());
    expect(scheduler.advanceTime(25)).toBe(2);
    expect(ran).toEqual([1, 1]);
    expect(scheduler.pendingTimers()).toEqual([
      { id: 1, dueAt: 30, order: 2, intervalMs: 10 },
    ]);
  });

  it("does not requeue an interval that clears itself", () => {
    const { scheduler, ran } = makeScheduler((task, s) => s.clear(task.id));
    scheduler.scheduleInterval(callback, 10, [], new Env());
    expect(scheduler.flush()).toBe(1);
    expect(ran).toEqual([1]);
    expect(scheduler.pendingTimers()).toEqual([]);
  });

  it("reports whether clearTimer found a timer", () => {
    const { scheduler } = makeScheduler();
    const id = scheduler.scheduleTimeout(callback, 10, [], new Env());
    expect(scheduler.clearTimer(id)).toBe(true);
    expect(scheduler.clearTimer(id)).toBe(false);
  });

  it("stops a runaway interval at the step limit", () => {
    const { scheduler } = makeScheduler(() => undefined, 5);
    scheduler.scheduleInterval(callback, 0, [], new Env());
    expect(() => scheduler.flush()).toThrow(
      "flush exceeded max task steps (possible uncleared setInterval): limit=5, steps=6, now_ms=0, due_limit=none, pending_tasks=1, next_task=id=1,due_at=0,order=5,interval_ms=0"
    );
  });

  it("rejects moving the clock backwards", () => {
    const { scheduler } = makeScheduler();
    expect(() => scheduler.advanceTime(-1)).toThrow(
      "advanceTime requires non-negative milliseconds"
    );
    scheduler.advanceTime(5);
    expect(() => scheduler.advanceTimeTo(1)).toThrow(
      "advanceTimeTo requires target >= nowMs (target=1, nowMs=5)"
    );
  });

  it("drains microtasks after every timer task", () => {
    const order: string[] = [];
    const { scheduler } = makeScheduler((task, s) => {
      order.push(`task${task.id}`);
      s.queueMicrotask(() => order.push(`micro${task.id}`));
    });
    const env = new Env();
    scheduler.scheduleTimeout(callback, 1, [], env);
    scheduler.scheduleTimeout(callback, 2, [], env);
    scheduler.flush();
    expect(order).toEqual(["task1", "micro1", "task2", "micro2"]);
  });

  it("jumps the clock for runNextTimer", () => {
    const { scheduler, trace } = makeScheduler();
    scheduler.scheduleTimeout(callback, 50, [], new Env());
    expect(scheduler.runNextTimer()).toBe(true);
    expect(scheduler.nowMs).toBe(50);
    expect(scheduler.runNextTimer()).toBe(false);
    expect(trace[trace.length - 1]).toBe("[timer] run_next none");
  });

  it("leaves a not-yet-due timer alone in runNextDueTimer", () => {
    const { scheduler } = makeScheduler();
    scheduler.scheduleTimeout(callback, 50, [], new Env());
    expect(scheduler.runNextDueTimer()).toBe(false);
    expect(scheduler.runDueTimers()).toBe(0);
    expect(scheduler.pendingTimers()).toHaveLength(1);
  });

  it("writes trace lines", () => {
    const { scheduler, trace } = makeScheduler();
    scheduler.scheduleTimeout(callback, 10, [], new Env());
    scheduler.advanceTime(10);
    expect(trace).toEqual([
      "[timer] schedule timeout id=1 due_at=10 delay_ms=10",
      "[timer] run id=1 due_at=10 interval_ms=none now_ms=10",
      "[timer] advance delta_ms=10 from=0 to=10 ran_due=1",
    ]);
  });
});
