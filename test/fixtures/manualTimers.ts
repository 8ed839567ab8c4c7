import type { EngineTimers, TimerHandle } from "../../src/engine/internal/timers";

type Scheduled = {
  id: number;
  at: number;
  every: number | null;
  callback: () => void;
};

/**
 * Clock that only moves when the test calls `advance`. Timers fire in due
 * order; intervals re-arm at their fixed period.
 */
export function createManualTimers(startAt = 0) {
  let now = startAt;
  let nextId = 1;
  const pending = new Map<number, Scheduled>();

  const add = (callback: () => void, ms: number, every: number | null): TimerHandle => {
    const id = nextId++;
    pending.set(id, { id, at: now + Math.max(0, ms), every, callback });
    return id;
  };
  const remove = (handle: TimerHandle) => {
    if (typeof handle === "number") pending.delete(handle);
  };

  const timers: EngineTimers = {
    now: () => now,
    setTimeout: (callback, ms) => add(callback, ms, null),
    clearTimeout: remove,
    setInterval: (callback, ms) => add(callback, ms, Math.max(1, ms)),
    clearInterval: remove,
  };

  const nextDue = (until: number): Scheduled | null => {
    let best: Scheduled | null = null;
    for (const entry of pending.values()) {
      if (entry.at > until) continue;
      if (!best || entry.at < best.at || (entry.at === best.at && entry.id < best.id)) best = entry;
    }
    return best;
  };

  const advance = (ms: number) => {
    const until = now + ms;
    for (let due = nextDue(until); due; due = nextDue(until)) {
      now = due.at;
      if (due.every == null) {
        pending.delete(due.id);
      } else {
        due.at += due.every;
      }
      due.callback();
    }
    now = until;
  };

  return {
    timers,
    advance,
    now: () => now,
    get pendingCount() {
      return pending.size;
    },
  };
}

/** Returns the given values in turn, repeating the last one. */
export function sequenceRandom(values: readonly number[]) {
  let i = 0;
  return () => {
    const v = values[Math.min(i, values.length - 1)] ?? 0;
    i += 1;
    return v;
  };
}
