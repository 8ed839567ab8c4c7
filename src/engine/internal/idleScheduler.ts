import { isEqual } from "lodash";

import { IDLE_INTERVAL_RANGE } from "../../shared/audio/audioTuning";
import type { EngineTimers, TimerHandle } from "./timers";
import type { IdleTiming, ImageHandle } from "../../types/avatar";

type IdleSchedulerOptions = {
  timers: EngineTimers;
  onFrame: (image: ImageHandle | null, index: number) => void;
  random?: () => number;
  frames?: readonly ImageHandle[];
  timing?: IdleTiming;
  randomOrder?: boolean;
  index?: number;
};

const sanitizeTiming = ({ intervalMin, intervalMax }: IdleTiming): IdleTiming => {
  const min = Math.max(IDLE_INTERVAL_RANGE.minSeconds, intervalMin);
  return { intervalMin: min, intervalMax: Math.max(min, intervalMax) };
};

/**
 * Steps through the idle frames on a self-rescheduling timeout. Every firing
 * draws its own next delay, so timing and order changes apply from the next
 * tick on without touching the one already pending.
 */
export class IdleScheduler {
  private readonly timers: EngineTimers;
  private readonly onFrame: (image: ImageHandle | null, index: number) => void;
  private readonly random: () => number;
  private frames: ImageHandle[];
  private timing: IdleTiming;
  private randomOrder: boolean;
  private index: number;
  private running: boolean;
  private paused: boolean;
  private timer: TimerHandle | null;

  constructor({
    timers,
    onFrame,
    random = Math.random,
    frames = [],
    timing = { intervalMin: 0.2, intervalMax: 0.6 },
    randomOrder = false,
    index = 0,
  }: IdleSchedulerOptions) {
    this.timers = timers;
    this.onFrame = onFrame;
    this.random = random;
    this.frames = [...frames];
    this.timing = sanitizeTiming(timing);
    this.randomOrder = randomOrder;
    this.index = Number.isInteger(index) && index >= 0 && index < this.frames.length ? index : 0;
    this.running = false;
    this.paused = false;
    this.timer = null;
  }

  get currentIndex() {
    return this.index;
  }

  get isScheduled() {
    return this.timer != null;
  }

  get frameCount() {
    return this.frames.length;
  }

  currentFrame(): ImageHandle | null {
    if (!this.frames.length) return null;
    return this.frames[this.index % this.frames.length];
  }

  start() {
    this.running = true;
    this.sync();
  }

  stop() {
    this.running = false;
    this.clearTimer();
  }

  /** Freeze while talking. */
  pause() {
    this.paused = true;
    this.clearTimer();
  }

  /** Back to idle: restarts with a freshly drawn delay. */
  resume() {
    this.paused = false;
    this.sync();
  }

  setFrames(frames: readonly ImageHandle[]) {
    if (isEqual(this.frames, frames)) return;
    this.frames = [...frames];
    this.index = 0;
    if (this.shouldEmit()) this.onFrame(this.currentFrame(), this.index);
    this.sync();
  }

  /** Back to the first frame without touching the pending delay. */
  resetIndex() {
    if (this.index === 0) return;
    this.index = 0;
    if (this.shouldEmit()) this.onFrame(this.currentFrame(), this.index);
  }

  setTiming(timing: IdleTiming) {
    this.timing = sanitizeTiming(timing);
  }

  setRandomOrder(randomOrder: boolean) {
    this.randomOrder = randomOrder;
  }

  /** Next delay in ms, uniform in [intervalMin, intervalMax] seconds. */
  drawDelayMs(): number {
    const { intervalMin, intervalMax } = this.timing;
    const seconds = intervalMin + this.random() * (intervalMax - intervalMin);
    return Math.round(seconds * 1000);
  }

  private shouldEmit() {
    return this.running && !this.paused;
  }

  private shouldRun() {
    return this.running && !this.paused && this.frames.length > 1;
  }

  private sync() {
    if (!this.shouldRun()) {
      this.clearTimer();
      return;
    }
    if (this.timer != null) return;
    this.schedule();
  }

  private schedule() {
    this.timer = this.timers.setTimeout(() => this.fire(), this.drawDelayMs());
  }

  private fire() {
    this.timer = null;
    if (!this.shouldRun()) return;
    const count = this.frames.length;
    this.index = this.randomOrder
      ? Math.min(count - 1, Math.floor(this.random() * count))
      : (this.index + 1) % count;
    // Re-armed before emitting: a throwing onFrame leaves the cadence intact.
    this.schedule();
    this.onFrame(this.currentFrame(), this.index);
  }

  private clearTimer() {
    if (this.timer == null) return;
    this.timers.clearTimeout(this.timer);
    this.timer = null;
  }
}
