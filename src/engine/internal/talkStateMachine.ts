import { TALK_TRIGGER_CONFIG } from "../../shared/audio/audioTuning";
import type { TalkTransition } from "../../types/avatar";

type TalkStateOptions = {
  threshold: number;
  now: number;
  talking?: boolean;
  minDwellMs?: number;
};

/**
 * Idle/Talking with two thresholds: talking starts above `threshold` and ends
 * below `threshold * releaseRatio`. No two transitions happen within
 * `minDwellMs` of each other.
 */
export class TalkStateMachine {
  private threshold: number;
  private talking: boolean;
  private lastTransitionAt: number;
  private readonly minDwellMs: number;

  constructor({ threshold, now, talking = false, minDwellMs = TALK_TRIGGER_CONFIG.minDwellMs }: TalkStateOptions) {
    this.threshold = threshold;
    this.talking = talking;
    this.lastTransitionAt = now;
    this.minDwellMs = minDwellMs;
  }

  get isTalking() {
    return this.talking;
  }

  get talkThreshold() {
    return this.threshold;
  }

  get releaseThreshold() {
    return this.threshold * TALK_TRIGGER_CONFIG.releaseRatio;
  }

  get lastTransitionTime() {
    return this.lastTransitionAt;
  }

  setThreshold(threshold: number) {
    this.threshold = threshold;
  }

  evaluate(level: number, now: number): TalkTransition | null {
    if (now - this.lastTransitionAt <= this.minDwellMs) return null;
    if (this.talking) {
      if (level >= this.releaseThreshold) return null;
      this.talking = false;
      this.lastTransitionAt = now;
      return "stopped";
    }
    if (level <= this.threshold) return null;
    this.talking = true;
    this.lastTransitionAt = now;
    return "started";
  }

  reset(now: number) {
    this.talking = false;
    this.lastTransitionAt = now;
  }
}
