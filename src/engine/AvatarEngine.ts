import { isEqual } from "lodash";

import { ENGINE_TIMING } from "../shared/audio/audioTuning";
import logger from "../shared/utils/logger";
import {
  resolveIdleSequence,
  sortTalkVariants,
} from "../shared/validation/avatarSettingsValidation";
import { errorMessage } from "./errors";
import { IdleScheduler } from "./internal/idleScheduler";
import { LevelSmoother } from "./internal/levelSmoother";
import { LoudnessSampler } from "./internal/loudnessSampler";
import { TalkStateMachine } from "./internal/talkStateMachine";
import { systemTimers, type EngineTimers, type TimerHandle } from "./internal/timers";
import { VariantSelector } from "./internal/variantSelector";
import type { AudioSource } from "../types/audio";
import type { AvatarSettings, EngineRuntimeState } from "../types/avatar";
import type { RenderSink } from "../types/render";

export type EngineStatus = "idle" | "running" | "faulted" | "shutdown";

export type RestorableEngineState = Partial<Pick<EngineRuntimeState, "level" | "talking" | "idleIndex">>;

export type AvatarEngineOptions = {
  settings: AvatarSettings;
  audioSource: AudioSource;
  sink: RenderSink;
  timers?: EngineTimers;
  random?: () => number;
  pollIntervalMs?: number;
  /** Carry level, talk state and idle frame over from a previous engine. */
  initialState?: RestorableEngineState;
  /** Last teardown step; typically writes the settings file. */
  persist?: (state: EngineRuntimeState) => void | Promise<void>;
};

export type ApplySettingsOptions = {
  resetRuntimeState?: boolean;
};

const defaultTalkImage = (settings: AvatarSettings) => settings.talkImage || null;

/**
 * AvatarEngine - drives the avatar from microphone loudness.
 *
 * Every poll tick drains the sampler, smooths the level, runs the talk-state
 * machine and, while talking, the variant selector. The idle scheduler runs
 * on its own timeout on the same event loop and is paused while talking.
 */
export class AvatarEngine {
  private settings: AvatarSettings;
  private readonly sink: RenderSink;
  private readonly timers: EngineTimers;
  private readonly pollIntervalMs: number;
  private readonly persist: AvatarEngineOptions["persist"];
  private readonly sampler: LoudnessSampler;
  private readonly smoother: LevelSmoother;
  private readonly talkState: TalkStateMachine;
  private readonly variants: VariantSelector;
  private readonly idle: IdleScheduler;
  private pollTimer: TimerHandle | null;
  private status: EngineStatus;
  private faultNotified: boolean;

  /** Throws AudioDeviceError when the audio input cannot be opened. */
  constructor({
    settings,
    audioSource,
    sink,
    timers = systemTimers,
    random = Math.random,
    pollIntervalMs = ENGINE_TIMING.pollIntervalMs,
    initialState = {},
    persist,
  }: AvatarEngineOptions) {
    this.settings = settings;
    this.sink = sink;
    this.timers = timers;
    this.pollIntervalMs = pollIntervalMs;
    this.persist = persist;
    this.pollTimer = null;
    this.status = "idle";
    this.faultNotified = false;

    this.sampler = new LoudnessSampler(audioSource);
    this.smoother = new LevelSmoother(initialState.level ?? 0);
    this.talkState = new TalkStateMachine({
      threshold: settings.talkThreshold,
      now: timers.now(),
      talking: initialState.talking ?? false,
    });
    this.variants = new VariantSelector(settings.talkVariants, defaultTalkImage(settings));
    this.idle = new IdleScheduler({
      timers,
      random,
      frames: resolveIdleSequence(settings),
      timing: { intervalMin: settings.idleIntervalMin, intervalMax: settings.idleIntervalMax },
      randomOrder: settings.idleRandom,
      index: initialState.idleIndex ?? 0,
      onFrame: (image) => this.emitIdleFrame(image),
    });
    if (this.talkState.isTalking) this.idle.pause();
  }

  get engineStatus() {
    return this.status;
  }

  get currentSettings() {
    return this.settings;
  }

  get isPolling() {
    return this.pollTimer != null;
  }

  getRuntimeState(): EngineRuntimeState {
    return {
      level: this.smoother.value,
      talking: this.talkState.isTalking,
      idleIndex: this.idle.currentIndex,
      variantIndex: this.variants.selectedIndex,
    };
  }

  start() {
    if (this.status === "running" || this.status === "shutdown") return;
    this.status = "running";
    this.faultNotified = false;

    if (this.talkState.isTalking) {
      this.sink.onTalkStateChanged(true);
      this.sink.onVariantChanged(this.variants.resolve(this.smoother.value).image);
    } else {
      this.sink.onIdleFrameChanged(this.idle.currentFrame());
    }

    this.idle.start();
    this.pollTimer = this.timers.setInterval(() => this.tick(), this.pollIntervalMs);
    logger.log(`[AvatarEngine] polling every ${this.pollIntervalMs}ms`);
  }

  tick() {
    if (this.status !== "running") return;
    try {
      const raw = this.sampler.read();
      const level = this.smoother.update(raw);
      this.sink.onLevelUpdate(level);

      const transition = this.talkState.evaluate(level, this.timers.now());
      if (transition === "started") {
        this.sink.onTalkStateChanged(true);
        this.idle.pause();
        this.sink.onVariantChanged(this.variants.resolve(level).image);
        return;
      }
      if (transition === "stopped") {
        this.sink.onTalkStateChanged(false);
        this.variants.invalidate();
        this.idle.resume();
        this.sink.onIdleFrameChanged(this.idle.currentFrame());
        return;
      }
      if (this.talkState.isTalking) {
        const resolved = this.variants.resolve(level);
        if (resolved.changed) this.sink.onVariantChanged(resolved.image);
      }
    } catch (error) {
      this.handleFault(error);
    }
  }

  /**
   * Consumes a new settings snapshot. Level, talk state and idle frame carry
   * over unless `resetRuntimeState` is set.
   */
  applySettings(next: AvatarSettings, { resetRuntimeState = false }: ApplySettingsOptions = {}) {
    this.settings = next;
    this.talkState.setThreshold(next.talkThreshold);

    const nextDefault = defaultTalkImage(next);
    const variantsChanged =
      !isEqual(this.variants.sortedVariants, sortTalkVariants(next.talkVariants)) ||
      this.variants.fallbackImage !== nextDefault;
    if (variantsChanged) {
      this.variants.configure(next.talkVariants, nextDefault);
      if (this.talkState.isTalking && this.status === "running") {
        this.sink.onVariantChanged(this.variants.resolve(this.smoother.value).image);
      }
    }

    this.idle.setTiming({ intervalMin: next.idleIntervalMin, intervalMax: next.idleIntervalMax });
    this.idle.setRandomOrder(next.idleRandom);
    this.idle.setFrames(resolveIdleSequence(next));

    if (resetRuntimeState) this.resetRuntimeState();
  }

  private resetRuntimeState() {
    this.smoother.reset();
    const wasTalking = this.talkState.isTalking;
    this.talkState.reset(this.timers.now());
    this.variants.invalidate();
    this.idle.resetIndex();
    if (!wasTalking) return;
    this.idle.resume();
    if (this.status !== "running") return;
    this.sink.onTalkStateChanged(false);
    this.sink.onIdleFrameChanged(this.idle.currentFrame());
  }

  private emitIdleFrame(image: string | null) {
    try {
      this.sink.onIdleFrameChanged(image);
    } catch (error) {
      this.handleFault(error);
    }
  }

  private handleFault(error: unknown) {
    this.stopPolling();
    this.idle.stop();
    this.status = "faulted";
    if (this.faultNotified) return;
    this.faultNotified = true;
    logger.error("[AvatarEngine] Render update failed, engine stopped:", error);
    try {
      this.sink.onFault(errorMessage(error));
    } catch (sinkError) {
      logger.error("[AvatarEngine] Failed to report fault:", sinkError);
    }
  }

  private stopPolling() {
    if (this.pollTimer == null) return;
    this.timers.clearInterval(this.pollTimer);
    this.pollTimer = null;
  }

  /**
   * Stop polling, stop the idle timer, release the audio stream, persist.
   * Each step runs even when an earlier one failed.
   */
  async shutdown() {
    if (this.status === "shutdown") return;
    this.status = "shutdown";

    const steps: Array<[string, () => void]> = [
      ["stop polling", () => this.stopPolling()],
      ["stop idle timer", () => this.idle.stop()],
      ["stop audio stream", () => this.sampler.stop()],
      ["close audio stream", () => this.sampler.close()],
    ];
    for (const [label, step] of steps) {
      try {
        step();
      } catch (error) {
        logger.error(`[AvatarEngine] Failed to ${label} on shutdown:`, error);
      }
    }

    if (!this.persist) return;
    try {
      await this.persist(this.getRuntimeState());
    } catch (error) {
      logger.error("[AvatarEngine] Failed to persist on shutdown:", error);
    }
  }
}

export default AvatarEngine;
