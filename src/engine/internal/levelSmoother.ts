import { LEVEL_SMOOTHING_CONFIG } from "../../shared/audio/audioTuning";

export class LevelSmoother {
  private smoothed: number;

  constructor(initial = 0) {
    this.smoothed = Number.isFinite(initial) && initial > 0 ? initial : 0;
  }

  get value() {
    return this.smoothed;
  }

  /** One EWMA step per poll tick. */
  update(raw: number): number {
    const sample = Number.isFinite(raw) && raw > 0 ? raw : 0;
    this.smoothed =
      this.smoothed * LEVEL_SMOOTHING_CONFIG.retain + sample * LEVEL_SMOOTHING_CONFIG.incoming;
    return this.smoothed;
  }

  reset() {
    this.smoothed = 0;
  }
}
