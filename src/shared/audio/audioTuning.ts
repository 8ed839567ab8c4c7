export const LOUDNESS_SAMPLER_CONFIG = {
  rmsEpsilon: 1e-6,
  channelCapacity: 8,
} as const;

export const LEVEL_SMOOTHING_CONFIG = {
  retain: 0.7,
  incoming: 0.3,
} as const;

export const TALK_TRIGGER_CONFIG = {
  releaseRatio: 0.7,
  minDwellMs: 50,
} as const;

export const TALK_THRESHOLD_RANGE = {
  min: 0.001,
  max: 0.5,
  decimals: 3,
} as const;

export const IDLE_INTERVAL_RANGE = {
  minSeconds: 0.05,
  maxSeconds: 10,
} as const;

export const ENGINE_TIMING = {
  pollIntervalMs: 60,
} as const;

export const AVATAR_DEFAULTS = {
  talkThreshold: 0.03,
  idleIntervalMin: 0.2,
  idleIntervalMax: 0.6,
  width: 512,
  background: "#00FF00",
} as const;

export const AVATAR_WIDTH_RANGE = {
  min: 64,
  max: 2048,
} as const;
