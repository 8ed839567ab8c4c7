export { AvatarEngine, type AvatarEngineOptions, type EngineStatus } from "./engine/AvatarEngine";
export { AudioDeviceError, errorMessage } from "./engine/errors";
export { CompositeRenderSink } from "./engine/internal/renderSinks";
export { systemTimers, type EngineTimers, type TimerHandle } from "./engine/internal/timers";
export { computeRms } from "./engine/internal/loudnessSampler";
export { NO_VARIANT, selectVariantIndex } from "./engine/internal/variantSelector";
export {
  createAvatarViewStore,
  displayedImageAtom,
  readRenderSnapshot,
  type AvatarViewStore,
} from "./engine/internal/viewStore";
export * as settingsMutations from "./shared/settings/settingsMutations";
export {
  DEFAULT_AVATAR_SETTINGS,
  normalizeAvatarSettings,
  resolveIdleSequence,
} from "./shared/validation/avatarSettingsValidation";
export { describeLevelMeter, type LevelMeterModel } from "./shared/utils/levelMeter";
export { SocketBridge, type BridgeControlMessage } from "./main/SocketBridge";
export { createPcmStreamSource, decodePcm } from "./main/audio/pcmStreamSource";
export { loadSettingsFile, saveSettingsFile } from "./main/settingsFile";
export { readHostConfig, type HostConfig } from "./main/config";
export type * from "./types/audio";
export type * from "./types/avatar";
export type * from "./types/render";
