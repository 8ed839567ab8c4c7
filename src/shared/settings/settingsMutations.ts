import { produce } from "immer";
import { clamp } from "lodash";

import { AVATAR_WIDTH_RANGE, IDLE_INTERVAL_RANGE } from "../audio/audioTuning";
import {
  normalizeIdleFrames,
  normalizeTalkThreshold,
  sortTalkVariants,
} from "../validation/avatarSettingsValidation";
import type { AvatarSettings, ImageHandle } from "../../types/avatar";

// Every edit returns a new frozen snapshot; the engine only ever sees
// snapshots through AvatarEngine.applySettings.

const inRange = (index: number, length: number) =>
  Number.isInteger(index) && index >= 0 && index < length;

export const setTalkThreshold = (settings: AvatarSettings, value: unknown) =>
  produce(settings, (draft) => {
    draft.talkThreshold = normalizeTalkThreshold(value);
  });

export const setTalkImage = (settings: AvatarSettings, image: ImageHandle) =>
  produce(settings, (draft) => {
    draft.talkImage = image.trim();
  });

/** New variant starts from the default talk image at the current talk threshold. */
export const addTalkVariant = (settings: AvatarSettings) =>
  produce(settings, (draft) => {
    if (!draft.talkImage) return;
    draft.talkVariants.push({ threshold: draft.talkThreshold, image: draft.talkImage });
    draft.talkVariants = sortTalkVariants(draft.talkVariants);
  });

export const updateTalkVariantThreshold = (
  settings: AvatarSettings,
  index: number,
  threshold: number
) =>
  produce(settings, (draft) => {
    if (!inRange(index, draft.talkVariants.length)) return;
    if (!Number.isFinite(threshold)) return;
    draft.talkVariants[index].threshold = Math.max(0, threshold);
    draft.talkVariants = sortTalkVariants(draft.talkVariants);
  });

export const setTalkVariantImage = (settings: AvatarSettings, index: number, image: ImageHandle) =>
  produce(settings, (draft) => {
    const trimmed = image.trim();
    if (!trimmed || !inRange(index, draft.talkVariants.length)) return;
    draft.talkVariants[index].image = trimmed;
  });

export const removeTalkVariant = (settings: AvatarSettings, index: number) =>
  produce(settings, (draft) => {
    if (!inRange(index, draft.talkVariants.length)) return;
    draft.talkVariants.splice(index, 1);
  });

export const setIdleFrames = (settings: AvatarSettings, frames: readonly unknown[]) =>
  produce(settings, (draft) => {
    const cleaned = normalizeIdleFrames(frames);
    draft.idleFrames = cleaned;
    if (cleaned.length) draft.idleImage = cleaned[0];
  });

export const addIdleFrames = (settings: AvatarSettings, paths: readonly string[]) => {
  const existing = [...settings.idleFrames];
  for (const path of paths) {
    if (!existing.includes(path)) existing.push(path);
  }
  return setIdleFrames(settings, existing);
};

export const removeIdleFrames = (settings: AvatarSettings, indices: readonly number[]) => {
  const drop = new Set(indices.filter((i) => inRange(i, settings.idleFrames.length)));
  if (!drop.size) return settings;
  return setIdleFrames(
    settings,
    settings.idleFrames.filter((_, i) => !drop.has(i))
  );
};

export const moveIdleFrame = (settings: AvatarSettings, index: number, direction: -1 | 1) => {
  const target = index + direction;
  const length = settings.idleFrames.length;
  if (!inRange(index, length) || !inRange(target, length)) return settings;
  const frames = [...settings.idleFrames];
  [frames[index], frames[target]] = [frames[target], frames[index]];
  return setIdleFrames(settings, frames);
};

export const clearIdleFrames = (settings: AvatarSettings) =>
  produce(settings, (draft) => {
    draft.idleFrames = [];
    draft.idleImage = "";
  });

export const setIdleRandom = (settings: AvatarSettings, random: boolean) =>
  produce(settings, (draft) => {
    draft.idleRandom = random;
  });

/**
 * Raising min above max drags max along; lowering max below min drags min.
 */
export const setIdleInterval = (settings: AvatarSettings, kind: "min" | "max", seconds: number) =>
  produce(settings, (draft) => {
    if (!Number.isFinite(seconds)) return;
    const value = clamp(seconds, IDLE_INTERVAL_RANGE.minSeconds, IDLE_INTERVAL_RANGE.maxSeconds);
    if (kind === "min") {
      draft.idleIntervalMin = value;
      if (value > draft.idleIntervalMax) draft.idleIntervalMax = value;
    } else {
      draft.idleIntervalMax = value;
      if (value < draft.idleIntervalMin) draft.idleIntervalMin = value;
    }
  });

export const setWidth = (settings: AvatarSettings, width: number) =>
  produce(settings, (draft) => {
    if (!Number.isFinite(width)) return;
    draft.width = clamp(Math.round(width), AVATAR_WIDTH_RANGE.min, AVATAR_WIDTH_RANGE.max);
  });

export const setRememberPosition = (settings: AvatarSettings, remember: boolean) =>
  produce(settings, (draft) => {
    draft.rememberPosition = remember;
    if (!remember) draft.avatarPosition = null;
  });

export const setAvatarPosition = (settings: AvatarSettings, x: number, y: number) =>
  produce(settings, (draft) => {
    if (!draft.rememberPosition) return;
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;
    draft.avatarPosition = [Math.trunc(x), Math.trunc(y)];
  });
