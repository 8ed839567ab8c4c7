import { clamp, sortBy } from "lodash";

import {
  AVATAR_DEFAULTS,
  AVATAR_WIDTH_RANGE,
  IDLE_INTERVAL_RANGE,
  TALK_THRESHOLD_RANGE,
} from "../audio/audioTuning";
import type { AvatarPosition, AvatarSettings, IdleTiming, TalkVariant } from "../../types/avatar";

type Jsonish = string | number | boolean | null | undefined | object;

function isPlainObject(value: unknown): value is Record<string, Jsonish> {
  return (
    Boolean(value) &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

function asTrimmedString(value: unknown): string {
  if (typeof value !== "string") return "";
  return value.trim();
}

function asFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim()) {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

const asBoolean = (value: unknown, fallback: boolean) =>
  typeof value === "boolean" ? value : fallback;

export const DEFAULT_AVATAR_SETTINGS: AvatarSettings = {
  idleImage: "",
  idleFrames: [],
  talkImage: "",
  talkVariants: [],
  talkThreshold: AVATAR_DEFAULTS.talkThreshold,
  idleRandom: false,
  idleIntervalMin: AVATAR_DEFAULTS.idleIntervalMin,
  idleIntervalMax: AVATAR_DEFAULTS.idleIntervalMax,
  width: AVATAR_DEFAULTS.width,
  background: AVATAR_DEFAULTS.background,
  transparentBackground: false,
  keepOnTop: false,
  dragEnabled: true,
  rememberPosition: false,
  avatarPosition: null,
};

export function normalizeTalkThreshold(value: unknown): number {
  const n = asFiniteNumber(value);
  if (n == null) return AVATAR_DEFAULTS.talkThreshold;
  const scale = 10 ** TALK_THRESHOLD_RANGE.decimals;
  const rounded = Math.round(n * scale) / scale;
  return clamp(rounded, TALK_THRESHOLD_RANGE.min, TALK_THRESHOLD_RANGE.max);
}

const normalizeIntervalSeconds = (value: unknown, fallback: number) => {
  const n = asFiniteNumber(value);
  if (n == null) return fallback;
  return clamp(n, IDLE_INTERVAL_RANGE.minSeconds, IDLE_INTERVAL_RANGE.maxSeconds);
};

export function normalizeIdleTiming(min: unknown, max: unknown): IdleTiming {
  const intervalMin = normalizeIntervalSeconds(min, AVATAR_DEFAULTS.idleIntervalMin);
  const intervalMax = normalizeIntervalSeconds(max, AVATAR_DEFAULTS.idleIntervalMax);
  return { intervalMin, intervalMax: Math.max(intervalMin, intervalMax) };
}

/**
 * Stable ascending sort: variants sharing a threshold keep their relative order.
 */
export function sortTalkVariants(variants: readonly TalkVariant[]): TalkVariant[] {
  return sortBy(variants, (v) => v.threshold);
}

export function normalizeTalkVariants(value: unknown): TalkVariant[] {
  const list = Array.isArray(value) ? value : [];
  const out: TalkVariant[] = [];
  for (const entry of list) {
    if (!isPlainObject(entry)) continue;
    const image = asTrimmedString(entry.image);
    if (!image) continue;
    const rawThreshold = entry.threshold === undefined ? 0 : entry.threshold;
    const threshold = asFiniteNumber(rawThreshold);
    if (threshold == null) continue;
    out.push({ threshold: Math.max(0, threshold), image });
  }
  return sortTalkVariants(out);
}

export function normalizeIdleFrames(value: unknown): string[] {
  const list = Array.isArray(value) ? value : [];
  const out: string[] = [];
  for (const entry of list) {
    const path = asTrimmedString(entry);
    if (path) out.push(path);
  }
  return out;
}

function normalizeAvatarPosition(value: unknown): AvatarPosition | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const x = asFiniteNumber(value[0]);
  const y = asFiniteNumber(value[1]);
  if (x == null || y == null) return null;
  return [Math.trunc(x), Math.trunc(y)];
}

function normalizeWidth(value: unknown): number {
  const n = asFiniteNumber(value);
  if (n == null) return AVATAR_DEFAULTS.width;
  return clamp(Math.round(n), AVATAR_WIDTH_RANGE.min, AVATAR_WIDTH_RANGE.max);
}

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

/**
 * Coerces whatever was read from disk into a usable settings document.
 * Never throws: malformed fields fall back to defaults, malformed list
 * entries are dropped.
 */
export function normalizeAvatarSettings(value: unknown): AvatarSettings {
  if (!isPlainObject(value)) return { ...DEFAULT_AVATAR_SETTINGS };

  const idleFrames = normalizeIdleFrames(value.idleFrames);
  const idleImage = idleFrames.length ? idleFrames[0] : asTrimmedString(value.idleImage);
  const { intervalMin, intervalMax } = normalizeIdleTiming(
    value.idleIntervalMin,
    value.idleIntervalMax
  );
  const background = asTrimmedString(value.background);
  const rememberPosition = asBoolean(value.rememberPosition, DEFAULT_AVATAR_SETTINGS.rememberPosition);

  return {
    idleImage,
    idleFrames,
    talkImage: asTrimmedString(value.talkImage),
    talkVariants: normalizeTalkVariants(value.talkVariants),
    talkThreshold: normalizeTalkThreshold(value.talkThreshold),
    idleRandom: asBoolean(value.idleRandom, DEFAULT_AVATAR_SETTINGS.idleRandom),
    idleIntervalMin: intervalMin,
    idleIntervalMax: intervalMax,
    width: normalizeWidth(value.width),
    background: HEX_COLOR.test(background) ? background : DEFAULT_AVATAR_SETTINGS.background,
    transparentBackground: asBoolean(
      value.transparentBackground,
      DEFAULT_AVATAR_SETTINGS.transparentBackground
    ),
    keepOnTop: asBoolean(value.keepOnTop, DEFAULT_AVATAR_SETTINGS.keepOnTop),
    dragEnabled: asBoolean(value.dragEnabled, DEFAULT_AVATAR_SETTINGS.dragEnabled),
    rememberPosition,
    avatarPosition: rememberPosition ? normalizeAvatarPosition(value.avatarPosition) : null,
  };
}

/**
 * Idle sequence the engine animates: the frame list, or the single idle
 * image when no frames are configured.
 */
export function resolveIdleSequence(settings: AvatarSettings): string[] {
  if (settings.idleFrames.length) return [...settings.idleFrames];
  return settings.idleImage ? [settings.idleImage] : [];
}
