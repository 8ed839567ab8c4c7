import { test, expect } from "@playwright/test";

import {
  DEFAULT_AVATAR_SETTINGS,
  normalizeAvatarSettings,
  normalizeIdleTiming,
  normalizeTalkThreshold,
  normalizeTalkVariants,
  resolveIdleSequence,
} from "../../src/shared/validation/avatarSettingsValidation";

test("settings: anything that is not an object yields the defaults", () => {
  expect(normalizeAvatarSettings(null)).toEqual(DEFAULT_AVATAR_SETTINGS);
  expect(normalizeAvatarSettings([1, 2])).toEqual(DEFAULT_AVATAR_SETTINGS);
  expect(normalizeAvatarSettings("{}")).toEqual(DEFAULT_AVATAR_SETTINGS);
});

test("settings: talk threshold is rounded to 3 decimals and clamped", () => {
  expect(normalizeTalkThreshold(0.0456)).toBe(0.046);
  expect(normalizeTalkThreshold("0.02")).toBe(0.02);
  expect(normalizeTalkThreshold(5)).toBe(0.5);
  expect(normalizeTalkThreshold(0)).toBe(0.001);
  expect(normalizeTalkThreshold("loud")).toBe(0.03);
});

test("settings: idle interval max never falls below min", () => {
  expect(normalizeIdleTiming(0.4, 0.1)).toEqual({ intervalMin: 0.4, intervalMax: 0.4 });
  expect(normalizeIdleTiming(12, 0.01)).toEqual({ intervalMin: 10, intervalMax: 10 });
  expect(normalizeIdleTiming(undefined, "x")).toEqual({ intervalMin: 0.2, intervalMax: 0.6 });
});

test("settings: malformed variants are dropped, the rest sorted", () => {
  const variants = normalizeTalkVariants([
    { threshold: 0.05, image: "b.png" },
    { image: " a.png " },
    { threshold: "x", image: "c.png" },
    { threshold: 0.02, image: "" },
    { threshold: -1, image: "neg.png" },
    3,
  ]);
  expect(variants).toEqual([
    { threshold: 0, image: "a.png" },
    { threshold: 0, image: "neg.png" },
    { threshold: 0.05, image: "b.png" },
  ]);
});

test("settings: idle frames win over the single idle image", () => {
  const settings = normalizeAvatarSettings({
    idleImage: "still.png",
    idleFrames: ["f1.png", "  ", 7, "f2.png"],
  });
  expect(settings.idleFrames).toEqual(["f1.png", "f2.png"]);
  expect(settings.idleImage).toBe("f1.png");
  expect(resolveIdleSequence(settings)).toEqual(["f1.png", "f2.png"]);
});

test("settings: idle sequence falls back to the idle image, then to nothing", () => {
  expect(resolveIdleSequence(normalizeAvatarSettings({ idleImage: "still.png" }))).toEqual([
    "still.png",
  ]);
  expect(resolveIdleSequence(normalizeAvatarSettings({}))).toEqual([]);
});

test("settings: background must be a #RRGGBB color", () => {
  expect(normalizeAvatarSettings({ background: "#a1b2c3" }).background).toBe("#a1b2c3");
  expect(normalizeAvatarSettings({ background: "#12345" }).background).toBe("#00FF00");
  expect(normalizeAvatarSettings({ background: "green" }).background).toBe("#00FF00");
});

test("settings: width is rounded and clamped", () => {
  expect(normalizeAvatarSettings({ width: 10 }).width).toBe(64);
  expect(normalizeAvatarSettings({ width: 4000 }).width).toBe(2048);
  expect(normalizeAvatarSettings({ width: 700.6 }).width).toBe(701);
});

test("settings: position is kept only when remembering it", () => {
  expect(
    normalizeAvatarSettings({ rememberPosition: true, avatarPosition: [10.7, -3.2] }).avatarPosition
  ).toEqual([10, -3]);
  expect(
    normalizeAvatarSettings({ rememberPosition: false, avatarPosition: [10, 20] }).avatarPosition
  ).toBeNull();
  expect(
    normalizeAvatarSettings({ rememberPosition: true, avatarPosition: [10] }).avatarPosition
  ).toBeNull();
});

test("settings: booleans only accept real booleans", () => {
  const settings = normalizeAvatarSettings({ keepOnTop: "yes", dragEnabled: false, idleRandom: true });
  expect(settings.keepOnTop).toBe(false);
  expect(settings.dragEnabled).toBe(false);
  expect(settings.idleRandom).toBe(true);
});
