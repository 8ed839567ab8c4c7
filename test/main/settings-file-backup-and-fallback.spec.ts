import * as fs from "node:fs";
import * as path from "node:path";

import { test, expect } from "@playwright/test";

import { loadSettingsFile, saveSettingsFile } from "../../src/main/settingsFile";
import { setWidth } from "../../src/shared/settings/settingsMutations";
import {
  DEFAULT_AVATAR_SETTINGS,
  normalizeAvatarSettings,
} from "../../src/shared/validation/avatarSettingsValidation";
import { createTempDir } from "../fixtures/tempDir";

test("settings file: a missing file loads as defaults", async () => {
  const { dir, cleanup } = await createTempDir();
  try {
    expect(await loadSettingsFile(path.join(dir, "avatar.json"))).toEqual(DEFAULT_AVATAR_SETTINGS);
  } finally {
    await cleanup();
  }
});

test("settings file: saved settings load back unchanged", async () => {
  const { dir, cleanup } = await createTempDir();
  try {
    const file = path.join(dir, "nested", "avatar.json");
    const settings = normalizeAvatarSettings({
      idleFrames: ["a.png", "b.png"],
      talkImage: "talk.png",
      talkVariants: [{ threshold: 0.08, image: "loud.png" }],
      rememberPosition: true,
      avatarPosition: [120, 40],
    });
    await saveSettingsFile(file, settings);
    expect(await loadSettingsFile(file)).toEqual(settings);
    const text = await fs.promises.readFile(file, "utf-8");
    expect(text.startsWith('{\n  "idleImage": "a.png",')).toBe(true);
  } finally {
    await cleanup();
  }
});

test("settings file: the previous file is kept as a backup", async () => {
  const { dir, cleanup } = await createTempDir();
  try {
    const file = path.join(dir, "avatar.json");
    const first = normalizeAvatarSettings({ width: 300 });
    await saveSettingsFile(file, first);
    await saveSettingsFile(file, setWidth(first, 400));
    const backup = JSON.parse(await fs.promises.readFile(`${file}.backup`, "utf-8"));
    expect(backup.width).toBe(300);
    expect((await loadSettingsFile(file)).width).toBe(400);
  } finally {
    await cleanup();
  }
});

test("settings file: a corrupt file falls back to the backup", async () => {
  const { dir, cleanup } = await createTempDir();
  try {
    const file = path.join(dir, "avatar.json");
    await fs.promises.writeFile(file, "{ not json", "utf-8");
    await fs.promises.writeFile(`${file}.backup`, JSON.stringify({ width: 256 }), "utf-8");
    expect((await loadSettingsFile(file)).width).toBe(256);
  } finally {
    await cleanup();
  }
});

test("settings file: corrupt file and backup fall back to defaults", async () => {
  const { dir, cleanup } = await createTempDir();
  try {
    const file = path.join(dir, "avatar.json");
    await fs.promises.writeFile(file, "{ not json", "utf-8");
    await fs.promises.writeFile(`${file}.backup`, "also broken", "utf-8");
    expect(await loadSettingsFile(file)).toEqual(DEFAULT_AVATAR_SETTINGS);
  } finally {
    await cleanup();
  }
});
