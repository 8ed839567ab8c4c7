import * as fs from "node:fs";
import * as path from "node:path";

import logger from "../shared/utils/logger";
import { errorMessage } from "../engine/errors";
import {
  DEFAULT_AVATAR_SETTINGS,
  normalizeAvatarSettings,
} from "../shared/validation/avatarSettingsValidation";
import type { AvatarSettings } from "../types/avatar";

const errorCode = (error: unknown): unknown =>
  error && typeof error === "object" && "code" in error ? error.code : null;

const writeFileAtomic = async (filePath: string, text: string): Promise<void> => {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const rand = Math.random().toString(16).slice(2);
  const tmp = path.join(dir, `.${base}.tmp-${process.pid}-${Date.now()}-${rand}`);
  await fs.promises.writeFile(tmp, text, "utf-8");
  await fs.promises.rename(tmp, filePath);
};

const readJson = async (filePath: string): Promise<unknown> => {
  const data = await fs.promises.readFile(filePath, "utf-8");
  return JSON.parse(data);
};

/**
 * Reads and normalizes the settings document. A corrupt file falls back to
 * `<file>.backup`, then to defaults; a missing file is just defaults.
 */
export async function loadSettingsFile(filePath: string): Promise<AvatarSettings> {
  try {
    return normalizeAvatarSettings(await readJson(filePath));
  } catch (readErr) {
    if (errorCode(readErr) === "ENOENT") {
      logger.warn("[Settings] Settings file not found, using defaults");
      return { ...DEFAULT_AVATAR_SETTINGS };
    }
    logger.error("[Settings] Failed to read settings file:", errorMessage(readErr));
  }

  try {
    const restored = normalizeAvatarSettings(await readJson(`${filePath}.backup`));
    logger.error("[Settings] Restored settings from backup");
    return restored;
  } catch (backupErr) {
    logger.warn("[Settings] No usable backup:", errorMessage(backupErr));
  }
  logger.error("[Settings] Using default settings");
  return { ...DEFAULT_AVATAR_SETTINGS };
}

/** Keeps the previous file as `<file>.backup`, then writes atomically. */
export async function saveSettingsFile(filePath: string, settings: AvatarSettings): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.promises.copyFile(filePath, `${filePath}.backup`);
  } catch (copyErr) {
    if (errorCode(copyErr) !== "ENOENT") {
      logger.warn("[Settings] Failed to write backup:", errorMessage(copyErr));
    }
  }
  await writeFileAtomic(filePath, `${JSON.stringify(settings, null, 2)}\n`);
}
