#!/usr/bin/env node
import { AvatarEngine } from "../engine/AvatarEngine";
import { AudioDeviceError } from "../engine/errors";
import { CompositeRenderSink } from "../engine/internal/renderSinks";
import { systemTimers } from "../engine/internal/timers";
import { createAvatarViewStore, displayedImageAtom } from "../engine/internal/viewStore";
import { setAvatarPosition } from "../shared/settings/settingsMutations";
import logger from "../shared/utils/logger";
import { normalizeAvatarSettings } from "../shared/validation/avatarSettingsValidation";
import type { AudioSource } from "../types/audio";
import { createPcmStreamSource } from "./audio/pcmStreamSource";
import { readHostConfig, type AudioInputMode, type HostConfig } from "./config";
import { registerShutdownHandlers } from "./lifecycle";
import { loadSettingsFile, saveSettingsFile } from "./settingsFile";
import { SocketBridge, type BridgeControlMessage } from "./SocketBridge";
import { MockAudioSource } from "./testing/mockAudioSource";

const createAudioSource = (mode: AudioInputMode, bridge: SocketBridge): AudioSource => {
  switch (mode) {
    case "stdin-f32le":
      return createPcmStreamSource(process.stdin, "f32le");
    case "stdin-s16le":
      return createPcmStreamSource(process.stdin, "s16le");
    case "mock": {
      const mock = new MockAudioSource();
      mock.startSynthetic(systemTimers);
      return mock;
    }
    case "socket":
      return bridge;
  }
};

export async function start(config: HostConfig = readHostConfig()) {
  const settings = await loadSettingsFile(config.settingsPath);
  let engine: AvatarEngine | null = null;

  const handleControl = (message: BridgeControlMessage) => {
    if (!engine) return;
    if (message.type === "position") {
      engine.applySettings(setAvatarPosition(engine.currentSettings, message.x, message.y));
      return;
    }
    engine.applySettings(normalizeAvatarSettings(message.settings));
  };

  const bridge = new SocketBridge({ onControlMessage: handleControl });
  const view = createAvatarViewStore();
  const sink = new CompositeRenderSink([bridge, view.sink]);
  if (logger.debugEnabled) {
    view.store.sub(displayedImageAtom, () => {
      logger.log("[Main] displayed image:", view.store.get(displayedImageAtom));
    });
  }

  const audioSource = createAudioSource(config.audioInput, bridge);
  try {
    engine = new AvatarEngine({
      settings,
      audioSource,
      sink,
      persist: async () => {
        if (!engine) return;
        const current = engine.currentSettings;
        if (!current.rememberPosition) return;
        await saveSettingsFile(config.settingsPath, current);
      },
    });
  } catch (error) {
    if (!(error instanceof AudioDeviceError)) throw error;
    logger.error("[Main] Reactive avatar disabled:", error.message);
    if (audioSource instanceof MockAudioSource) audioSource.stopSynthetic();
    process.exitCode = 1;
    return null;
  }

  const running = engine;
  let port: number;
  try {
    port = await bridge.listen(config.port, config.host);
  } catch (error) {
    await running.shutdown();
    throw error;
  }
  running.start();
  logger.log(`[Main] avatar engine running, render socket on port ${port}`);

  registerShutdownHandlers(async () => {
    await running.shutdown();
    await bridge.close();
  });
  return { engine: running, bridge, store: view.store };
}

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.error("[Main] Failed to start:", error);
    process.exitCode = 1;
  });
}
