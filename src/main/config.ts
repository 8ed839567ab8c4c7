import * as path from "node:path";

import type { PcmFormat } from "../types/audio";

export type AudioInputMode = "socket" | "mock" | `stdin-${PcmFormat}`;

export type HostConfig = {
  settingsPath: string;
  port: number;
  host: string;
  audioInput: AudioInputMode;
};

const AUDIO_MODES: readonly AudioInputMode[] = ["socket", "mock", "stdin-f32le", "stdin-s16le"];

const isAudioMode = (value: string): value is AudioInputMode =>
  AUDIO_MODES.some((mode) => mode === value);

const readFlag = (raw: string | undefined) => raw === "1" || raw === "true";

const readPort = (raw: string | undefined, fallback: number) => {
  if (!raw || !raw.trim()) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 && n <= 65535 ? n : fallback;
};

export const DEFAULT_HOST_CONFIG: HostConfig = {
  settingsPath: "reactive-avatar.json",
  port: 8090,
  host: "127.0.0.1",
  audioInput: "socket",
};

export function readHostConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): HostConfig {
  const settingsRaw = (env.REACTIVE_AVATAR_SETTINGS || "").trim();
  const audioRaw = (env.REACTIVE_AVATAR_AUDIO || "").trim();
  const hostRaw = (env.REACTIVE_AVATAR_HOST || "").trim();

  let audioInput: AudioInputMode = isAudioMode(audioRaw) ? audioRaw : DEFAULT_HOST_CONFIG.audioInput;
  if (readFlag(env.REACTIVE_AVATAR_TEST_AUDIO_MOCK)) audioInput = "mock";

  return {
    settingsPath: path.resolve(cwd, settingsRaw || DEFAULT_HOST_CONFIG.settingsPath),
    port: readPort(env.REACTIVE_AVATAR_PORT, DEFAULT_HOST_CONFIG.port),
    host: hostRaw || DEFAULT_HOST_CONFIG.host,
    audioInput,
  };
}
