export type ImageHandle = string;

export type TalkVariant = {
  threshold: number;
  image: ImageHandle;
};

export type IdleTiming = {
  intervalMin: number;
  intervalMax: number;
};

export type AvatarPosition = readonly [number, number];

export interface AvatarSettings {
  idleImage: ImageHandle | "";
  idleFrames: readonly ImageHandle[];
  talkImage: ImageHandle | "";
  talkVariants: readonly TalkVariant[];
  talkThreshold: number;
  idleRandom: boolean;
  idleIntervalMin: number;
  idleIntervalMax: number;
  width: number;
  background: string;
  transparentBackground: boolean;
  keepOnTop: boolean;
  dragEnabled: boolean;
  rememberPosition: boolean;
  avatarPosition: AvatarPosition | null;
}

export type TalkTransition = "started" | "stopped";

export interface EngineRuntimeState {
  level: number;
  talking: boolean;
  idleIndex: number;
  variantIndex: number;
}
