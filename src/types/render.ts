import type { ImageHandle } from "./avatar";

export interface RenderSink {
  onLevelUpdate(level: number): void;
  onTalkStateChanged(talking: boolean): void;
  /** `null` means neither a variant nor a default talk image is configured. */
  onVariantChanged(image: ImageHandle | null): void;
  /** `null` is the "no image" placeholder. */
  onIdleFrameChanged(image: ImageHandle | null): void;
  onFault(message: string): void;
}

export type RenderEventPayload =
  | { type: "level"; data: { level: number } }
  | { type: "talk-state"; data: { talking: boolean } }
  | { type: "variant"; data: { image: ImageHandle | null } }
  | { type: "idle-frame"; data: { image: ImageHandle | null } }
  | { type: "fault"; data: { message: string } };

export interface RenderSnapshot {
  level: number;
  talking: boolean;
  variantImage: ImageHandle | null;
  idleImage: ImageHandle | null;
  fault: string | null;
}
