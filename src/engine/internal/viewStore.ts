import { atom, createStore } from "jotai/vanilla";

import type { ImageHandle } from "../../types/avatar";
import type { RenderSink, RenderSnapshot } from "../../types/render";

export const levelAtom = atom(0);
export const talkingAtom = atom(false);
export const variantImageAtom = atom<ImageHandle | null>(null);
export const idleImageAtom = atom<ImageHandle | null>(null);
export const faultAtom = atom<string | null>(null);

/** What the avatar window should show right now; `null` is the placeholder. */
export const displayedImageAtom = atom((get) =>
  get(talkingAtom) ? get(variantImageAtom) : get(idleImageAtom)
);

export type AvatarViewStore = ReturnType<typeof createStore>;

export function readRenderSnapshot(store: AvatarViewStore): RenderSnapshot {
  return {
    level: store.get(levelAtom),
    talking: store.get(talkingAtom),
    variantImage: store.get(variantImageAtom),
    idleImage: store.get(idleImageAtom),
    fault: store.get(faultAtom),
  };
}

/**
 * A render sink backed by jotai atoms, for presentation code that prefers to
 * subscribe (`store.sub(displayedImageAtom, ...)`) over implementing RenderSink.
 */
export function createAvatarViewStore(store: AvatarViewStore = createStore()) {
  const sink: RenderSink = {
    onLevelUpdate: (level) => store.set(levelAtom, level),
    onTalkStateChanged: (talking) => store.set(talkingAtom, talking),
    onVariantChanged: (image) => store.set(variantImageAtom, image),
    onIdleFrameChanged: (image) => store.set(idleImageAtom, image),
    onFault: (message) => store.set(faultAtom, message),
  };
  return { store, sink };
}
