import { sortTalkVariants } from "../../shared/validation/avatarSettingsValidation";
import type { ImageHandle, TalkVariant } from "../../types/avatar";

export const NO_VARIANT = -1;

/**
 * Index of the last variant whose threshold does not exceed `level`, or
 * NO_VARIANT. `variants` must already be sorted ascending; with tied
 * thresholds the later entry wins.
 */
export function selectVariantIndex(level: number, variants: readonly TalkVariant[]): number {
  let best = NO_VARIANT;
  for (let i = 0; i < variants.length; i++) {
    if (level >= variants[i].threshold) best = i;
  }
  return best;
}

export type VariantResolution = {
  index: number;
  image: ImageHandle | null;
  changed: boolean;
};

export class VariantSelector {
  private variants: TalkVariant[];
  private defaultImage: ImageHandle | null;
  private lastIndex: number | null;

  constructor(variants: readonly TalkVariant[] = [], defaultImage: ImageHandle | null = null) {
    this.variants = sortTalkVariants(variants);
    this.defaultImage = defaultImage;
    this.lastIndex = null;
  }

  /** Cached index from the last resolve, or NO_VARIANT when none ran yet. */
  get selectedIndex() {
    return this.lastIndex ?? NO_VARIANT;
  }

  get sortedVariants(): readonly TalkVariant[] {
    return this.variants;
  }

  get fallbackImage() {
    return this.defaultImage;
  }

  configure(variants: readonly TalkVariant[], defaultImage: ImageHandle | null) {
    this.variants = sortTalkVariants(variants);
    this.defaultImage = defaultImage;
    this.lastIndex = null;
  }

  imageAt(index: number): ImageHandle | null {
    if (index === NO_VARIANT) return this.defaultImage;
    return this.variants[index]?.image ?? this.defaultImage;
  }

  resolve(level: number): VariantResolution {
    const index = selectVariantIndex(level, this.variants);
    const changed = index !== this.lastIndex;
    this.lastIndex = index;
    return { index, image: this.imageAt(index), changed };
  }

  /** Forget the cached index so the next resolve reports a change. */
  invalidate() {
    this.lastIndex = null;
  }
}
