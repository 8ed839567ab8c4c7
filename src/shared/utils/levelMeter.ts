import { clamp, sortBy } from "lodash";

export type LevelMeterModel = {
  scale: number;
  levelRatio: number;
  thresholdRatio: number;
  markerRatios: number[];
  summary: string;
};

const formatLevel = (n: number) => n.toFixed(3);

/**
 * Horizontal meter layout for a settings panel: the bar spans 1.5x the larger
 * of the current level and the talk threshold, with variant thresholds as markers.
 */
export function describeLevelMeter(
  level: number,
  talkThreshold: number,
  variantThresholds: readonly number[] = []
): LevelMeterModel {
  const safeLevel = Number.isFinite(level) ? Math.max(0, level) : 0;
  const safeThreshold = Number.isFinite(talkThreshold) ? Math.max(0, talkThreshold) : 0;
  const markers = sortBy(
    variantThresholds.filter((v) => Number.isFinite(v)).map((v) => Math.max(0, v))
  );
  const scale = Math.max(0.001, Math.max(safeLevel, safeThreshold) * 1.5);
  const toRatio = (value: number) => clamp(value / scale, 0, 1);

  let summary = `level ${formatLevel(safeLevel)} | talk ${formatLevel(safeThreshold)}`;
  if (markers.length) {
    summary += ` | variants ${markers.map(formatLevel).join(", ")}`;
  }

  return {
    scale,
    levelRatio: toRatio(safeLevel),
    thresholdRatio: toRatio(safeThreshold),
    markerRatios: markers.map(toRatio),
    summary,
  };
}
