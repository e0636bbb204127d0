export const DEFAULT_BAR_COUNT = 16;
export const FLOOR_LEVEL = 0.08;

export function idleLevels(barCount: number = DEFAULT_BAR_COUNT): number[] {
  return Array.from({ length: Math.max(0, barCount) }, () => FLOOR_LEVEL);
}

/**
 * Averages analyser byte data into `barCount` buckets scaled to [0, 1].
 * Trailing bins that do not fill a whole bucket are dropped.
 */
export function barLevels(
  frequencyData: ArrayLike<number>,
  barCount: number = DEFAULT_BAR_COUNT
): number[] {
  const count = Math.max(0, barCount);
  const bucketSize = Math.floor(frequencyData.length / Math.max(1, count));
  if (bucketSize === 0) {
    return Array.from({ length: count }, () => 0);
  }

  const levels: number[] = [];
  for (let bar = 0; bar < count; bar++) {
    let sum = 0;
    for (let bin = bar * bucketSize; bin < (bar + 1) * bucketSize; bin++) {
      sum += frequencyData[bin] ?? 0;
    }
    levels.push(sum / bucketSize / 255);
  }
  return levels;
}
