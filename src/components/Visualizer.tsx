"use client";

import { useEffect, useState } from "react";
import { barLevels, DEFAULT_BAR_COUNT, FLOOR_LEVEL, idleLevels } from "@/lib/visualizer";

export type FrequencySource = Pick<AnalyserNode, "frequencyBinCount" | "getByteFrequencyData">;

type VisualizerProps = {
  isPlaying: boolean;
  /** Owned by the player; null falls back to the CSS animation. */
  analyser: FrequencySource | null;
  barCount?: number;
};

export function Visualizer({ isPlaying, analyser, barCount = DEFAULT_BAR_COUNT }: VisualizerProps) {
  const [levels, setLevels] = useState<number[]>(() => idleLevels(barCount));

  useEffect(() => {
    if (!isPlaying || !analyser) {
      setLevels(idleLevels(barCount));
      return;
    }

    const data = new Uint8Array(analyser.frequencyBinCount);
    let frame = 0;
    const tick = () => {
      analyser.getByteFrequencyData(data);
      setLevels(barLevels(data, barCount).map((level) => Math.max(FLOOR_LEVEL, level)));
      frame = window.requestAnimationFrame(tick);
    };
    frame = window.requestAnimationFrame(tick);

    return () => window.cancelAnimationFrame(frame);
  }, [analyser, barCount, isPlaying]);

  const animated = isPlaying && !analyser;

  return (
    <div
      className={`visualizer ${animated ? "is-animated" : ""}`}
      data-active={isPlaying ? "true" : "false"}
      aria-hidden="true"
    >
      {levels.map((level, index) => (
        <span
          key={index}
          className="visualizer-bar"
          style={{
            transform: animated ? undefined : `scaleY(${level.toFixed(3)})`,
            animationDelay: animated ? `${(index % 8) * 90}ms` : undefined,
          }}
        />
      ))}
    </div>
  );
}
