"use client";

import { useEffect, useMemo, useReducer, useRef, useState } from "react";
import {
  ChevronDown,
  ChevronUp,
  Music2,
  Pause,
  Play,
  SkipBack,
  SkipForward,
  Volume2,
} from "lucide-react";
import { z } from "zod";
import { Visualizer } from "@/components/Visualizer";
import { type ShopTrack, shopTracks } from "@/data/shopTracks";
import { getMusicBasePath } from "@/lib/config";
import {
  createPlayQueue,
  currentTrack,
  type PlayerNotice,
  playQueueReducer,
  shouldRestartOnPrevious,
} from "@/lib/playQueue";
import { isSameOriginSource, resolveTrackSrc } from "@/lib/trackSource";

function useClickOutside(ref: React.RefObject<HTMLElement | null>, onClickOutside: () => void) {
  useEffect(() => {
    function handleClick(event: MouseEvent) {
      if (ref.current && event.target instanceof Node && !ref.current.contains(event.target)) {
        onClickOutside();
      }
    }
    document.addEventListener("mousedown", handleClick);
    return () => document.removeEventListener("mousedown", handleClick);
  }, [ref, onClickOutside]);
}

export const PLAYER_STATE_KEY = "shop_music_state_v1";

const storedPlayerStateSchema = z.object({
  volume: z.number(),
});

type StoredPlayerState = z.infer<typeof storedPlayerStateSchema>;

const DEFAULT_VOLUME = 0.4;

const NOTICE_TEXT: Record<PlayerNotice, string> = {
  "autoplay-blocked": "Your browser blocked autoplay. Tap anywhere to start the music.",
  "track-skipped": "A track could not be played, skipped to the next one.",
  "no-playable-tracks": "No playable tracks left. Check the files in the music folder.",
};

export function clampVolume(value: number): number {
  if (Number.isNaN(value)) {
    return DEFAULT_VOLUME;
  }
  return Math.max(0, Math.min(1, value));
}

export function readStoredVolume(): number {
  if (typeof window === "undefined") {
    return DEFAULT_VOLUME;
  }

  const raw = window.localStorage.getItem(PLAYER_STATE_KEY);
  if (!raw) {
    return DEFAULT_VOLUME;
  }

  try {
    return clampVolume(storedPlayerStateSchema.parse(JSON.parse(raw)).volume);
  } catch {
    window.localStorage.removeItem(PLAYER_STATE_KEY);
    return DEFAULT_VOLUME;
  }
}

type AudioGraph = {
  context: AudioContext;
  analyser: AnalyserNode;
};

// An element can be routed through Web Audio only once, so the graph lives
// as long as the player.
function createAudioGraph(audio: HTMLAudioElement): AudioGraph | null {
  if (typeof window.AudioContext !== "function") {
    return null;
  }
  const context = new window.AudioContext();
  const source = context.createMediaElementSource(audio);
  const analyser = context.createAnalyser();
  analyser.fftSize = 64;
  analyser.smoothingTimeConstant = 0.75;
  source.connect(analyser);
  analyser.connect(context.destination);
  return { context, analyser };
}

function errorName(reason: unknown): string {
  return reason instanceof Error ? reason.name : "";
}

// The element's own `error` event drives skipping; a rejected play() only
// tells us about autoplay policy or a superseded load.
function handlePlayRejection(
  reason: unknown,
  trackName: string,
  onBlocked: () => void
): void {
  const name = errorName(reason);
  if (name === "NotAllowedError") {
    onBlocked();
    return;
  }
  if (name === "AbortError") {
    return;
  }
  console.warn(`Could not play "${trackName}"`, reason);
}

type ShopMusicPlayerProps = {
  tracks?: ShopTrack[];
};

export function ShopMusicPlayer({ tracks = shopTracks }: ShopMusicPlayerProps) {
  const audioRef = useRef<HTMLAudioElement | null>(null);
  const volumeRef = useRef<HTMLDivElement>(null);
  const mainButtonRef = useRef<HTMLButtonElement>(null);
  const graphRef = useRef<AudioGraph | null>(null);
  const graphAttemptedRef = useRef(false);
  const [analyser, setAnalyser] = useState<AnalyserNode | null>(null);
  const [state, dispatch] = useReducer(playQueueReducer, tracks, createPlayQueue);
  const [volume, setVolume] = useState(readStoredVolume);
  const [isPanelOpen, setIsPanelOpen] = useState(true);
  const [isVolumeOpen, setIsVolumeOpen] = useState(false);

  useClickOutside(volumeRef, () => setIsVolumeOpen(false));

  const basePath = useMemo(() => getMusicBasePath(), []);
  const activeTrack = currentTrack(state);
  const showPause = state.isPlaying && !state.awaitingGesture;
  // Cross-origin audio goes silent in Web Audio without CORS headers.
  const analyse = useMemo(
    () =>
      typeof window !== "undefined" &&
      state.tracks.every((track) =>
        isSameOriginSource(resolveTrackSrc(track.src, basePath), window.location.origin)
      ),
    [basePath, state.tracks]
  );

  const ensureAudioGraph = (): AudioGraph | null => {
    const audio = audioRef.current;
    if (graphRef.current || graphAttemptedRef.current || !audio) {
      return graphRef.current;
    }
    graphAttemptedRef.current = true;
    try {
      graphRef.current = createAudioGraph(audio);
    } catch (e) {
      console.warn("Visualizer could not attach to audio", e);
    }
    return graphRef.current;
  };

  // Shop open: the first track starts right away.
  useEffect(() => {
    dispatch({ type: "open" });
  }, []);

  useEffect(() => {
    if (tracks !== state.tracks) {
      dispatch({ type: "setTracks", tracks });
    }
    // Only a new `tracks` prop resets the queue.
  }, [tracks]);

  useEffect(() => {
    if (typeof window === "undefined") {
      return;
    }
    const payload: StoredPlayerState = { volume };
    window.localStorage.setItem(PLAYER_STATE_KEY, JSON.stringify(payload));
  }, [volume]);

  useEffect(() => {
    const audio = audioRef.current;
    if (!audio || !activeTrack || state.loadId === 0) {
      return;
    }

    audio.loop = false;
    audio.src = resolveTrackSrc(activeTrack.src, basePath);
    audio.load();

    if (state.wantsPlayback) {
      audio.play().catch((reason: unknown) => {
        handlePlayRejection(reason, activeTrack.name, () => dispatch({ type: "blocked" }));
      });
    }
    // Reloads only when the queue asks for it.
  }, [state.loadId]);

  useEffect(() => {
    if (!state.awaitingGesture || !state.wantsPlayback) {
      return;
    }

    const tryResume = async () => {
      const audio = audioRef.current;
      if (!audio) {
        return;
      }
      try {
        await audio.play();
      } catch (e) {
        console.warn("Playback still blocked", e);
      }
    };

    // The main button resumes through its own click.
    const handler = (event: Event) => {
      const mainButton = mainButtonRef.current;
      if (mainButton && event.target instanceof Node && mainButton.contains(event.target)) {
        return;
      }
      void tryResume();
    };

    window.addEventListener("pointerdown", handler);
    window.addEventListener("keydown", handler);

    return () => {
      window.removeEventListener("pointerdown", handler);
      window.removeEventListener("keydown", handler);
    };
  }, [state.awaitingGesture, state.wantsPlayback]);

  useEffect(() => {
    const audio = audioRef.current;
    if (!audio) {
      return;
    }
    audio.volume = volume;
  }, [volume]);

  // The context may only start once playback was allowed.
  useEffect(() => {
    if (!state.isPlaying || !analyse) {
      return;
    }
    const graph = ensureAudioGraph();
    if (!graph) {
      return;
    }
    setAnalyser(graph.analyser);
    if (graph.context.state === "suspended") {
      graph.context.resume().catch((e: unknown) => {
        console.warn("Visualizer audio context did not resume", e);
      });
    }
  }, [analyse, state.isPlaying]);

  useEffect(() => {
    return () => {
      const graph = graphRef.current;
      graphRef.current = null;
      graph?.context.close().catch((e: unknown) => {
        console.warn("Visualizer audio context did not close", e);
      });
    };
  }, []);

  const handlePrevious = () => {
    const audio = audioRef.current;
    if (audio && shouldRestartOnPrevious(audio.currentTime)) {
      audio.currentTime = 0;
      return;
    }
    dispatch({ type: "previous" });
  };

  const handleToggle = async () => {
    const audio = audioRef.current;
    if (!audio || !activeTrack) {
      return;
    }

    if (showPause) {
      dispatch({ type: "pause" });
      audio.pause();
      return;
    }

    dispatch({ type: "play" });
    try {
      await audio.play();
    } catch (e) {
      handlePlayRejection(e, activeTrack.name, () => dispatch({ type: "blocked" }));
    }
  };

  return (
    <aside className="audio-dock" aria-label="Shop music player">
      <button
        type="button"
        className="audio-panel-toggle"
        aria-expanded={isPanelOpen}
        onClick={() => setIsPanelOpen((prev) => !prev)}
      >
        <Music2 aria-hidden="true" />
        <span>{isPanelOpen ? "Hide player" : "Show player"}</span>
        {isPanelOpen ? <ChevronDown aria-hidden="true" /> : <ChevronUp aria-hidden="true" />}
      </button>

      {isPanelOpen ? (
        <article className="audio-dock-card">
          <p className="audio-now-playing" aria-live="polite">
            {activeTrack ? activeTrack.name : "No tracks"}
          </p>

          <Visualizer isPlaying={state.isPlaying} analyser={analyser} />

          <div className="audio-controls-only" role="group" aria-label="Music controls">
            <button
              type="button"
              className="audio-icon-btn"
              aria-label="Previous track"
              title="Previous track"
              onClick={handlePrevious}
            >
              <SkipBack aria-hidden="true" />
            </button>

            <button
              ref={mainButtonRef}
              type="button"
              className="audio-icon-btn audio-icon-main"
              aria-label={showPause ? "Pause" : "Play"}
              title={showPause ? "Pause" : "Play"}
              onClick={() => void handleToggle()}
            >
              {showPause ? <Pause aria-hidden="true" /> : <Play aria-hidden="true" />}
            </button>

            <button
              type="button"
              className="audio-icon-btn"
              aria-label="Next track"
              title="Next track"
              onClick={() => dispatch({ type: "next" })}
            >
              <SkipForward aria-hidden="true" />
            </button>

            <button
              type="button"
              className={`audio-icon-btn ${isVolumeOpen ? "active" : ""}`}
              aria-expanded={isVolumeOpen}
              aria-label={isVolumeOpen ? "Close volume" : "Open volume"}
              title={isVolumeOpen ? "Close volume" : "Open volume"}
              onClick={() => setIsVolumeOpen((prev) => !prev)}
            >
              <Volume2 aria-hidden="true" />
            </button>

            {isVolumeOpen ? (
              <div ref={volumeRef} className="audio-intensity-wrap">
                <label className="audio-intensity" htmlFor="audio-volume-slider">
                  <span className="sr-only">Volume</span>
                  <input
                    id="audio-volume-slider"
                    className="audio-intensity-slider"
                    type="range"
                    min={0}
                    max={1}
                    step={0.01}
                    value={volume}
                    onChange={(event) => setVolume(clampVolume(Number(event.target.value)))}
                    onMouseUp={() => setIsVolumeOpen(false)}
                    onTouchEnd={() => setIsVolumeOpen(false)}
                  />
                </label>
              </div>
            ) : null}
          </div>

          {state.notice ? <p className="error-text">{NOTICE_TEXT[state.notice]}</p> : null}
        </article>
      ) : null}

      <audio
        ref={audioRef}
        preload="auto"
        onPlay={() => dispatch({ type: "playing" })}
        onPause={() => dispatch({ type: "paused" })}
        onEnded={() => dispatch({ type: "ended" })}
        onError={() => dispatch({ type: "failed" })}
      />
    </aside>
  );
}
