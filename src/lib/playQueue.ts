import type { ShopTrack } from "@/data/shopTracks";

export const RESTART_THRESHOLD_SECONDS = 3;

export type PlayerNotice = "autoplay-blocked" | "track-skipped" | "no-playable-tracks";

export type PlayQueueState = {
  tracks: ShopTrack[];
  index: number;
  /** User intent: keep audio running. */
  wantsPlayback: boolean;
  /** Mirrors the audio element's play/pause events. */
  isPlaying: boolean;
  awaitingGesture: boolean;
  failedIds: string[];
  /** Bumped whenever the audio element must (re)load the current track. */
  loadId: number;
  notice: PlayerNotice | null;
};

export type PlayQueueAction =
  | { type: "open" }
  | { type: "next" }
  | { type: "previous" }
  | { type: "select"; index: number }
  | { type: "ended" }
  | { type: "failed" }
  | { type: "blocked" }
  // Audio element events.
  | { type: "playing" }
  | { type: "paused" }
  // User intent from the main button.
  | { type: "play" }
  | { type: "pause" }
  | { type: "setTracks"; tracks: ShopTrack[] };

export function createPlayQueue(tracks: ShopTrack[]): PlayQueueState {
  return {
    tracks,
    index: 0,
    wantsPlayback: false,
    isPlaying: false,
    awaitingGesture: false,
    failedIds: [],
    loadId: 0,
    notice: null,
  };
}

export function currentTrack(state: PlayQueueState): ShopTrack | null {
  return state.tracks[state.index] ?? null;
}

export function shouldRestartOnPrevious(positionSeconds: number): boolean {
  return positionSeconds > RESTART_THRESHOLD_SECONDS;
}

/**
 * Walks the list from `from` in `step` direction with wrap-around and
 * returns the first index whose track has not failed. `from` itself is
 * considered last, so a one-track list yields its own index.
 */
export function findPlayableIndex(
  tracks: ShopTrack[],
  from: number,
  step: 1 | -1,
  failedIds: readonly string[]
): number | null {
  const count = tracks.length;
  if (count === 0) {
    return null;
  }
  const failed = new Set(failedIds);
  for (let offset = 1; offset <= count; offset++) {
    const candidate = (((from + step * offset) % count) + count) % count;
    const track = tracks[candidate];
    if (track && !failed.has(track.id)) {
      return candidate;
    }
  }
  return null;
}

function moveTo(state: PlayQueueState, index: number, wantsPlayback: boolean): PlayQueueState {
  return {
    ...state,
    index,
    wantsPlayback,
    loadId: state.loadId + 1,
  };
}

function step(state: PlayQueueState, direction: 1 | -1): PlayQueueState {
  const nextIndex = findPlayableIndex(state.tracks, state.index, direction, state.failedIds);
  if (nextIndex === null || nextIndex === state.index) {
    return state;
  }
  return { ...moveTo(state, nextIndex, state.wantsPlayback), notice: null };
}

export function playQueueReducer(
  state: PlayQueueState,
  action: PlayQueueAction
): PlayQueueState {
  switch (action.type) {
    case "open":
      if (state.tracks.length === 0) {
        return state;
      }
      return { ...moveTo(state, 0, true), notice: null };

    case "next":
      return step(state, 1);

    case "previous":
      return step(state, -1);

    case "select": {
      if (!state.tracks[action.index]) {
        return state;
      }
      return { ...moveTo(state, action.index, true), notice: null };
    }

    case "ended": {
      const nextIndex = findPlayableIndex(state.tracks, state.index, 1, state.failedIds);
      if (nextIndex === null) {
        return { ...state, wantsPlayback: false, isPlaying: false };
      }
      return moveTo(state, nextIndex, true);
    }

    case "failed": {
      const track = currentTrack(state);
      if (!track) {
        return state;
      }
      const failedIds = state.failedIds.includes(track.id)
        ? state.failedIds
        : [...state.failedIds, track.id];
      const nextIndex = findPlayableIndex(state.tracks, state.index, 1, failedIds);
      if (nextIndex === null) {
        return {
          ...state,
          failedIds,
          wantsPlayback: false,
          isPlaying: false,
          notice: "no-playable-tracks",
        };
      }
      return { ...moveTo({ ...state, failedIds }, nextIndex, true), notice: "track-skipped" };
    }

    case "blocked":
      return { ...state, isPlaying: false, awaitingGesture: true, notice: "autoplay-blocked" };

    case "playing":
      return {
        ...state,
        isPlaying: true,
        awaitingGesture: false,
        notice: state.notice === "autoplay-blocked" ? null : state.notice,
      };

    case "paused":
      return { ...state, isPlaying: false };

    case "play":
      return { ...state, wantsPlayback: true };

    case "pause":
      return { ...state, wantsPlayback: false };

    case "setTracks":
      return {
        ...createPlayQueue(action.tracks),
        wantsPlayback: state.wantsPlayback,
        loadId: state.loadId + 1,
      };
  }
}
