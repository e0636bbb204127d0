import { parseTrackList } from "@/lib/trackSource";

export type ShopTrack = {
  id: string;
  name: string;
  src: string;
};

export const REQUIRED_MUSIC_FILES = [
  "big_poppa.mp3",
  "notorious_thugs.mp3",
  "juice.mp3",
  "party_and_bullshit.mp3",
  "hypnotize.mp3",
] as const;

export type RequiredMusicFile = (typeof REQUIRED_MUSIC_FILES)[number];

// Plays as soon as the shop opens.
export const AUTOPLAY_FILE: RequiredMusicFile = "big_poppa.mp3";

// Swap any `src` for an external audio URL to skip the local file.
// A malformed entry throws a TrackListError when this module loads.
export const shopTracks: ShopTrack[] = parseTrackList([
  {
    id: "big-poppa",
    name: "♫ BIG POPPA",
    src: "big_poppa.mp3",
  },
  {
    id: "notorious-thugs",
    name: "♫ NOTORIOUS THUGS",
    src: "notorious_thugs.mp3",
  },
  {
    id: "juice",
    name: "♫ JUICY",
    src: "juice.mp3",
  },
  {
    id: "party-and-bullshit",
    name: "♫ PARTY AND BULLSHIT",
    src: "party_and_bullshit.mp3",
  },
  {
    id: "hypnotize",
    name: "♫ HYPNOTIZE",
    src: "hypnotize.mp3",
  },
]);
