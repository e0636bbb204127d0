import { describe, expect, it } from "vitest";
import {
  fileNameForTitle,
  isConventionalFileName,
  isRemoteSource,
  isSameOriginSource,
  parseTrackList,
  resolveTrackSrc,
  TrackListError,
} from "@/lib/trackSource";

describe("isConventionalFileName", () => {
  it.each(["big_poppa.mp3", "juice.mp3", "track_2.mp3"])("accepts %s", (name) => {
    expect(isConventionalFileName(name)).toBe(true);
  });

  it.each([
    "Big_Poppa.mp3",
    "big poppa.mp3",
    "big-poppa.mp3",
    "big__poppa.mp3",
    "_big.mp3",
    "big_poppa.wav",
    "big_poppa",
  ])("rejects %s", (name) => {
    expect(isConventionalFileName(name)).toBe(false);
  });
});

describe("fileNameForTitle", () => {
  it("derives the filename from a display name", () => {
    expect(fileNameForTitle("♫ BIG POPPA")).toBe("big_poppa.mp3");
    expect(fileNameForTitle("♫ PARTY AND BULLSHIT")).toBe("party_and_bullshit.mp3");
  });

  it("drops punctuation and folds separators", () => {
    expect(fileNameForTitle("  Notorious   Thugs! ")).toBe("notorious_thugs.mp3");
    expect(fileNameForTitle("One-More Chance")).toBe("one_more_chance.mp3");
    expect(fileNameForTitle("Rock & Roll")).toBe("rock_and_roll.mp3");
  });
});

describe("isRemoteSource", () => {
  it("recognises http and https URLs only", () => {
    expect(isRemoteSource("https://cdn.example.com/a.mp3")).toBe(true);
    expect(isRemoteSource("http://example.com/a.mp3")).toBe(true);
    expect(isRemoteSource("ftp://example.com/a.mp3")).toBe(false);
    expect(isRemoteSource("big_poppa.mp3")).toBe(false);
  });
});

describe("resolveTrackSrc", () => {
  it("places local files under the music path", () => {
    expect(resolveTrackSrc("big_poppa.mp3")).toBe("/music/big_poppa.mp3");
    expect(resolveTrackSrc("juice.mp3", "/static/audio")).toBe("/static/audio/juice.mp3");
  });

  it("returns remote URLs unchanged", () => {
    const url = "https://cdn.example.com/audio/juice.mp3?v=2";
    expect(resolveTrackSrc(url, "/music")).toBe(url);
  });
});

describe("isSameOriginSource", () => {
  const origin = "https://shop.example.com";

  it("accepts relative paths and URLs on the page's origin", () => {
    expect(isSameOriginSource("/music/juice.mp3", origin)).toBe(true);
    expect(isSameOriginSource("https://shop.example.com/music/juice.mp3", origin)).toBe(true);
  });

  it("rejects other hosts, schemes and ports", () => {
    expect(isSameOriginSource("https://cdn.example.com/music/juice.mp3", origin)).toBe(false);
    expect(isSameOriginSource("http://shop.example.com/music/juice.mp3", origin)).toBe(false);
    expect(isSameOriginSource("https://shop.example.com:8443/juice.mp3", origin)).toBe(false);
  });

  it("rejects anything when the origin is unusable", () => {
    expect(isSameOriginSource("/music/juice.mp3", "null")).toBe(false);
  });
});

describe("parseTrackList", () => {
  it("accepts local filenames and URLs", () => {
    const tracks = [
      { id: "a", name: "♫ A", src: "big_poppa.mp3" },
      { id: "b", name: "♫ B", src: "https://example.com/b.mp3" },
    ];
    expect(parseTrackList(tracks)).toEqual(tracks);
  });

  it("rejects an empty name and a non-conventional src", () => {
    const run = () =>
      parseTrackList([{ id: "a", name: "  ", src: "Big Poppa.mp3" }]);

    expect(run).toThrow(TrackListError);
    expect(run).toThrow(
      "0.name: name is required; 0.src: src must be an http(s) URL or a lowercase_underscore .mp3 filename"
    );
  });

  it("rejects duplicate ids", () => {
    const run = () =>
      parseTrackList([
        { id: "a", name: "♫ A", src: "a.mp3" },
        { id: "a", name: "♫ B", src: "b.mp3" },
      ]);
    expect(run).toThrow('1.id: duplicate id "a"');
  });

  it("rejects an empty list and non-arrays", () => {
    expect(() => parseTrackList([])).toThrow("(root): track list is empty");
    expect(() => parseTrackList({ tracks: [] })).toThrow(TrackListError);
  });
});
