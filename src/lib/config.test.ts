import { afterEach, describe, expect, it, vi } from "vitest";
import { getMusicBasePath, normalizeBasePath } from "@/lib/config";

describe("normalizeBasePath", () => {
  it("falls back to /music", () => {
    expect(normalizeBasePath(undefined)).toBe("/music");
    expect(normalizeBasePath("   ")).toBe("/music");
    expect(normalizeBasePath("/")).toBe("/music");
  });

  it("trims trailing slashes and adds a leading one", () => {
    expect(normalizeBasePath(" audio/shop/ ")).toBe("/audio/shop");
    expect(normalizeBasePath("/static/music//")).toBe("/static/music");
  });

  it("keeps absolute URLs", () => {
    expect(normalizeBasePath("https://cdn.example.com/music/")).toBe(
      "https://cdn.example.com/music"
    );
  });
});

describe("getMusicBasePath", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads NEXT_PUBLIC_SHOP_MUSIC_BASE_PATH", () => {
    vi.stubEnv("NEXT_PUBLIC_SHOP_MUSIC_BASE_PATH", "/tunes/");
    expect(getMusicBasePath()).toBe("/tunes");
  });
});
