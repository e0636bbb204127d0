export const DEFAULT_MUSIC_BASE_PATH = "/music";

export function asTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function normalizeBasePath(value: unknown): string {
  const trimmed = asTrimmedString(value).replace(/\/+$/, "");
  if (!trimmed) {
    return DEFAULT_MUSIC_BASE_PATH;
  }
  return trimmed.startsWith("/") || /^https?:\/\//i.test(trimmed)
    ? trimmed
    : `/${trimmed}`;
}

// Public prefix under which the music folder is served.
export function getMusicBasePath(): string {
  return normalizeBasePath(process.env.NEXT_PUBLIC_SHOP_MUSIC_BASE_PATH);
}
