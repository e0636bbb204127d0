import { z } from "zod";
import type { ShopTrack } from "@/data/shopTracks";
import { DEFAULT_MUSIC_BASE_PATH } from "@/lib/config";

const CONVENTIONAL_FILE_NAME = /^[a-z0-9]+(?:_[a-z0-9]+)*\.mp3$/;

export function isConventionalFileName(name: string): boolean {
  return CONVENTIONAL_FILE_NAME.test(name);
}

export function isRemoteSource(src: string): boolean {
  try {
    const url = new URL(src);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Conventional filename for a display title: `"♫ BIG POPPA"` → `big_poppa.mp3`.
 */
export function fileNameForTitle(title: string): string {
  const stem = title
    .replace(/♫/g, " ")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9\s_-]/g, "")
    .trim()
    .replace(/[\s_-]+/g, "_");
  return `${stem}.mp3`;
}

export function resolveTrackSrc(
  src: string,
  basePath: string = DEFAULT_MUSIC_BASE_PATH
): string {
  if (isRemoteSource(src)) {
    return src;
  }
  return `${basePath}/${encodeURIComponent(src)}`;
}

/**
 * True when a resolved track URL is served from `origin`. Relative URLs
 * resolve against it; anything else can only be analysed with CORS.
 */
export function isSameOriginSource(url: string, origin: string): boolean {
  try {
    return new URL(url, origin).origin === new URL(origin).origin;
  } catch {
    return false;
  }
}

export const trackSchema = z.object({
  id: z.string().trim().min(1, "id is required"),
  name: z.string().trim().min(1, "name is required"),
  src: z
    .string()
    .trim()
    .min(1, "src is required")
    .refine((src) => isRemoteSource(src) || isConventionalFileName(src), {
      message: "src must be an http(s) URL or a lowercase_underscore .mp3 filename",
    }),
});

export const trackListSchema = z
  .array(trackSchema)
  .min(1, "track list is empty")
  .superRefine((tracks, ctx) => {
    const seen = new Set<string>();
    tracks.forEach((track, index) => {
      if (seen.has(track.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `duplicate id "${track.id}"`,
        });
      }
      seen.add(track.id);
    });
  });

export class TrackListError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")
    );
    this.name = "TrackListError";
    this.issues = issues;
  }
}

export function parseTrackList(value: unknown): ShopTrack[] {
  const result = trackListSchema.safeParse(value);
  if (!result.success) {
    throw new TrackListError(result.error.issues);
  }
  return result.data;
}
