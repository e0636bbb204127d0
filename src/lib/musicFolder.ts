import path from "path";
import { readdir } from "fs/promises";
import { parseFile } from "music-metadata";
import { REQUIRED_MUSIC_FILES } from "@/data/shopTracks";
import { asTrimmedString } from "@/lib/config";
import {
  checkEncoding,
  describeEncoding,
  type EncodingAdvisory,
  type EncodingProfile,
} from "@/lib/encoding";
import { fileNameForTitle, isConventionalFileName } from "@/lib/trackSource";

const AUDIO_EXTENSIONS = new Set([
  ".mp3",
  ".wav",
  ".ogg",
  ".m4a",
  ".aac",
  ".webm",
  ".flac",
]);

export type RenameSuggestion = {
  file: string;
  suggested: string;
};

export type MusicFolderScan = {
  files: string[];
  present: string[];
  missing: string[];
  unexpected: string[];
  /** Unexpected MP3s whose name breaks the lowercase_underscore convention. */
  renames: RenameSuggestion[];
};

export type EncodingReport = {
  file: string;
  profile: EncodingProfile | null;
  summary: string;
  advisories: EncodingAdvisory[];
};

export type MusicFolderInspection = MusicFolderScan & {
  reports?: EncodingReport[];
};

export function getMusicDir(): string {
  const configured = asTrimmedString(process.env.SHOP_MUSIC_DIR);
  if (configured) {
    return path.resolve(configured);
  }
  return path.join(process.cwd(), "public", "music");
}

async function listAudioFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter(
        (name) =>
          !name.startsWith(".") &&
          AUDIO_EXTENSIONS.has(path.extname(name).toLowerCase())
      )
      .sort((a, b) => a.localeCompare(b));
  } catch (error) {
    if (isMissingDirectory(error)) {
      return [];
    }
    throw error;
  }
}

function isMissingDirectory(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function renameFor(file: string): RenameSuggestion | null {
  const { name, ext } = path.parse(file);
  if (ext.toLowerCase() !== ".mp3" || isConventionalFileName(file)) {
    return null;
  }
  const suggested = fileNameForTitle(name);
  return suggested === ".mp3" ? null : { file, suggested };
}

export async function scanMusicFolder(
  dir: string,
  required: readonly string[] = REQUIRED_MUSIC_FILES
): Promise<MusicFolderScan> {
  const files = await listAudioFiles(dir);
  const found = new Set(files);
  const wanted = new Set(required);
  const unexpected = files.filter((name) => !wanted.has(name));

  return {
    files,
    present: required.filter((name) => found.has(name)),
    missing: required.filter((name) => !found.has(name)),
    unexpected,
    renames: unexpected.flatMap((file) => renameFor(file) ?? []),
  };
}

function containerFromFormat(format: {
  container?: string;
  codec?: string;
}): string | null {
  if (format.codec && /layer 3/i.test(format.codec)) {
    return "mp3";
  }
  return format.container ? format.container.toLowerCase() : null;
}

export async function readEncoding(filePath: string): Promise<EncodingProfile> {
  const { format } = await parseFile(filePath, { duration: false, skipCovers: true });
  return {
    container: containerFromFormat(format),
    bitrateKbps: typeof format.bitrate === "number" ? Math.round(format.bitrate / 1000) : null,
    sampleRateHz: format.sampleRate ?? null,
    channels: format.numberOfChannels ?? null,
  };
}

async function reportFor(dir: string, file: string): Promise<EncodingReport> {
  try {
    const profile = await readEncoding(path.join(dir, file));
    return {
      file,
      profile,
      summary: describeEncoding(profile),
      advisories: checkEncoding(profile),
    };
  } catch (error) {
    console.warn(`Could not read audio metadata for "${file}"`, error);
    return {
      file,
      profile: null,
      summary: "unknown encoding",
      advisories: [{ code: "unreadable", message: "audio metadata could not be read" }],
    };
  }
}

export async function inspectMusicFolder(
  dir: string,
  options?: { encoding?: boolean; required?: readonly string[] }
): Promise<MusicFolderInspection> {
  const scan = await scanMusicFolder(dir, options?.required);
  if (!options?.encoding) {
    return scan;
  }

  const reports = await Promise.all(scan.present.map((file) => reportFor(dir, file)));
  return { ...scan, reports };
}
