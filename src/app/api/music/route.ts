import { NextResponse } from "next/server";
import { REQUIRED_MUSIC_FILES } from "@/data/shopTracks";
import { getMusicBasePath } from "@/lib/config";
import {
  getMusicDir,
  inspectMusicFolder,
  type EncodingReport,
  type RenameSuggestion,
} from "@/lib/musicFolder";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export type MusicFolderResponse = {
  tracks: string[];
  required: string[];
  missing: string[];
  unexpected: string[];
  renames: RenameSuggestion[];
  reports?: EncodingReport[];
};

const NO_STORE = { "Cache-Control": "no-store" };

export async function GET(request: Request) {
  const encoding = new URL(request.url).searchParams.get("encoding") === "1";
  const basePath = getMusicBasePath();

  try {
    const inspection = await inspectMusicFolder(getMusicDir(), { encoding });

    const body: MusicFolderResponse = {
      tracks: inspection.files.map((name) => `${basePath}/${encodeURIComponent(name)}`),
      required: [...REQUIRED_MUSIC_FILES],
      missing: inspection.missing,
      unexpected: inspection.unexpected,
      renames: inspection.renames,
    };
    if (inspection.reports) {
      body.reports = inspection.reports;
    }

    return NextResponse.json(body, { headers: NO_STORE });
  } catch (error) {
    console.error("Music folder scan failed", error);
    return NextResponse.json(
      {
        tracks: [],
        required: [...REQUIRED_MUSIC_FILES],
        missing: [...REQUIRED_MUSIC_FILES],
        unexpected: [],
        renames: [],
      } satisfies MusicFolderResponse,
      { headers: NO_STORE }
    );
  }
}
