export const RECOMMENDED_ENCODING = {
  container: "mp3",
  minBitrateKbps: 128,
  maxBitrateKbps: 320,
  defaultBitrateKbps: 192,
  sampleRateHz: 44100,
  channels: 2,
} as const;

export type EncodingProfile = {
  container: string | null;
  bitrateKbps: number | null;
  sampleRateHz: number | null;
  channels: number | null;
};

export type EncodingAdvisoryCode =
  | "container"
  | "bitrate-low"
  | "bitrate-high"
  | "sample-rate"
  | "channels"
  | "unreadable";

export type EncodingAdvisory = {
  code: EncodingAdvisoryCode;
  message: string;
};

function formatKhz(hz: number): string {
  return `${Number((hz / 1000).toFixed(1))} kHz`;
}

function channelLabel(channels: number): string {
  if (channels === 1) {
    return "mono";
  }
  if (channels === 2) {
    return "stereo";
  }
  return `${channels} channels`;
}

// Advisories only: files outside the recommendation still play.
export function checkEncoding(profile: EncodingProfile): EncodingAdvisory[] {
  const advisories: EncodingAdvisory[] = [];
  const rec = RECOMMENDED_ENCODING;

  if (profile.container !== null && profile.container.toLowerCase() !== rec.container) {
    advisories.push({
      code: "container",
      message: `container is ${profile.container}, expected MP3`,
    });
  }

  if (profile.bitrateKbps !== null) {
    if (profile.bitrateKbps < rec.minBitrateKbps) {
      advisories.push({
        code: "bitrate-low",
        message: `bitrate ${profile.bitrateKbps} kbps is below ${rec.minBitrateKbps} kbps`,
      });
    } else if (profile.bitrateKbps > rec.maxBitrateKbps) {
      advisories.push({
        code: "bitrate-high",
        message: `bitrate ${profile.bitrateKbps} kbps is above ${rec.maxBitrateKbps} kbps`,
      });
    }
  }

  if (profile.sampleRateHz !== null && profile.sampleRateHz !== rec.sampleRateHz) {
    advisories.push({
      code: "sample-rate",
      message: `sample rate is ${formatKhz(profile.sampleRateHz)}, expected ${formatKhz(rec.sampleRateHz)}`,
    });
  }

  if (profile.channels !== null && profile.channels !== rec.channels) {
    advisories.push({
      code: "channels",
      message: `${channelLabel(profile.channels)}, expected stereo`,
    });
  }

  return advisories;
}

export function describeEncoding(profile: EncodingProfile): string {
  const parts: string[] = [];
  if (profile.container !== null) {
    parts.push(profile.container.toUpperCase());
  }
  if (profile.bitrateKbps !== null) {
    parts.push(`${profile.bitrateKbps} kbps`);
  }
  if (profile.sampleRateHz !== null) {
    parts.push(formatKhz(profile.sampleRateHz));
  }
  if (profile.channels !== null) {
    parts.push(channelLabel(profile.channels));
  }
  return parts.length > 0 ? parts.join(" · ") : "unknown encoding";
}
