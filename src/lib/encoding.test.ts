import { describe, expect, it } from "vitest";
import {
  checkEncoding,
  describeEncoding,
  RECOMMENDED_ENCODING,
  type EncodingProfile,
} from "@/lib/encoding";

const recommended: EncodingProfile = {
  container: "mp3",
  bitrateKbps: 192,
  sampleRateHz: 44100,
  channels: 2,
};

describe("RECOMMENDED_ENCODING", () => {
  it("keeps the default bitrate inside the recommended range", () => {
    const { minBitrateKbps, defaultBitrateKbps, maxBitrateKbps } = RECOMMENDED_ENCODING;
    expect(minBitrateKbps).toBe(128);
    expect(defaultBitrateKbps).toBe(192);
    expect(maxBitrateKbps).toBe(320);
    expect(minBitrateKbps <= defaultBitrateKbps && defaultBitrateKbps <= maxBitrateKbps).toBe(true);
  });
});

describe("checkEncoding", () => {
  it("has nothing to say about the recommended profile", () => {
    expect(checkEncoding(recommended)).toEqual([]);
  });

  it("accepts both ends of the bitrate range", () => {
    expect(checkEncoding({ ...recommended, bitrateKbps: 128 })).toEqual([]);
    expect(checkEncoding({ ...recommended, bitrateKbps: 320 })).toEqual([]);
  });

  it("flags each deviation once", () => {
    const advisories = checkEncoding({
      container: "ogg",
      bitrateKbps: 96,
      sampleRateHz: 48000,
      channels: 1,
    });

    expect(advisories).toEqual([
      { code: "container", message: "container is ogg, expected MP3" },
      { code: "bitrate-low", message: "bitrate 96 kbps is below 128 kbps" },
      { code: "sample-rate", message: "sample rate is 48 kHz, expected 44.1 kHz" },
      { code: "channels", message: "mono, expected stereo" },
    ]);
  });

  it("flags bitrates above the range", () => {
    expect(checkEncoding({ ...recommended, bitrateKbps: 1411 })).toEqual([
      { code: "bitrate-high", message: "bitrate 1411 kbps is above 320 kbps" },
    ]);
  });

  it("ignores unknown values", () => {
    expect(
      checkEncoding({ container: null, bitrateKbps: null, sampleRateHz: null, channels: null })
    ).toEqual([]);
  });

  it("treats the container name case-insensitively", () => {
    expect(checkEncoding({ ...recommended, container: "MP3" })).toEqual([]);
  });
});

describe("describeEncoding", () => {
  it("summarises a profile", () => {
    expect(describeEncoding(recommended)).toBe("MP3 · 192 kbps · 44.1 kHz · stereo");
    expect(describeEncoding({ ...recommended, sampleRateHz: 32000, channels: 6 })).toBe(
      "MP3 · 192 kbps · 32 kHz · 6 channels"
    );
  });

  it("falls back when nothing is known", () => {
    expect(
      describeEncoding({ container: null, bitrateKbps: null, sampleRateHz: null, channels: null })
    ).toBe("unknown encoding");
  });
});
