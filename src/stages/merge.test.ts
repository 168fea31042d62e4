import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../media/ffmpeg.js", () => ({
  ensureFfmpegAvailable: vi.fn(),
  probeMedia: vi.fn(),
  muxDubbedAudioWithVideo: vi.fn(),
}));

import { MergeError } from "../errors.js";
import { ensureFfmpegAvailable, muxDubbedAudioWithVideo, probeMedia } from "../media/ffmpeg.js";
import { CommandError } from "../util/shell.js";
import { fileExists, partialPathFor } from "../util/atomic.js";
import { mergeAudioIntoVideo } from "./merge.js";
import type { MediaInfo } from "../types.js";

const mockEnsure = vi.mocked(ensureFfmpegAvailable);
const mockProbe = vi.mocked(probeMedia);
const mockMux = vi.mocked(muxDubbedAudioWithVideo);

let dir: string;
let videoPath: string;
let audioPath: string;
let outputPath: string;
let probes: Record<string, MediaInfo>;

const sourceVideo: MediaInfo = {
  path: "",
  durationSec: 10,
  videoDurationSec: 10,
  hasAudio: true,
  hasVideo: true,
  width: 1920,
  height: 1080,
  frameCount: 250,
};

const dubbedAudio: MediaInfo = {
  path: "",
  durationSec: 10.4,
  audioDurationSec: 10.4,
  hasAudio: true,
  hasVideo: false,
};

beforeEach(async () => {
  vi.clearAllMocks();
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "redub-merge-"));
  videoPath = path.join(dir, "sample.mp4");
  audioPath = path.join(dir, "dubbed.mp3");
  outputPath = path.join(dir, "output", "dubbed.mp4");
  await fs.writeFile(videoPath, "video");
  await fs.writeFile(audioPath, "audio");

  probes = {
    [videoPath]: sourceVideo,
    [audioPath]: dubbedAudio,
    [partialPathFor(outputPath)]: { ...sourceVideo, path: partialPathFor(outputPath) },
  };
  mockEnsure.mockResolvedValue();
  mockProbe.mockImplementation(async (inputPath) => {
    const info = probes[inputPath];
    if (!info) {
      throw new Error(`unexpected probe: ${inputPath}`);
    }
    return info;
  });
  mockMux.mockImplementation(async (_video, _audio, output) => {
    await fs.writeFile(output, "merged");
  });
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("mergeAudioIntoVideo", () => {
  it("muxes, verifies and moves the output into place", async () => {
    const merged = await mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir });

    expect(mockMux).toHaveBeenCalledWith(videoPath, audioPath, partialPathFor(outputPath), dir);
    expect(merged.path).toBe(outputPath);
    expect(merged.frameCount).toBe(250);
    expect(await fs.readFile(outputPath, "utf8")).toBe("merged");
  });

  it("rejects audio whose duration drifts beyond the tolerance", async () => {
    probes[audioPath] = { ...dubbedAudio, durationSec: 13, audioDurationSec: 13 };

    await expect(
      mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir, maxDurationDriftSec: 2 }),
    ).rejects.toThrow("Audio lasts 13.00s but video lasts 10.00s (drift 3.00s exceeds 2s).");
    expect(mockMux).not.toHaveBeenCalled();
  });

  it("fails when the synthesized audio is missing", async () => {
    await fs.rm(audioPath);

    const run = mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir });

    await expect(run).rejects.toBeInstanceOf(MergeError);
    await expect(run).rejects.toThrow(`Synthesized audio not found: ${audioPath}`);
  });

  it("fails when the source has no video stream", async () => {
    probes[videoPath] = { ...sourceVideo, hasVideo: false };

    await expect(mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir })).rejects.toThrow(
      `Source has no video stream: ${videoPath}`,
    );
  });

  it("discards output whose resolution changed", async () => {
    probes[partialPathFor(outputPath)] = { ...sourceVideo, width: 1280, height: 720 };

    await expect(mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir })).rejects.toThrow(
      "Merged video resolution 1280x720 differs from source 1920x1080.",
    );
    expect(await fileExists(outputPath)).toBe(false);
    expect(await fileExists(partialPathFor(outputPath))).toBe(false);
  });

  it("discards output that lost frames", async () => {
    probes[partialPathFor(outputPath)] = { ...sourceVideo, frameCount: 240 };

    await expect(mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir })).rejects.toThrow(
      "Merged video has 240 frames, source has 250.",
    );
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("reports a non-zero ffmpeg exit", async () => {
    mockMux.mockRejectedValue(new CommandError({ command: "ffmpeg", args: [], exitCode: 1, stderr: "" }));

    const run = mergeAudioIntoVideo({ videoPath, audioPath, outputPath, cwd: dir });

    await expect(run).rejects.toBeInstanceOf(MergeError);
    await expect(run).rejects.toThrow(/Merging audio into video failed: Command exited with code 1/);
  });
});
