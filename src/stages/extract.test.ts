import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../media/ffmpeg.js", () => ({
  ensureFfmpegAvailable: vi.fn(),
  probeMedia: vi.fn(),
  extractAudioToWav: vi.fn(),
}));

import { ExtractionError } from "../errors.js";
import { ensureFfmpegAvailable, extractAudioToWav, probeMedia } from "../media/ffmpeg.js";
import { CommandError } from "../util/shell.js";
import { fileExists, partialPathFor } from "../util/atomic.js";
import { extractAudio } from "./extract.js";
import type { MediaInfo } from "../types.js";

const mockEnsure = vi.mocked(ensureFfmpegAvailable);
const mockProbe = vi.mocked(probeMedia);
const mockExtract = vi.mocked(extractAudioToWav);

let dir: string;
let inputPath: string;
let outputPath: string;

function mediaInfo(overrides: Partial<MediaInfo> = {}): MediaInfo {
  return { path: inputPath, durationSec: 10, hasAudio: true, hasVideo: true, ...overrides };
}

beforeEach(async () => {
  vi.clearAllMocks();
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "redub-extract-"));
  inputPath = path.join(dir, "sample.mp4");
  outputPath = path.join(dir, "audio", "source.wav");
  await fs.writeFile(inputPath, "video");
  mockEnsure.mockResolvedValue();
  mockProbe.mockImplementation(async () => mediaInfo());
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("extractAudio", () => {
  it("writes the WAV and returns the probed source", async () => {
    mockExtract.mockImplementation(async (_input, output) => {
      await fs.writeFile(output, "RIFF");
    });

    const info = await extractAudio({ inputPath, outputPath, cwd: dir });

    expect(info).toEqual(mediaInfo());
    expect(mockExtract).toHaveBeenCalledWith(inputPath, partialPathFor(outputPath), dir);
    expect(await fs.readFile(outputPath, "utf8")).toBe("RIFF");
  });

  it("fails before running ffmpeg when the source is missing", async () => {
    const missing = path.join(dir, "missing.mp4");

    const run = extractAudio({ inputPath: missing, outputPath, cwd: dir });

    await expect(run).rejects.toBeInstanceOf(ExtractionError);
    await expect(run).rejects.toThrow(`Source video not found: ${missing}`);
    expect(mockEnsure).not.toHaveBeenCalled();
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("fails when the source has no audio stream", async () => {
    mockProbe.mockImplementation(async () => mediaInfo({ hasAudio: false }));

    await expect(extractAudio({ inputPath, outputPath, cwd: dir })).rejects.toThrow(
      `Source video has no audio stream: ${inputPath}`,
    );
    expect(mockExtract).not.toHaveBeenCalled();
  });

  it("reports a non-zero ffmpeg exit and leaves no partial file", async () => {
    mockExtract.mockImplementation(async (_input, output) => {
      await fs.writeFile(output, "RI");
      throw new CommandError({ command: "ffmpeg", args: [], exitCode: 1, stderr: "Invalid data found" });
    });

    const run = extractAudio({ inputPath, outputPath, cwd: dir });

    await expect(run).rejects.toBeInstanceOf(ExtractionError);
    await expect(run).rejects.toThrow(/Audio extraction failed: Command exited with code 1/);
    expect(await fileExists(outputPath)).toBe(false);
    expect(await fileExists(partialPathFor(outputPath))).toBe(false);
  });

  it("fails when ffmpeg is not installed", async () => {
    mockEnsure.mockRejectedValue(new Error("ffmpeg/ffprobe are required but were not found in PATH."));

    await expect(extractAudio({ inputPath, outputPath, cwd: dir })).rejects.toBeInstanceOf(ExtractionError);
    expect(mockProbe).not.toHaveBeenCalled();
  });
});
