import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { runCommand } from "../util/shell.js";
import type { MediaInfo } from "../types.js";

const ffprobeSchema = z.object({
  format: z.object({ duration: z.string().optional() }).passthrough().optional(),
  streams: z
    .array(
      z
        .object({
          codec_type: z.string().optional(),
          codec_name: z.string().optional(),
          duration: z.string().optional(),
          width: z.number().optional(),
          height: z.number().optional(),
          nb_frames: z.string().optional(),
        })
        .passthrough(),
    )
    .optional(),
});

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseFrameCount(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

export async function ensureFfmpegAvailable(cwd: string): Promise<void> {
  try {
    await runCommand("which", ["ffmpeg"], cwd);
    await runCommand("which", ["ffprobe"], cwd);
  } catch (error) {
    throw new Error(
      "ffmpeg/ffprobe are required but were not found in PATH. Install ffmpeg first, then retry.",
      { cause: error },
    );
  }
}

export function parseProbeOutput(inputPath: string, stdout: string): MediaInfo {
  const parsed = ffprobeSchema.parse(JSON.parse(stdout));
  const streams = parsed.streams ?? [];
  const audio = streams.find((stream) => stream.codec_type === "audio");
  const video = streams.find((stream) => stream.codec_type === "video");

  const audioDurationSec = parseSeconds(audio?.duration);
  const videoDurationSec = parseSeconds(video?.duration);
  const durationSec = parseSeconds(parsed.format?.duration) ?? videoDurationSec ?? audioDurationSec ?? 0;

  return {
    path: inputPath,
    durationSec,
    hasAudio: audio !== undefined,
    hasVideo: video !== undefined,
    audioCodec: audio?.codec_name,
    videoCodec: video?.codec_name,
    audioDurationSec,
    videoDurationSec,
    width: video?.width,
    height: video?.height,
    frameCount: parseFrameCount(video?.nb_frames),
  };
}

export async function probeMedia(inputPath: string, cwd: string): Promise<MediaInfo> {
  const { stdout } = await runCommand(
    "ffprobe",
    ["-v", "error", "-print_format", "json", "-show_format", "-show_streams", inputPath],
    cwd,
  );

  return parseProbeOutput(inputPath, stdout);
}

export async function extractAudioToWav(inputPath: string, outputPath: string, cwd: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await runCommand(
    "ffmpeg",
    [
      "-y",
      "-i",
      inputPath,
      "-vn",
      "-ac",
      "1",
      "-ar",
      "16000",
      "-c:a",
      "pcm_s16le",
      outputPath,
    ],
    cwd,
  );
}

export async function muxDubbedAudioWithVideo(
  inputVideoPath: string,
  dubbedAudioPath: string,
  outputVideoPath: string,
  cwd: string,
): Promise<void> {
  await fs.mkdir(path.dirname(outputVideoPath), { recursive: true });

  await runCommand(
    "ffmpeg",
    [
      "-y",
      "-i",
      inputVideoPath,
      "-i",
      dubbedAudioPath,
      "-map",
      "0:v:0",
      "-map",
      "1:a:0",
      "-c:v",
      "copy",
      "-c:a",
      "aac",
      "-shortest",
      outputVideoPath,
    ],
    cwd,
  );
}

export async function convertWavToMp3(wavPath: string, outputPath: string, cwd: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  await runCommand(
    "ffmpeg",
    [
      "-y",
      "-i",
      wavPath,
      "-codec:a",
      "libmp3lame",
      "-qscale:a",
      "2",
      outputPath,
    ],
    cwd,
  );
}

/** Retimes speech without changing pitch. ffmpeg's atempo takes factors from 0.5 to 100. */
export async function changeTempo(
  inputPath: string,
  outputPath: string,
  factor: number,
  cwd: string,
): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  await runCommand(
    "ffmpeg",
    ["-y", "-i", inputPath, "-filter:a", `atempo=${factor.toFixed(3)}`, "-vn", "-c:a", "pcm_s16le", outputPath],
    cwd,
  );
}
