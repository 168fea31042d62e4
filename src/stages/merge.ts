import { MergeError, errorMessage } from "../errors.js";
import { ensureFfmpegAvailable, muxDubbedAudioWithVideo, probeMedia } from "../media/ffmpeg.js";
import { fileExists, writeAtomically } from "../util/atomic.js";
import type { MediaInfo } from "../types.js";

export const DEFAULT_MAX_DURATION_DRIFT_SEC = 2;

export interface MergeOptions {
  videoPath: string;
  audioPath: string;
  outputPath: string;
  cwd: string;
  maxDurationDriftSec?: number;
}

async function probeInput(inputPath: string, role: string, cwd: string): Promise<MediaInfo> {
  if (!(await fileExists(inputPath))) {
    throw new MergeError(`${role} not found: ${inputPath}`);
  }
  try {
    return await probeMedia(inputPath, cwd);
  } catch (error) {
    throw new MergeError(`${role} could not be read: ${inputPath}: ${errorMessage(error)}`, { cause: error });
  }
}

export function assertVideoPreserved(source: MediaInfo, merged: MediaInfo): void {
  if (!merged.hasVideo) {
    throw new MergeError("Merged output has no video stream.");
  }
  if (source.width !== merged.width || source.height !== merged.height) {
    throw new MergeError(
      `Merged video resolution ${merged.width}x${merged.height} differs from source ${source.width}x${source.height}.`,
    );
  }
  if (
    source.frameCount !== undefined &&
    merged.frameCount !== undefined &&
    source.frameCount !== merged.frameCount
  ) {
    throw new MergeError(`Merged video has ${merged.frameCount} frames, source has ${source.frameCount}.`);
  }
}

/**
 * Replaces the source video's audio with `audioPath`, copying the video
 * stream untouched. The output only appears at `outputPath` once it has been
 * verified against the source.
 */
export async function mergeAudioIntoVideo(options: MergeOptions): Promise<MediaInfo> {
  try {
    await ensureFfmpegAvailable(options.cwd);
  } catch (error) {
    throw new MergeError(errorMessage(error), { cause: error });
  }

  const video = await probeInput(options.videoPath, "Source video", options.cwd);
  const audio = await probeInput(options.audioPath, "Synthesized audio", options.cwd);

  if (!video.hasVideo) {
    throw new MergeError(`Source has no video stream: ${options.videoPath}`);
  }
  if (!audio.hasAudio) {
    throw new MergeError(`Synthesized audio has no audio stream: ${options.audioPath}`);
  }

  const tolerance = options.maxDurationDriftSec ?? DEFAULT_MAX_DURATION_DRIFT_SEC;
  const videoDurationSec = video.videoDurationSec ?? video.durationSec;
  const audioDurationSec = audio.audioDurationSec ?? audio.durationSec;
  const drift = Math.abs(videoDurationSec - audioDurationSec);
  if (drift > tolerance) {
    throw new MergeError(
      `Audio lasts ${audioDurationSec.toFixed(2)}s but video lasts ${videoDurationSec.toFixed(2)}s ` +
        `(drift ${drift.toFixed(2)}s exceeds ${tolerance}s).`,
    );
  }

  try {
    return await writeAtomically(options.outputPath, async (partialPath) => {
      await muxDubbedAudioWithVideo(options.videoPath, options.audioPath, partialPath, options.cwd);
      const merged = await probeMedia(partialPath, options.cwd);
      assertVideoPreserved(video, merged);
      return { ...merged, path: options.outputPath };
    });
  } catch (error) {
    if (error instanceof MergeError) {
      throw error;
    }
    throw new MergeError(`Merging audio into video failed: ${errorMessage(error)}`, { cause: error });
  }
}
