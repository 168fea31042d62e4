import { ExtractionError, errorMessage } from "../errors.js";
import { ensureFfmpegAvailable, extractAudioToWav, probeMedia } from "../media/ffmpeg.js";
import { fileExists, writeAtomically } from "../util/atomic.js";
import type { MediaInfo } from "../types.js";

export interface ExtractAudioOptions {
  inputPath: string;
  outputPath: string;
  cwd: string;
}

/**
 * Demuxes the source's audio stream into a 16 kHz mono PCM WAV at
 * `outputPath`. Returns the probed source media so later stages can reuse it.
 */
export async function extractAudio(options: ExtractAudioOptions): Promise<MediaInfo> {
  if (!(await fileExists(options.inputPath))) {
    throw new ExtractionError(`Source video not found: ${options.inputPath}`);
  }

  try {
    await ensureFfmpegAvailable(options.cwd);
  } catch (error) {
    throw new ExtractionError(errorMessage(error), { cause: error });
  }

  let mediaInfo: MediaInfo;
  try {
    mediaInfo = await probeMedia(options.inputPath, options.cwd);
  } catch (error) {
    throw new ExtractionError(`Could not read media streams from ${options.inputPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!mediaInfo.hasAudio) {
    throw new ExtractionError(`Source video has no audio stream: ${options.inputPath}`);
  }

  try {
    await writeAtomically(options.outputPath, (partialPath) =>
      extractAudioToWav(options.inputPath, partialPath, options.cwd),
    );
  } catch (error) {
    throw new ExtractionError(`Audio extraction failed: ${errorMessage(error)}`, { cause: error });
  }

  return mediaInfo;
}
