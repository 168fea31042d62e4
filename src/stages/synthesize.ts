import fs from "node:fs/promises";
import path from "node:path";
import { composeTimeline, speedUpFactor, type TimelineClip } from "../audio/timeline.js";
import { padSamplesToDuration, readWavPcm16Mono, writeWavPcm16Mono } from "../audio/wav.js";
import { SynthesisError, errorMessage } from "../errors.js";
import { createGeminiClient, isAuthenticationFailure, type GeminiPort } from "../gemini/client.js";
import { DEFAULT_TTS_SAMPLE_RATE, buildSpeakerVoiceMap, synthesizeText } from "../gemini/tts.js";
import { logger } from "../logger.js";
import { changeTempo, convertWavToMp3 } from "../media/ffmpeg.js";
import { writeAtomically } from "../util/atomic.js";
import type { NetworkPolicy } from "../util/retry.js";
import type { Segment, SynthesisResult } from "../types.js";

export interface SynthesizeOptions {
  apiKey?: string;
  text: string;
  outputPath: string;
  voice: string;
  voiceB?: string;
  model: string;
  network: NetworkPolicy;
  cwd: string;
  /** The track lasts at least this long; trailing silence fills the gap. */
  padToSec?: number;
  /**
   * Timed target-language segments. When given, each is voiced on its own,
   * sped up if it overruns its slot, and placed at its start time.
   */
  segments?: Segment[];
  /** Where per-segment clips are written. Required with `segments`. */
  clipDir?: string;
}

interface Track {
  sampleRate: number;
  samples: Int16Array;
  chunkCount: number;
  clipCount: number;
  spedUpCount: number;
}

async function synthesizeFlat(client: GeminiPort, options: SynthesizeOptions): Promise<Track> {
  const audio = await synthesizeText({
    client,
    model: options.model,
    text: options.text,
    voiceName: options.voice,
    network: options.network,
  });

  return {
    sampleRate: audio.sampleRate,
    samples: padSamplesToDuration(audio.samples, audio.sampleRate, options.padToSec ?? 0),
    chunkCount: audio.chunkCount,
    clipCount: 1,
    spedUpCount: 0,
  };
}

async function synthesizeTimed(
  client: GeminiPort,
  options: SynthesizeOptions,
  segments: Segment[],
  clipDir: string,
): Promise<Track> {
  const voices = buildSpeakerVoiceMap(
    segments.map((segment) => segment.speaker),
    options.voice,
    options.voiceB,
  );
  await fs.mkdir(clipDir, { recursive: true });

  const clips: TimelineClip[] = [];
  let chunkCount = 0;
  let spedUpCount = 0;

  for (let index = 0; index < segments.length; index += 1) {
    const segment = segments[index];
    const audio = await synthesizeText({
      client,
      model: options.model,
      text: segment.text,
      voiceName: voices.get(segment.speaker) ?? options.voice,
      network: options.network,
    });
    chunkCount += audio.chunkCount;

    let clip: TimelineClip = { startSec: segment.startSec, sampleRate: audio.sampleRate, samples: audio.samples };
    const clipSec = audio.samples.length / audio.sampleRate;
    const factor = speedUpFactor(clipSec, segment.endSec - segment.startSec);

    if (factor > 1) {
      const name = String(index).padStart(5, "0");
      const clipPath = path.join(clipDir, `${name}.wav`);
      const fastPath = path.join(clipDir, `${name}.fast.wav`);
      await writeWavPcm16Mono(clipPath, audio.sampleRate, audio.samples);
      await changeTempo(clipPath, fastPath, factor, options.cwd);
      const fast = await readWavPcm16Mono(fastPath);
      clip = { startSec: segment.startSec, sampleRate: fast.sampleRate, samples: fast.samples };
      spedUpCount += 1;
      logger.debug({ segment: index, clipSec, factor }, "Sped up segment to fit its slot");
    }

    clips.push(clip);
  }

  const sampleRate = clips[0]?.sampleRate ?? DEFAULT_TTS_SAMPLE_RATE;
  return {
    sampleRate,
    samples: composeTimeline({ clips, sampleRate, durationSec: options.padToSec }),
    chunkCount,
    clipCount: clips.length,
    spedUpCount,
  };
}

async function writeTrack(options: SynthesizeOptions, track: Track): Promise<void> {
  if (path.extname(options.outputPath).toLowerCase() === ".wav") {
    await writeAtomically(options.outputPath, (partialPath) =>
      writeWavPcm16Mono(partialPath, track.sampleRate, track.samples),
    );
    return;
  }

  const parsed = path.parse(options.outputPath);
  const wavPath = path.join(parsed.dir, `${parsed.name}.wav`);
  await fs.mkdir(parsed.dir, { recursive: true });
  await writeWavPcm16Mono(wavPath, track.sampleRate, track.samples);
  await writeAtomically(options.outputPath, (partialPath) => convertWavToMp3(wavPath, partialPath, options.cwd));
}

export async function synthesizeSpeech(options: SynthesizeOptions): Promise<SynthesisResult> {
  const spoken = options.segments?.filter((segment) => segment.text.trim().length > 0);
  if (spoken ? spoken.length === 0 : !options.text.trim()) {
    throw new SynthesisError("Cannot synthesize speech from empty text.");
  }
  if (spoken && !options.clipDir) {
    throw new SynthesisError("A clip directory is required to synthesize timed segments.");
  }

  const apiKey = options.apiKey?.trim();
  if (!apiKey) {
    throw new SynthesisError("GOOGLE_API_KEY is required for speech synthesis.");
  }

  try {
    const client = createGeminiClient(apiKey, options.network.timeoutMs);
    const track =
      spoken && options.clipDir
        ? await synthesizeTimed(client, options, spoken, options.clipDir)
        : await synthesizeFlat(client, options);

    await writeTrack(options, track);

    return {
      durationSec: track.samples.length / track.sampleRate,
      chunkCount: track.chunkCount,
      clipCount: track.clipCount,
      spedUpCount: track.spedUpCount,
    };
  } catch (error) {
    if (isAuthenticationFailure(error)) {
      throw new SynthesisError(`Speech synthesis rejected the API key: ${errorMessage(error)}`, { cause: error });
    }
    throw new SynthesisError(`Speech synthesis failed: ${errorMessage(error)}`, { cause: error });
  }
}
