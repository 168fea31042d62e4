import type { StageName } from "./errors.js";
import type { NetworkPolicy } from "./util/retry.js";

export type ModelTier = "flash" | "pro";

export type TranslationEngineName = "argos" | "gemini" | "identity";

/**
 * `segments` voices each timed segment and places it at its start time;
 * `flat` voices the whole target transcript as one track.
 */
export type TimingMode = "segments" | "flat";

export interface CliOptions {
  input: string;
  output: string;
  outputJson?: string;
  sourceLanguage: string;
  targetLanguage: string;
  translator: TranslationEngineName;
  modelTier: ModelTier;
  timing: TimingMode;
  voice: string;
  /** Voice for the second speaker heard. Defaults to `voice`. */
  voiceB?: string;
  transcribeModel?: string;
  translateModel?: string;
  ttsModel?: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  maxDurationDriftSec: number;
  keepArtifacts: boolean;
}

/** Every file a single run reads or writes. Intermediates live under the run's artifacts dir. */
export interface RunPaths {
  input: string;
  extractedAudio: string;
  sourceTranscript: string;
  targetTranscript: string;
  synthesizedAudio: string;
  /** Directory for per-segment speech clips. */
  segmentClips: string;
  outputVideo: string;
  segmentsJson: string;
  sourceSrt: string;
  targetSrt: string;
}

export interface RuntimeConfig extends CliOptions {
  workDir: string;
  artifactsDir: string;
  paths: RunPaths;
  network: NetworkPolicy;
  googleApiKey?: string;
}

export interface MediaInfo {
  path: string;
  durationSec: number;
  hasAudio: boolean;
  hasVideo: boolean;
  audioCodec?: string;
  videoCodec?: string;
  audioDurationSec?: number;
  videoDurationSec?: number;
  width?: number;
  height?: number;
  frameCount?: number;
}

/** A timed piece of speech, in the source language or after translation. */
export interface Segment {
  speaker: string;
  startSec: number;
  endSec: number;
  text: string;
}

export interface SynthesisResult {
  durationSec: number;
  /** TTS requests made. */
  chunkCount: number;
  /** Clips placed on the track: one per voiced segment, or one in flat mode. */
  clipCount: number;
  spedUpCount: number;
}

export type StageTimings = Partial<Record<StageName, number>>;

export interface PipelineResult {
  mediaInfo: MediaInfo;
  segments: Segment[];
  sourceTranscript: string;
  targetTranscript: string;
  /** Translated segments. Empty in flat timing mode. */
  targetSegments: Segment[];
  synthesis: SynthesisResult;
  paths: RunPaths;
  timings: StageTimings;
  totalMs: number;
}
