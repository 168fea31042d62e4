import path from "node:path";
import { z } from "zod";
import type { CliOptions, ModelTier, RunPaths, RuntimeConfig } from "./types.js";

export const DEFAULT_INPUT_PATH = "input/sample.mp4";
export const DEFAULT_OUTPUT_PATH = "output/dubbed.mp4";

const languageCode = z
  .string()
  .trim()
  .regex(/^[a-z]{2,3}(-[A-Za-z0-9]+)*$/, "Expected a language code such as en, hi or pt-BR");

const cliOptionsSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
  outputJson: z.string().min(1).optional(),
  sourceLanguage: languageCode,
  targetLanguage: languageCode,
  translator: z.enum(["argos", "gemini", "identity"]),
  modelTier: z.enum(["flash", "pro"]),
  timing: z.enum(["segments", "flat"]).default("segments"),
  voice: z.string().min(1),
  voiceB: z.string().min(1).optional(),
  transcribeModel: z.string().min(1).optional(),
  translateModel: z.string().min(1).optional(),
  ttsModel: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive(),
  maxRetries: z.coerce.number().int().nonnegative(),
  backoffMs: z.coerce.number().int().nonnegative(),
  maxDurationDriftSec: z.coerce.number().nonnegative(),
  keepArtifacts: z.boolean(),
});

export function parseCliOptions(raw: unknown): CliOptions {
  return cliOptionsSchema.parse(raw);
}

function defaultOutputJsonPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}_segments.json`);
}

function resolveRunPaths(options: CliOptions, workDir: string, artifactsDir: string): RunPaths {
  const outputVideo = path.resolve(workDir, options.output);
  const outputParsed = path.parse(outputVideo);

  return {
    input: path.resolve(workDir, options.input),
    extractedAudio: path.join(artifactsDir, "audio", "source.wav"),
    sourceTranscript: path.join(artifactsDir, "text", `source.${options.sourceLanguage}.txt`),
    targetTranscript: path.join(artifactsDir, "text", `target.${options.targetLanguage}.txt`),
    synthesizedAudio: path.join(artifactsDir, "audio", `dubbed.${options.targetLanguage}.mp3`),
    segmentClips: path.join(artifactsDir, "audio", "segments"),
    outputVideo,
    segmentsJson: path.resolve(workDir, options.outputJson ?? defaultOutputJsonPath(outputVideo)),
    sourceSrt: path.join(outputParsed.dir, `${outputParsed.name}.${options.sourceLanguage}.srt`),
    targetSrt: path.join(outputParsed.dir, `${outputParsed.name}.${options.targetLanguage}.srt`),
  };
}

/**
 * Resolves every path a run touches. Missing inputs and credentials are left
 * for the stages to report, so the failure names the stage that needed them.
 */
export function resolveRuntimeConfig(
  options: CliOptions,
  workDir: string,
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date(),
): RuntimeConfig {
  const artifactsDir = path.resolve(workDir, "artifacts", now.toISOString().replaceAll(":", "-"));
  const googleApiKey = env.GOOGLE_API_KEY?.trim() || undefined;

  return {
    ...options,
    workDir,
    artifactsDir,
    paths: resolveRunPaths(options, workDir, artifactsDir),
    network: {
      timeoutMs: options.timeoutMs,
      maxRetries: options.maxRetries,
      backoffMs: options.backoffMs,
    },
    googleApiKey,
  };
}

export function defaultTranscribeModel(tier: ModelTier): string {
  return tier === "pro" ? "gemini-2.5-pro" : "gemini-2.5-flash";
}

export function defaultTranslateModel(tier: ModelTier): string {
  return defaultTranscribeModel(tier);
}

export function defaultTtsModel(tier: ModelTier): string {
  return tier === "pro" ? "gemini-2.5-pro-preview-tts" : "gemini-2.5-flash-preview-tts";
}
