#!/usr/bin/env node

import "dotenv/config";
import process from "node:process";
import { Command } from "commander";
import { ZodError } from "zod";
import { DEFAULT_INPUT_PATH, DEFAULT_OUTPUT_PATH, parseCliOptions, resolveRuntimeConfig } from "./config.js";
import { PipelineStageError, errorMessage } from "./errors.js";
import { runPipeline } from "./pipeline.js";
import { logger } from "./logger.js";
import { DEFAULT_MAX_DURATION_DRIFT_SEC } from "./stages/merge.js";
import { DEFAULT_NETWORK_POLICY } from "./util/retry.js";

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("redub")
    .description("Dub a video: extract audio, transcribe, translate, synthesize speech and remux")
    .option("-i, --input <path>", "Input video file path", DEFAULT_INPUT_PATH)
    .option("-o, --output <path>", "Output video file path", DEFAULT_OUTPUT_PATH)
    .option("--output-json <path>", "Segments JSON sidecar path")
    .option("--source-language <code>", "Source language code, e.g. en", "en")
    .option("--target-language <code>", "Target language code, e.g. hi", "hi")
    .option("--translator <engine>", "Translation engine: argos, gemini or identity", "argos")
    .option("--model-tier <tier>", "Gemini model tier: flash or pro", "flash")
    .option("--timing <mode>", "segments: voice each timed segment in place; flat: one continuous track", "segments")
    .option("--voice <voice>", "Gemini TTS voice for the first speaker", "Kore")
    .option("--voice-b <voice>", "Gemini TTS voice for the second speaker")
    .option("--transcribe-model <model>", "Override transcription model")
    .option("--translate-model <model>", "Override Gemini translation model")
    .option("--tts-model <model>", "Override TTS model")
    .option("--timeout-ms <ms>", "Per-request network timeout", String(DEFAULT_NETWORK_POLICY.timeoutMs))
    .option("--max-retries <n>", "Retries per network request", String(DEFAULT_NETWORK_POLICY.maxRetries))
    .option("--backoff-ms <ms>", "Initial retry backoff, doubled per attempt", String(DEFAULT_NETWORK_POLICY.backoffMs))
    .option(
      "--max-duration-drift <sec>",
      "Largest allowed difference between video and dubbed audio duration",
      String(DEFAULT_MAX_DURATION_DRIFT_SEC),
    )
    .option("--keep-artifacts", "Do not remove intermediate files after the run", false)
    .addHelpText(
      "after",
      [
        "",
        "Example:",
        "  redub --input ./talk.mp4 --source-language en --target-language es --output ./talk_es.mp4",
      ].join("\n"),
    );

  program.parse(process.argv);

  const raw = program.opts();
  const parsed = parseCliOptions({
    input: raw.input,
    output: raw.output,
    outputJson: raw.outputJson,
    sourceLanguage: raw.sourceLanguage,
    targetLanguage: raw.targetLanguage,
    translator: raw.translator,
    modelTier: raw.modelTier,
    timing: raw.timing,
    voice: raw.voice,
    voiceB: raw.voiceB,
    transcribeModel: raw.transcribeModel,
    translateModel: raw.translateModel,
    ttsModel: raw.ttsModel,
    timeoutMs: raw.timeoutMs,
    maxRetries: raw.maxRetries,
    backoffMs: raw.backoffMs,
    maxDurationDriftSec: raw.maxDurationDrift,
    keepArtifacts: Boolean(raw.keepArtifacts),
  });

  const runtimeConfig = resolveRuntimeConfig(parsed, process.cwd());

  logger.info(
    {
      input: runtimeConfig.paths.input,
      output: runtimeConfig.paths.outputVideo,
      outputJson: runtimeConfig.paths.segmentsJson,
      artifactsDir: runtimeConfig.artifactsDir,
      translator: runtimeConfig.translator,
      timing: runtimeConfig.timing,
    },
    "Resolved runtime configuration",
  );

  const result = await runPipeline(runtimeConfig);

  logger.info(
    {
      output: result.paths.outputVideo,
      outputJson: result.paths.segmentsJson,
      segments: result.segments.length,
      synthesis: result.synthesis,
      timings: result.timings,
      totalMs: result.totalMs,
    },
    "Done",
  );
}

main().catch((error: unknown) => {
  if (error instanceof PipelineStageError) {
    logger.error({ stage: error.stage, errorType: error.name, err: error.message }, `Pipeline failed at ${error.stage}`);
  } else if (error instanceof ZodError) {
    logger.error({ issues: error.issues }, "Invalid options");
  } else {
    logger.error({ err: errorMessage(error) }, "Pipeline failed");
  }
  process.exitCode = 1;
});
