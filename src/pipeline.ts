import fs from "node:fs/promises";
import { defaultTranscribeModel, defaultTranslateModel, defaultTtsModel } from "./config.js";
import { errorMessage, toStageError, type StageName } from "./errors.js";
import { logger } from "./logger.js";
import { writeSegmentsJson, writeSrt } from "./output/write.js";
import { extractAudio } from "./stages/extract.js";
import { mergeAudioIntoVideo } from "./stages/merge.js";
import { synthesizeSpeech } from "./stages/synthesize.js";
import { transcribe } from "./stages/transcribe.js";
import { translateSegments, translateTranscript, type TranslatedSegments } from "./stages/translate.js";
import { createTranslationEngine } from "./translation/index.js";
import type { PipelineResult, RuntimeConfig, StageTimings } from "./types.js";

async function runStage<T>(stage: StageName, timings: StageTimings, operation: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  logger.info({ stage }, "Stage started");

  try {
    const result = await operation();
    timings[stage] = Date.now() - startedAt;
    logger.info({ stage, ms: timings[stage] }, "Stage complete");
    return result;
  } catch (error) {
    const stageError = toStageError(stage, error);
    logger.error({ stage, errorType: stageError.name, err: errorMessage(stageError) }, "Stage failed");
    throw stageError;
  }
}

/**
 * Runs extract, transcribe, translate, synthesize and merge in order. The
 * first failure aborts the run and surfaces as a `PipelineStageError` naming
 * the stage.
 */
export async function runPipeline(config: RuntimeConfig): Promise<PipelineResult> {
  const { paths } = config;
  const timings: StageTimings = {};
  const startedAt = Date.now();

  logger.info({ input: paths.input, output: paths.outputVideo }, "Starting dubbing pipeline");

  await fs.mkdir(config.artifactsDir, { recursive: true });
  try {
    const mediaInfo = await runStage("extract", timings, () =>
      extractAudio({ inputPath: paths.input, outputPath: paths.extractedAudio, cwd: config.workDir }),
    );
    logger.info(
      {
        durationSec: mediaInfo.durationSec,
        audioCodec: mediaInfo.audioCodec,
        videoCodec: mediaInfo.videoCodec,
      },
      "Input media probed",
    );

    const transcript = await runStage("transcribe", timings, async () => {
      const result = await transcribe({
        apiKey: config.googleApiKey,
        audioPath: paths.extractedAudio,
        outputPath: paths.sourceTranscript,
        sourceLanguage: config.sourceLanguage,
        model: config.transcribeModel ?? defaultTranscribeModel(config.modelTier),
        network: config.network,
      });

      await writeSegmentsJson({
        outputPath: paths.segmentsJson,
        sourceLanguage: config.sourceLanguage,
        targetLanguage: config.targetLanguage,
        inputPath: paths.input,
        segments: result.segments,
      });
      await writeSrt({ outputPath: paths.sourceSrt, segments: result.segments });
      return result;
    });
    logger.info({ segmentCount: transcript.segments.length, chars: transcript.text.length }, "Transcript ready");

    const translation = await runStage("translate", timings, async (): Promise<TranslatedSegments> => {
      const engine = createTranslationEngine({
        engine: config.translator,
        cwd: config.workDir,
        apiKey: config.googleApiKey,
        model: config.translateModel ?? defaultTranslateModel(config.modelTier),
        network: config.network,
      });
      const languages = {
        sourceLanguage: config.sourceLanguage,
        targetLanguage: config.targetLanguage,
        outputPath: paths.targetTranscript,
        engine,
      };

      if (config.timing === "flat") {
        const text = await translateTranscript({ ...languages, text: transcript.text });
        return { text, segments: [] };
      }

      const translated = await translateSegments({ ...languages, segments: transcript.segments });
      await writeSrt({ outputPath: paths.targetSrt, segments: translated.segments });
      return translated;
    });

    const synthesis = await runStage("synthesize", timings, () =>
      synthesizeSpeech({
        apiKey: config.googleApiKey,
        text: translation.text,
        segments: config.timing === "segments" ? translation.segments : undefined,
        clipDir: paths.segmentClips,
        outputPath: paths.synthesizedAudio,
        voice: config.voice,
        voiceB: config.voiceB,
        model: config.ttsModel ?? defaultTtsModel(config.modelTier),
        network: config.network,
        cwd: config.workDir,
        padToSec: mediaInfo.videoDurationSec ?? mediaInfo.durationSec,
      }),
    );
    logger.info({ ...synthesis, timing: config.timing }, "Dubbed speech ready");

    await runStage("merge", timings, () =>
      mergeAudioIntoVideo({
        videoPath: paths.input,
        audioPath: paths.synthesizedAudio,
        outputPath: paths.outputVideo,
        cwd: config.workDir,
        maxDurationDriftSec: config.maxDurationDriftSec,
      }),
    );

    const totalMs = Date.now() - startedAt;
    logger.info({ outputPath: paths.outputVideo, totalMs }, "Pipeline complete");

    return {
      mediaInfo,
      segments: transcript.segments,
      sourceTranscript: transcript.text,
      targetTranscript: translation.text,
      targetSegments: translation.segments,
      synthesis,
      paths,
      timings,
      totalMs,
    };
  } finally {
    if (!config.keepArtifacts) {
      await fs.rm(config.artifactsDir, { recursive: true, force: true });
    }
  }
}
