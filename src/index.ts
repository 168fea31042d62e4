export { runPipeline } from "./pipeline.js";
export { parseCliOptions, resolveRuntimeConfig } from "./config.js";
export { extractAudio } from "./stages/extract.js";
export { transcribe, flattenSegments } from "./stages/transcribe.js";
export { translateSegments, translateTranscript } from "./stages/translate.js";
export { synthesizeSpeech } from "./stages/synthesize.js";
export { mergeAudioIntoVideo } from "./stages/merge.js";
export { createTranslationEngine, identityTranslationEngine } from "./translation/index.js";
export {
  PipelineStageError,
  ExtractionError,
  AuthenticationError,
  TranscriptionError,
  EmptyResultError,
  TranslationError,
  SynthesisError,
  MergeError,
  STAGE_ORDER,
} from "./errors.js";
export type { StageName } from "./errors.js";
export type { TranslationEngine, TranslationRequest } from "./translation/types.js";
export type {
  CliOptions,
  RuntimeConfig,
  RunPaths,
  MediaInfo,
  Segment,
  PipelineResult,
  StageTimings,
  SynthesisResult,
  TimingMode,
  TranslationEngineName,
} from "./types.js";
