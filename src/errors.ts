export type StageName = "extract" | "transcribe" | "translate" | "synthesize" | "merge";

export const STAGE_ORDER: readonly StageName[] = ["extract", "transcribe", "translate", "synthesize", "merge"];

/**
 * Base class for every failure that aborts a pipeline run. `stage` names the
 * stage that failed so the driver and CLI can report it without inspecting
 * the concrete subclass.
 */
export class PipelineStageError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class ExtractionError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extract", message, options);
  }
}

export class AuthenticationError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transcribe", message, options);
  }
}

export class TranscriptionError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transcribe", message, options);
  }
}

export class EmptyResultError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transcribe", message, options);
  }
}

export class TranslationError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("translate", message, options);
  }
}

export class SynthesisError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("synthesize", message, options);
  }
}

export class MergeError extends PipelineStageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("merge", message, options);
  }
}

const stageErrorFactories: Record<StageName, (message: string, cause: unknown) => PipelineStageError> = {
  extract: (message, cause) => new ExtractionError(message, { cause }),
  transcribe: (message, cause) => new TranscriptionError(message, { cause }),
  translate: (message, cause) => new TranslationError(message, { cause }),
  synthesize: (message, cause) => new SynthesisError(message, { cause }),
  merge: (message, cause) => new MergeError(message, { cause }),
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toStageError(stage: StageName, error: unknown): PipelineStageError {
  if (error instanceof PipelineStageError) {
    return error;
  }
  return stageErrorFactories[stage](errorMessage(error), error);
}
