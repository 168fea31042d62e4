import { TranslationError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { writeTextFile } from "../output/write.js";
import { flattenSegments } from "./transcribe.js";
import type { TranslationEngine, TranslationRequest } from "../translation/types.js";
import type { Segment } from "../types.js";

export interface TranslateOptions {
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
  engine: TranslationEngine;
  outputPath: string;
}

export interface TranslateSegmentsOptions extends Omit<TranslateOptions, "text"> {
  segments: Segment[];
}

export interface TranslatedSegments {
  text: string;
  segments: Segment[];
}

async function runEngine(engine: TranslationEngine, request: TranslationRequest, label: string): Promise<string> {
  let translated: string;
  try {
    translated = await engine.translate(request);
  } catch (error) {
    if (error instanceof TranslationError) {
      throw error;
    }
    throw new TranslationError(`Translation with ${engine.name} failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!translated.trim()) {
    throw new TranslationError(
      `Translation ${request.sourceLanguage}->${request.targetLanguage} with ${engine.name} produced no output${label}.`,
    );
  }
  return translated;
}

function logEngine(options: Omit<TranslateOptions, "text" | "outputPath">, units: number): void {
  logger.info(
    {
      engine: options.engine.name,
      remote: options.engine.remote,
      from: options.sourceLanguage,
      to: options.targetLanguage,
      units,
    },
    options.engine.remote ? "Translating through a remote service" : "Translating locally",
  );
}

/**
 * Translates the source transcript and writes it to `outputPath`. When source
 * and target language match the text passes through unchanged.
 */
export async function translateTranscript(options: TranslateOptions): Promise<string> {
  let translated: string;

  if (options.sourceLanguage === options.targetLanguage) {
    translated = options.text;
  } else {
    logEngine(options, 1);
    translated = await runEngine(
      options.engine,
      { text: options.text, sourceLanguage: options.sourceLanguage, targetLanguage: options.targetLanguage },
      "",
    );
  }

  if (!translated.trim()) {
    throw new TranslationError(
      `Translation ${options.sourceLanguage}->${options.targetLanguage} with ${options.engine.name} produced no output.`,
    );
  }

  await writeTextFile(options.outputPath, translated);
  return translated;
}

/**
 * Translates each segment on its own, keeping speaker and timing. Blank
 * segments are dropped. The flat target transcript is the translated texts
 * joined by single spaces.
 */
export async function translateSegments(options: TranslateSegmentsOptions): Promise<TranslatedSegments> {
  const spoken = options.segments.filter((segment) => segment.text.trim().length > 0);
  let segments: Segment[];

  if (options.sourceLanguage === options.targetLanguage) {
    segments = spoken;
  } else {
    logEngine(options, spoken.length);
    segments = [];
    for (let index = 0; index < spoken.length; index += 1) {
      const segment = spoken[index];
      const text = await runEngine(
        options.engine,
        { text: segment.text, sourceLanguage: options.sourceLanguage, targetLanguage: options.targetLanguage },
        ` for segment ${index + 1}`,
      );
      segments.push({ ...segment, text: text.trim() });
    }
  }

  const text = flattenSegments(segments);
  if (!text) {
    throw new TranslationError("There are no segments to translate.");
  }

  await writeTextFile(options.outputPath, text);
  return { text, segments };
}
