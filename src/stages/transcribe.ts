import { AuthenticationError, EmptyResultError, TranscriptionError } from "../errors.js";
import { createGeminiClient } from "../gemini/client.js";
import { transcribeAudioSegments } from "../gemini/transcribe.js";
import { writeTextFile } from "../output/write.js";
import { fileExists } from "../util/atomic.js";
import type { NetworkPolicy } from "../util/retry.js";
import type { Segment } from "../types.js";

export interface TranscribeOptions {
  apiKey?: string;
  audioPath: string;
  outputPath: string;
  sourceLanguage: string;
  model: string;
  network: NetworkPolicy;
}

export interface Transcript {
  text: string;
  segments: Segment[];
}

export function flattenSegments(segments: Segment[]): string {
  return segments
    .map((segment) => segment.text.trim())
    .filter((text) => text.length > 0)
    .join(" ");
}

export async function transcribe(options: TranscribeOptions): Promise<Transcript> {
  const apiKey = options.apiKey?.trim();
  if (!apiKey) {
    throw new AuthenticationError("GOOGLE_API_KEY is not set. Add it to your environment or .env file.");
  }

  if (!(await fileExists(options.audioPath))) {
    throw new TranscriptionError(`Audio file not found: ${options.audioPath}`);
  }

  const segments = await transcribeAudioSegments({
    client: createGeminiClient(apiKey, options.network.timeoutMs),
    audioPath: options.audioPath,
    sourceLanguage: options.sourceLanguage,
    model: options.model,
    network: options.network,
  });

  const text = flattenSegments(segments);
  if (!text) {
    throw new EmptyResultError(`No speech was recognised in ${options.audioPath}`);
  }

  await writeTextFile(options.outputPath, text);
  return { text, segments };
}
