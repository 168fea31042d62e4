import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { Type, type Part, type Schema } from "@google/genai";
import { AuthenticationError, TranscriptionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { withRetry, type NetworkPolicy } from "../util/retry.js";
import { isAuthenticationFailure, type GeminiPort } from "./client.js";
import type { Segment } from "../types.js";

const modelResponseSchema = z.object({
  segments: z.array(
    z.object({
      speaker: z.string().default("SPEAKER_01"),
      startSec: z.number().nonnegative(),
      endSec: z.number().nonnegative(),
      text: z.string(),
    }),
  ),
});

export const MAX_INLINE_AUDIO_BYTES = 20 * 1024 * 1024;

const GEMINI_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  required: ["segments"],
  properties: {
    segments: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        required: ["speaker", "startSec", "endSec", "text"],
        properties: {
          speaker: { type: Type.STRING },
          startSec: { type: Type.NUMBER },
          endSec: { type: Type.NUMBER },
          text: { type: Type.STRING },
        },
      },
    },
  },
};

function buildPrompt(sourceLanguage: string): string {
  return [
    "You are a speech transcription engine for a dubbing pipeline.",
    `Transcribe the spoken ${sourceLanguage} audio verbatim.`,
    "Return JSON only.",
    "Output shape:",
    '{"segments":[{"speaker":"SPEAKER_01","startSec":0.0,"endSec":2.3,"text":"..."}]}',
    "Rules:",
    "1) Keep startSec/endSec as numeric seconds.",
    "2) Keep chronological order.",
    "3) Use speaker labels consistently.",
    '4) If no speech is present, return {"segments":[]}. Never invent text.',
  ].join("\n");
}

export function unwrapJsonText(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("```") || !trimmed.endsWith("```")) {
    return trimmed;
  }

  const lines = trimmed.split("\n");
  if (lines.length <= 2) {
    return trimmed;
  }

  return lines.slice(1, -1).join("\n").trim();
}

function extractLikelyJson(raw: string): string {
  const firstBrace = raw.indexOf("{");
  const lastBrace = raw.lastIndexOf("}");
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    return raw.slice(firstBrace, lastBrace + 1);
  }
  return raw;
}

export function normalizeSegments(segments: Segment[]): Segment[] {
  return segments
    .map((segment) => ({
      ...segment,
      speaker: segment.speaker.trim() || "SPEAKER_01",
      endSec: Math.max(segment.endSec, segment.startSec),
      text: segment.text.trim(),
    }))
    .filter((segment) => segment.text.length > 0)
    .sort((a, b) => a.startSec - b.startSec);
}

export function detectMimeType(audioPath: string): string {
  const ext = path.extname(audioPath).toLowerCase();
  if (ext === ".mp3") {
    return "audio/mpeg";
  }
  if (ext === ".flac") {
    return "audio/flac";
  }
  if (ext === ".m4a") {
    return "audio/mp4";
  }
  if (ext === ".ogg" || ext === ".oga") {
    return "audio/ogg";
  }
  return "audio/wav";
}

async function buildAudioPart(params: {
  client: GeminiPort;
  audioPath: string;
  network: NetworkPolicy;
}): Promise<Part> {
  const stat = await fs.stat(params.audioPath);
  const mimeType = detectMimeType(params.audioPath);

  // Inline small media to save the upload round-trip.
  if (stat.size <= MAX_INLINE_AUDIO_BYTES) {
    const data = await fs.readFile(params.audioPath);
    return {
      inlineData: {
        data: data.toString("base64"),
        mimeType,
      },
    };
  }

  const upload = await withRetry(
    () => params.client.uploadFile({ file: params.audioPath, config: { mimeType } }),
    {
      maxRetries: params.network.maxRetries,
      backoffMs: params.network.backoffMs,
      shouldRetry: (error) => !isAuthenticationFailure(error),
    },
  );
  if (!upload.uri) {
    throw new TranscriptionError("File upload succeeded but did not return a file URI.");
  }

  return {
    fileData: {
      fileUri: upload.uri,
      mimeType: upload.mimeType ?? mimeType,
    },
  };
}

export function parseTranscriptionPayload(text: string): Segment[] {
  const jsonText = extractLikelyJson(unwrapJsonText(text));
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (error) {
    throw new TranscriptionError(
      `Gemini returned invalid JSON for transcription payload. Parse error: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const validated = modelResponseSchema.safeParse(parsed);
  if (!validated.success) {
    throw new TranscriptionError(`Gemini transcription payload has an unexpected shape: ${validated.error.message}`, {
      cause: validated.error,
    });
  }

  return normalizeSegments(validated.data.segments);
}

/**
 * Sends the audio to Gemini and returns the recognised segments, possibly
 * none. Authentication failures are not retried.
 */
export async function transcribeAudioSegments(params: {
  client: GeminiPort;
  audioPath: string;
  sourceLanguage: string;
  model: string;
  network: NetworkPolicy;
}): Promise<Segment[]> {
  try {
    const audioPart = await buildAudioPart(params);

    const response = await withRetry(
      () =>
        params.client.generateContent({
          model: params.model,
          contents: [audioPart, { text: buildPrompt(params.sourceLanguage) }],
          config: {
            responseMimeType: "application/json",
            responseSchema: GEMINI_RESPONSE_SCHEMA,
          },
        }),
      {
        maxRetries: params.network.maxRetries,
        backoffMs: params.network.backoffMs,
        shouldRetry: (error) => !isAuthenticationFailure(error),
        onRetry: (error, attempt, waitMs) => {
          logger.warn({ attempt, waitMs, err: errorMessage(error) }, "Retrying transcription request");
        },
      },
    );

    const text = (response.text ?? "").trim();
    if (!text) {
      return [];
    }

    return parseTranscriptionPayload(text);
  } catch (error) {
    if (error instanceof TranscriptionError) {
      throw error;
    }
    if (isAuthenticationFailure(error)) {
      throw new AuthenticationError(`Speech recognition rejected the API key: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    throw new TranscriptionError(`Speech recognition request failed: ${errorMessage(error)}`, { cause: error });
  }
}
