import type { GenerateContentResponse } from "@google/genai";
import { concatSamples, parseWavPcm16Mono, pcm16ToSamples } from "../audio/wav.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { withRetry, type NetworkPolicy } from "../util/retry.js";
import { isAuthenticationFailure, type GeminiPort } from "./client.js";

export const DEFAULT_TTS_SAMPLE_RATE = 24000;
export const MAX_TTS_CHUNK_CHARS = 1500;

export interface SynthesizedAudio {
  sampleRate: number;
  samples: Int16Array;
  chunkCount: number;
}

function parseSampleRate(mimeType?: string): number {
  if (!mimeType) {
    return DEFAULT_TTS_SAMPLE_RATE;
  }

  const match = /rate=(\d+)/i.exec(mimeType);
  if (!match) {
    return DEFAULT_TTS_SAMPLE_RATE;
  }

  return Number(match[1]);
}

function extractInlineAudioData(response: GenerateContentResponse): { data: string; mimeType?: string } {
  const candidates = response.candidates;
  if (!candidates || candidates.length === 0) {
    throw new Error("No candidates returned from Gemini TTS.");
  }

  const parts = candidates[0].content?.parts ?? [];
  for (const part of parts) {
    if (part.inlineData?.data) {
      return { data: part.inlineData.data, mimeType: part.inlineData.mimeType };
    }
  }

  throw new Error("Gemini TTS response did not include audio inline data.");
}

const SPACED_TERMINATORS = new Set([".", "!", "?"]);
const CLOSING_TERMINATORS = new Set(["।", "。", "！", "？"]);

function isTerminator(char: string): boolean {
  return SPACED_TERMINATORS.has(char) || CLOSING_TERMINATORS.has(char);
}

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

/**
 * Cuts text into contiguous sentence slices, each keeping its trailing
 * whitespace, so the slices concatenate back to the input. `.`, `!` and `?`
 * only end a sentence before whitespace or the end of the text, which keeps
 * "3.5" and "example.com" whole.
 */
function splitSentences(text: string): string[] {
  const pieces: string[] = [];
  let start = 0;
  let index = 0;

  while (index < text.length) {
    if (!isTerminator(text[index])) {
      index += 1;
      continue;
    }

    let end = index;
    let closing = false;
    while (end < text.length && isTerminator(text[end])) {
      closing ||= CLOSING_TERMINATORS.has(text[end]);
      end += 1;
    }

    if (!closing && end < text.length && !isWhitespace(text[end])) {
      index = end;
      continue;
    }

    while (end < text.length && isWhitespace(text[end])) {
      end += 1;
    }
    pieces.push(text.slice(start, end));
    start = end;
    index = end;
  }

  if (start < text.length) {
    pieces.push(text.slice(start));
  }
  return pieces;
}

function splitOversized(piece: string, maxChars: number): string[] {
  const words = piece.match(/\S+\s*/g) ?? [];
  return words.flatMap((word) => {
    const bare = word.trim();
    if (bare.length <= maxChars) {
      return [word];
    }
    const slices: string[] = [];
    for (let offset = 0; offset < bare.length; offset += maxChars) {
      slices.push(bare.slice(offset, offset + maxChars));
    }
    return slices;
  });
}

function packPieces(pieces: string[], maxChars: number): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const piece of pieces) {
    if ((current + piece).trim().length <= maxChars) {
      current += piece;
      continue;
    }
    if (current.trim()) {
      chunks.push(current.trim());
    }
    current = piece;
  }

  if (current.trim()) {
    chunks.push(current.trim());
  }
  return chunks;
}

/**
 * Splits text into request-sized chunks on sentence boundaries. Each chunk is
 * a slice of the input with only its outer whitespace trimmed; text that fits
 * in one request is returned as a single chunk.
 */
export function splitIntoSpeechChunks(text: string, maxChars = MAX_TTS_CHUNK_CHARS): string[] {
  const trimmed = text.trim();
  if (!/[\p{L}\p{N}]/u.test(trimmed)) {
    return [];
  }
  if (trimmed.length <= maxChars) {
    return [trimmed];
  }

  const pieces = splitSentences(trimmed).flatMap((piece) =>
    piece.trim().length > maxChars ? splitOversized(piece, maxChars) : [piece],
  );
  return packPieces(pieces, maxChars);
}

/**
 * Assigns `voiceA` to the first speaker heard and `voiceB` to the second.
 * Any further speakers fall back to `voiceA`.
 */
export function buildSpeakerVoiceMap(speakers: string[], voiceA: string, voiceB?: string): Map<string, string> {
  const map = new Map<string, string>();
  const orderedSpeakers = [...new Set(speakers)];

  orderedSpeakers.forEach((speaker, index) => {
    map.set(speaker, index === 1 ? (voiceB ?? voiceA) : voiceA);
  });

  return map;
}

export async function synthesizeText(params: {
  client: GeminiPort;
  model: string;
  text: string;
  voiceName: string;
  network: NetworkPolicy;
}): Promise<SynthesizedAudio> {
  const chunks = splitIntoSpeechChunks(params.text);
  if (chunks.length === 0) {
    throw new Error("Nothing to synthesize: text has no speakable content.");
  }

  const buffers: Int16Array[] = [];
  let sampleRate: number | undefined;

  for (let index = 0; index < chunks.length; index += 1) {
    const response = await withRetry(
      () =>
        params.client.generateContent({
          model: params.model,
          contents: [{ text: chunks[index] }],
          config: {
            responseModalities: ["AUDIO"],
            speechConfig: {
              voiceConfig: {
                prebuiltVoiceConfig: {
                  voiceName: params.voiceName,
                },
              },
            },
          },
        }),
      {
        maxRetries: params.network.maxRetries,
        backoffMs: params.network.backoffMs,
        shouldRetry: (error) => !isAuthenticationFailure(error),
        onRetry: (error, attempt, waitMs) => {
          logger.warn({ chunk: index, attempt, waitMs, err: errorMessage(error) }, "Retrying TTS request");
        },
      },
    );

    const audioPart = extractInlineAudioData(response);
    const audioBuffer = Buffer.from(audioPart.data, "base64");
    const mimeType = audioPart.mimeType?.toLowerCase() ?? "audio/pcm";

    const decoded = mimeType.includes("audio/wav")
      ? parseWavPcm16Mono(audioBuffer, `tts chunk ${index}`)
      : { sampleRate: parseSampleRate(audioPart.mimeType), samples: pcm16ToSamples(audioBuffer) };

    if (sampleRate !== undefined && decoded.sampleRate !== sampleRate) {
      throw new Error(`TTS chunk ${index} has sample rate ${decoded.sampleRate}, expected ${sampleRate}.`);
    }
    sampleRate = decoded.sampleRate;
    buffers.push(decoded.samples);

    logger.debug({ chunk: index, samples: decoded.samples.length }, "TTS chunk synthesized");
  }

  return {
    sampleRate: sampleRate ?? DEFAULT_TTS_SAMPLE_RATE,
    samples: concatSamples(buffers),
    chunkCount: chunks.length,
  };
}
