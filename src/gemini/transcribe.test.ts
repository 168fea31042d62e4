import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ApiError, GenerateContentResponse } from "@google/genai";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { AuthenticationError, TranscriptionError } from "../errors.js";
import { createFakeGemini, textResponse } from "../testing/gemini.js";
import { parseTranscriptionPayload, transcribeAudioSegments } from "./transcribe.js";

const network = { timeoutMs: 1000, maxRetries: 1, backoffMs: 0 };

let dir: string;
let audioPath: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "redub-asr-"));
  audioPath = path.join(dir, "source.wav");
  await fs.writeFile(audioPath, "RIFF-test-audio");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("parseTranscriptionPayload", () => {
  it("unwraps fenced JSON and orders segments by start time", () => {
    const payload = [
      "```json",
      JSON.stringify({
        segments: [
          { speaker: "SPEAKER_02", startSec: 1.5, endSec: 2, text: " world " },
          { speaker: " ", startSec: 0, endSec: 1, text: "Hello" },
        ],
      }),
      "```",
    ].join("\n");

    expect(parseTranscriptionPayload(payload)).toEqual([
      { speaker: "SPEAKER_01", startSec: 0, endSec: 1, text: "Hello" },
      { speaker: "SPEAKER_02", startSec: 1.5, endSec: 2, text: "world" },
    ]);
  });

  it("drops segments without text", () => {
    const payload = JSON.stringify({ segments: [{ speaker: "SPEAKER_01", startSec: 0, endSec: 2, text: "   " }] });

    expect(parseTranscriptionPayload(payload)).toEqual([]);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseTranscriptionPayload("{not json}")).toThrow(TranscriptionError);
  });

  it("rejects payloads without a segments array", () => {
    expect(() => parseTranscriptionPayload('{"text":"hello"}')).toThrow(TranscriptionError);
  });
});

describe("transcribeAudioSegments", () => {
  it("sends small audio inline with the transcription prompt", async () => {
    const fake = createFakeGemini(
      textResponse(JSON.stringify({ segments: [{ speaker: "SPEAKER_01", startSec: 0, endSec: 1.2, text: "Hi." }] })),
    );

    const segments = await transcribeAudioSegments({
      client: fake.port,
      audioPath,
      sourceLanguage: "en",
      model: "gemini-2.5-flash",
      network,
    });

    expect(segments).toEqual([{ speaker: "SPEAKER_01", startSec: 0, endSec: 1.2, text: "Hi." }]);
    expect(fake.uploadFile).not.toHaveBeenCalled();
    expect(fake.generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gemini-2.5-flash",
        contents: [
          { inlineData: { data: Buffer.from("RIFF-test-audio").toString("base64"), mimeType: "audio/wav" } },
          { text: expect.stringContaining("Transcribe the spoken en audio verbatim.") },
        ],
      }),
    );
  });

  it("returns no segments when the service answers without text", async () => {
    const fake = createFakeGemini(new GenerateContentResponse());

    await expect(
      transcribeAudioSegments({ client: fake.port, audioPath, sourceLanguage: "en", model: "m", network }),
    ).resolves.toEqual([]);
  });

  it("maps a rejected key to AuthenticationError without retrying", async () => {
    const fake = createFakeGemini(new ApiError({ message: "API key not valid", status: 401 }));

    await expect(
      transcribeAudioSegments({ client: fake.port, audioPath, sourceLanguage: "en", model: "m", network }),
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(fake.generateContent).toHaveBeenCalledTimes(1);
  });

  it("retries network failures and then reports TranscriptionError", async () => {
    const fake = createFakeGemini(new Error("socket hang up"), new Error("socket hang up"));

    const run = transcribeAudioSegments({ client: fake.port, audioPath, sourceLanguage: "en", model: "m", network });

    await expect(run).rejects.toBeInstanceOf(TranscriptionError);
    await expect(run).rejects.toThrow("Speech recognition request failed: socket hang up");
    expect(fake.generateContent).toHaveBeenCalledTimes(2);
  });
});
