import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ApiError } from "@google/genai";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../gemini/client.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../gemini/client.js")>();
  return { ...actual, createGeminiClient: vi.fn() };
});

import { AuthenticationError, EmptyResultError, TranscriptionError } from "../errors.js";
import { createGeminiClient } from "../gemini/client.js";
import { createFakeGemini, textResponse } from "../testing/gemini.js";
import { fileExists } from "../util/atomic.js";
import { flattenSegments, transcribe } from "./transcribe.js";

const mockCreateClient = vi.mocked(createGeminiClient);
const network = { timeoutMs: 5000, maxRetries: 0, backoffMs: 0 };

let dir: string;
let audioPath: string;
let outputPath: string;

beforeEach(async () => {
  vi.clearAllMocks();
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "redub-transcribe-"));
  audioPath = path.join(dir, "source.wav");
  outputPath = path.join(dir, "text", "source.en.txt");
  await fs.writeFile(audioPath, "RIFF");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function options(apiKey?: string) {
  return { apiKey, audioPath, outputPath, sourceLanguage: "en", model: "gemini-2.5-flash", network };
}

describe("flattenSegments", () => {
  it("joins segment texts with single spaces", () => {
    expect(
      flattenSegments([
        { speaker: "A", startSec: 0, endSec: 1, text: "Hello there." },
        { speaker: "B", startSec: 1, endSec: 2, text: "  " },
        { speaker: "B", startSec: 2, endSec: 3, text: "General Kenobi." },
      ]),
    ).toBe("Hello there. General Kenobi.");
  });
});

describe("transcribe", () => {
  it("writes the flat transcript and returns the segments", async () => {
    const fake = createFakeGemini(
      textResponse(
        JSON.stringify({
          segments: [
            { speaker: "SPEAKER_01", startSec: 0, endSec: 1.1, text: "Hello there." },
            { speaker: "SPEAKER_02", startSec: 1.4, endSec: 2.6, text: "General Kenobi." },
          ],
        }),
      ),
    );
    mockCreateClient.mockReturnValue(fake.port);

    const transcript = await transcribe(options("test-key"));

    expect(transcript.text).toBe("Hello there. General Kenobi.");
    expect(transcript.segments).toHaveLength(2);
    expect(await fs.readFile(outputPath, "utf8")).toBe("Hello there. General Kenobi.");
    expect(mockCreateClient).toHaveBeenCalledWith("test-key", 5000);
  });

  it("requires a credential before any request", async () => {
    await expect(transcribe(options(undefined))).rejects.toBeInstanceOf(AuthenticationError);
    await expect(transcribe(options("   "))).rejects.toBeInstanceOf(AuthenticationError);
    expect(mockCreateClient).not.toHaveBeenCalled();
  });

  it("fails with EmptyResultError on silence instead of inventing text", async () => {
    mockCreateClient.mockReturnValue(createFakeGemini(textResponse('{"segments":[]}')).port);

    await expect(transcribe(options("test-key"))).rejects.toBeInstanceOf(EmptyResultError);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("surfaces a rejected credential as AuthenticationError", async () => {
    mockCreateClient.mockReturnValue(
      createFakeGemini(new ApiError({ message: "permission denied", status: 403 })).port,
    );

    await expect(transcribe(options("test-key"))).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("surfaces service failures as TranscriptionError", async () => {
    mockCreateClient.mockReturnValue(
      createFakeGemini(new ApiError({ message: "internal error", status: 500 })).port,
    );

    await expect(transcribe(options("test-key"))).rejects.toBeInstanceOf(TranscriptionError);
  });

  it("fails when the audio file is missing", async () => {
    await fs.rm(audioPath);

    await expect(transcribe(options("test-key"))).rejects.toThrow(`Audio file not found: ${audioPath}`);
  });
});
