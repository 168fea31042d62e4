import { TranslationError } from "../errors.js";
import { createGeminiClient } from "../gemini/client.js";
import { GeminiTranslationEngine } from "../gemini/translate.js";
import { ArgosTranslationEngine } from "./argos.js";
import type { NetworkPolicy } from "../util/retry.js";
import type { TranslationEngineName } from "../types.js";
import type { TranslationEngine } from "./types.js";

export type { TranslationEngine, TranslationRequest } from "./types.js";

export const identityTranslationEngine: TranslationEngine = {
  name: "identity",
  remote: false,
  translate: async (request) => request.text,
};

export function createTranslationEngine(params: {
  engine: TranslationEngineName;
  cwd: string;
  apiKey?: string;
  model: string;
  network: NetworkPolicy;
}): TranslationEngine {
  switch (params.engine) {
    case "identity":
      return identityTranslationEngine;
    case "argos":
      return new ArgosTranslationEngine(params.cwd);
    case "gemini":
      if (!params.apiKey) {
        throw new TranslationError("GOOGLE_API_KEY is required for the gemini translation engine.");
      }
      return new GeminiTranslationEngine(
        createGeminiClient(params.apiKey, params.network.timeoutMs),
        params.model,
        params.network,
      );
  }
}
