import type { TranslationEngineName } from "../types.js";

export interface TranslationRequest {
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
}

export interface TranslationEngine {
  readonly name: TranslationEngineName;
  /** Whether `translate` reaches the network. */
  readonly remote: boolean;
  translate(request: TranslationRequest): Promise<string>;
}
