import { TranslationError, errorMessage } from "../errors.js";
import { withRetry, type NetworkPolicy } from "../util/retry.js";
import { isAuthenticationFailure, type GeminiPort } from "./client.js";
import { describeLanguage } from "../translation/languages.js";
import type { TranslationEngine, TranslationRequest } from "../translation/types.js";

function buildPrompt(request: TranslationRequest): string {
  return [
    "You are a professional dubbing translator for video content.",
    `Translate the following ${describeLanguage(request.sourceLanguage)} transcript into ${describeLanguage(request.targetLanguage)}.`,
    "Rules:",
    "1) Use natural, conversational language that sounds right when spoken aloud.",
    "2) Preserve tone, intent and emotion.",
    "3) Keep it concise so it fits the original speech timing.",
    "4) Return only the translated text, with no notes or quotation marks.",
    "",
    request.text,
  ].join("\n");
}

export class GeminiTranslationEngine implements TranslationEngine {
  readonly name = "gemini" as const;
  readonly remote = true;

  constructor(
    private readonly client: GeminiPort,
    private readonly model: string,
    private readonly network: NetworkPolicy,
  ) {}

  async translate(request: TranslationRequest): Promise<string> {
    try {
      const response = await withRetry(
        () =>
          this.client.generateContent({
            model: this.model,
            contents: [{ text: buildPrompt(request) }],
          }),
        {
          maxRetries: this.network.maxRetries,
          backoffMs: this.network.backoffMs,
          shouldRetry: (error) => !isAuthenticationFailure(error),
        },
      );
      return (response.text ?? "").trim();
    } catch (error) {
      throw new TranslationError(`Gemini translation failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
