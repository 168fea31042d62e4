import { TranslationError, errorMessage } from "../errors.js";
import { CommandError, runCommand } from "../util/shell.js";
import type { TranslationEngine, TranslationRequest } from "./types.js";

/**
 * Offline neural translation through the `argos-translate` CLI. The language
 * pair's model package must already be installed locally.
 */
export class ArgosTranslationEngine implements TranslationEngine {
  readonly name = "argos" as const;
  readonly remote = false;

  constructor(
    private readonly cwd: string,
    private readonly executable = "argos-translate",
  ) {}

  async translate(request: TranslationRequest): Promise<string> {
    const args = ["--from", request.sourceLanguage, "--to", request.targetLanguage];

    try {
      const { stdout } = await runCommand(this.executable, args, this.cwd, { input: request.text });
      return stdout.trim();
    } catch (error) {
      if (error instanceof CommandError && error.notFound) {
        throw new TranslationError(
          `${this.executable} is not installed. Install it with: pip install argostranslate, ` +
            `then install the ${request.sourceLanguage}->${request.targetLanguage} package.`,
          { cause: error },
        );
      }
      throw new TranslationError(
        `Offline translation model ${request.sourceLanguage}->${request.targetLanguage} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
