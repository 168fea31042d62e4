import {
  ApiError,
  GoogleGenAI,
  type File as GeminiFile,
  type GenerateContentParameters,
  type GenerateContentResponse,
  type UploadFileParameters,
} from "@google/genai";

/** The slice of the Gemini SDK the stages use. Tests supply their own. */
export interface GeminiPort {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
  uploadFile(params: UploadFileParameters): Promise<GeminiFile>;
}

export function createGeminiClient(apiKey: string, timeoutMs?: number): GeminiPort {
  // Force Gemini Developer API mode to avoid accidental Vertex mode via env flags.
  const ai = new GoogleGenAI({
    apiKey,
    vertexai: false,
    httpOptions: timeoutMs === undefined ? undefined : { timeout: timeoutMs },
  });

  return {
    generateContent: (params) => ai.models.generateContent(params),
    uploadFile: (params) => ai.files.upload(params),
  };
}

const AUTH_FAILURE_MARKERS = [
  "api key not valid",
  "api_key_invalid",
  "api keys are not supported by this api",
  "credentials_missing",
  "unauthenticated",
  "permission_denied",
];

export function isAuthenticationFailure(error: unknown): boolean {
  if (error instanceof ApiError && (error.status === 401 || error.status === 403)) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return AUTH_FAILURE_MARKERS.some((marker) => message.includes(marker));
}
