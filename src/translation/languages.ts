const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: "English",
  hi: "Hindi",
  ta: "Tamil",
  te: "Telugu",
  kn: "Kannada",
  ml: "Malayalam",
  mr: "Marathi",
  bn: "Bengali",
  gu: "Gujarati",
  pa: "Punjabi",
  ur: "Urdu",
  es: "Spanish",
  fr: "French",
  de: "German",
  it: "Italian",
  pt: "Portuguese",
  ru: "Russian",
  ja: "Japanese",
  ko: "Korean",
  zh: "Chinese",
  ar: "Arabic",
};

/** "hi" → "Hindi (hi)". Regional tags use their base language's name; unknown codes come back unchanged. */
export function describeLanguage(code: string): string {
  const base = code.split("-")[0].toLowerCase();
  const name = Object.hasOwn(LANGUAGE_NAMES, base) ? LANGUAGE_NAMES[base] : undefined;
  return name ? `${name} (${code})` : code;
}
