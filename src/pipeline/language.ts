import type { LanguageMetadata } from "../types.js";

// Platform locale tags whose speech-to-text code is fixed explicitly
const LANGUAGE_TABLE: Readonly<Record<string, string>> = {
  "zh-CN": "zh",
  "zh-TW": "zh",
  "zh-HK": "zh",
  "en-US": "en",
  "en-GB": "en",
  "ja-JP": "ja",
  "ko-KR": "ko",
  "es-ES": "es",
  "fr-FR": "fr",
  "de-DE": "de",
  "it-IT": "it",
  "pt-BR": "pt",
  "ru-RU": "ru",
  "ar-SA": "ar",
  "hi-IN": "hi",
};

/** Exact table match first, then the part before the first "-". */
export function normalizeLanguage(code: string): string {
  if (Object.prototype.hasOwnProperty.call(LANGUAGE_TABLE, code)) {
    return LANGUAGE_TABLE[code];
  }
  return code.split("-")[0];
}

/**
 * Speech-to-text language for a video: declared audio language, then the
 * default metadata language. Undefined asks the backend to auto-detect.
 */
export function detectLanguage(metadata?: LanguageMetadata): string | undefined {
  const declared = metadata?.defaultAudioLanguage || metadata?.defaultLanguage;
  return declared ? normalizeLanguage(declared) : undefined;
}
