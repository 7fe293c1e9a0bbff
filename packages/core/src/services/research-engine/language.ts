/**
 * Language detection
 *
 * Scores text against the language-signal table in data/language-signals.json:
 * 0.7 x (pattern character hits / text length, summed over the language's
 * patterns) + 0.3 x (common-word hits / word count), capped at 1.
 */

import signals from "../../../data/language-signals.json";
import type { Language } from "./types";

export interface LanguageDetection {
  language: Language;
  confidence: number;
}

interface LanguageProfile {
  language: Language;
  displayName: string;
  patterns: RegExp[];
  commonWords: Set<string>;
}

export const SUPPORTED_LANGUAGES: readonly Language[] = [
  "english",
  "chinese",
  "japanese",
  "korean",
  "spanish",
  "french",
  "german",
  "russian",
];

export function isLanguage(value: unknown): value is Language {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

const DEFAULT_LANGUAGE: Language = isLanguage(signals.defaultLanguage)
  ? signals.defaultLanguage
  : "english";

// Table order breaks ties: an earlier language keeps the lead on equal scores
const PROFILES: LanguageProfile[] = signals.languages.flatMap((entry) =>
  isLanguage(entry.code)
    ? [
        {
          language: entry.code,
          displayName: entry.displayName,
          patterns: entry.patterns.map((pattern) => new RegExp(pattern, "g")),
          commonWords: new Set(entry.commonWords),
        },
      ]
    : []
);

function scoreLanguage(
  text: string,
  words: string[],
  profile: LanguageProfile
): number {
  let patternScore = 0;
  for (const pattern of profile.patterns) {
    const matches = text.match(pattern);
    patternScore += (matches ? matches.length : 0) / text.length;
  }

  let wordScore = 0;
  if (words.length > 0) {
    const hits = words.filter((word) => profile.commonWords.has(word)).length;
    wordScore = hits / words.length;
  }

  return Math.min(
    patternScore * signals.patternWeight + wordScore * signals.wordWeight,
    1
  );
}

/**
 * Detect the dominant language of a text. Falls back to English when no
 * language reaches the confidence floor.
 */
export function detectLanguage(text: string): LanguageDetection {
  const normalized = text.trim().toLowerCase();
  if (!normalized) {
    return { language: DEFAULT_LANGUAGE, confidence: 0 };
  }

  const words = normalized.match(WORD_PATTERN) ?? [];

  let best: LanguageDetection = { language: DEFAULT_LANGUAGE, confidence: 0 };
  for (const profile of PROFILES) {
    const score = scoreLanguage(normalized, words, profile);
    if (score > best.confidence) {
      best = { language: profile.language, confidence: score };
    }
  }

  if (best.confidence < signals.confidenceFloor) {
    return { language: DEFAULT_LANGUAGE, confidence: best.confidence };
  }
  return best;
}

export function getLanguageDisplayName(language: Language): string {
  const profile = PROFILES.find((entry) => entry.language === language);
  return profile ? profile.displayName : language;
}
