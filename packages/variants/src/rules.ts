import type { RecognizerTables } from "./config";
import { compactOptionKey } from "./text";
import type { NoiseRule } from "./types";

export const QUANTITY_TOKEN = /^\d+\+?$/;
export const QUANTITY_PREFIX = /^(?:qty|quantity)\b/;

const PRICE_ONLY = /^(?:from\s+)?[\$€£¥₹]\s?[0-9][0-9.,]*(?:\s?[-–]\s?[\$€£¥₹]\s?[0-9][0-9.,]*)?$/;
const AGGREGATE_OFFER = /^\d+\s+options?(?:\s+(?:from|available)\b.*)?$/;
const MEDIA_COUNTER = /^\d*\s*(?:videos?|photos?|images?)$/;
const PLACEHOLDER_PREFIX = /^(?:please\s+)?(?:select|choose|pick)\b/;

// Edit-distance matching only applies to phrases long enough that one typo cannot
// turn them into a plausible option name.
const FUZZY_PHRASE_MIN_LENGTH = 8;

export type TextNoiseRule = Extract<
  NoiseRule,
  "QUANTITY_TOKEN" | "QUANTITY_PREFIX" | "PRICE_ONLY" | "AGGREGATE_OFFER" | "MEDIA_COUNTER" | "NAVIGATION" | "UI_PHRASE"
>;

type PhraseIndex = {
  compact: ReadonlySet<string>;
  fuzzy: readonly string[];
};

const phraseIndexes = new WeakMap<RecognizerTables, PhraseIndex>();

/** Expects text already trimmed, lower-cased and whitespace-collapsed. */
export function matchTextNoise(normalized: string, recognizers: RecognizerTables): TextNoiseRule | null {
  if (QUANTITY_TOKEN.test(normalized)) {
    return "QUANTITY_TOKEN";
  }
  if (QUANTITY_PREFIX.test(normalized)) {
    return "QUANTITY_PREFIX";
  }
  if (PRICE_ONLY.test(normalized)) {
    return "PRICE_ONLY";
  }
  if (AGGREGATE_OFFER.test(normalized)) {
    return "AGGREGATE_OFFER";
  }
  if (MEDIA_COUNTER.test(normalized)) {
    return "MEDIA_COUNTER";
  }
  if (recognizers.navigationLabels.has(normalized)) {
    return "NAVIGATION";
  }
  if (isUiPhrase(normalized, recognizers)) {
    return "UI_PHRASE";
  }
  return null;
}

export function isUiPhrase(normalized: string, recognizers: RecognizerTables): boolean {
  if (recognizers.uiPhrases.has(normalized) || recognizers.placeholders.has(normalized)) {
    return true;
  }
  if (PLACEHOLDER_PREFIX.test(normalized)) {
    return true;
  }

  const index = getPhraseIndex(recognizers);
  const compact = compactOptionKey(normalized);
  if (compact && index.compact.has(compact)) {
    return true;
  }

  return index.fuzzy.some((phrase) => Math.abs(phrase.length - normalized.length) <= 1 && editDistance(phrase, normalized) <= 1);
}

function getPhraseIndex(recognizers: RecognizerTables): PhraseIndex {
  const cached = phraseIndexes.get(recognizers);
  if (cached) {
    return cached;
  }

  const phrases = [...recognizers.uiPhrases, ...recognizers.placeholders];
  const index: PhraseIndex = {
    compact: new Set(phrases.map((phrase) => compactOptionKey(phrase)).filter(Boolean)),
    fuzzy: [...recognizers.uiPhrases].filter((phrase) => phrase.length >= FUZZY_PHRASE_MIN_LENGTH),
  };
  phraseIndexes.set(recognizers, index);
  return index;
}

export function editDistance(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const substitution = previous[j - 1] + (left[i - 1] === right[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }

  return previous[right.length];
}
