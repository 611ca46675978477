import type { RecognizerTables } from "./config";
import { matchTextNoise } from "./rules";
import { normalizeOptionName } from "./text";
import type { ClassifiedOption, FilteredOption, NoiseRule, RejectedOption } from "./types";

export type NoiseFilterSettings = {
  recognizers: RecognizerTables;
  maxOptionLength: number;
};

export type NoiseFilterResult = {
  kept: FilteredOption[];
  rejected: RejectedOption[];
};

/** The first rule that rejects the option on its own, or null when it may be a real variant. */
export function findNoiseRule(option: ClassifiedOption, settings: NoiseFilterSettings): NoiseRule | null {
  const normalized = normalizeOptionName(option.rawText);
  if (!normalized) {
    return "EMPTY";
  }
  if (normalized.length > settings.maxOptionLength) {
    return "TOO_LONG";
  }

  const textRule = matchTextNoise(normalized, settings.recognizers);
  if (textRule) {
    return textRule;
  }

  if (option.inferredType === "quantity") {
    return "TYPE_QUANTITY";
  }
  if (option.inferredType === "unrelated") {
    return "TYPE_UNRELATED";
  }
  return null;
}

/**
 * Drops options that cannot be purchasable variants. An unknown option is also
 * dropped when a recognized option carries the same name; any other unknown
 * option is kept and flagged low-confidence.
 */
export function filterNoise(options: readonly ClassifiedOption[], settings: NoiseFilterSettings): NoiseFilterResult {
  const rejected: RejectedOption[] = [];
  const survivors: ClassifiedOption[] = [];

  for (const option of options) {
    const rule = findNoiseRule(option, settings);
    if (rule) {
      rejected.push({ option, rule });
    } else {
      survivors.push(option);
    }
  }

  const recognizedNames = new Set(
    survivors.filter((option) => option.inferredType !== "unknown").map((option) => normalizeOptionName(option.rawText)),
  );

  const kept: FilteredOption[] = [];
  for (const option of survivors) {
    const unknown = option.inferredType === "unknown";
    if (unknown && recognizedNames.has(normalizeOptionName(option.rawText))) {
      rejected.push({ option, rule: "SHADOWED_UNKNOWN" });
      continue;
    }
    kept.push(Object.freeze({ ...option, lowConfidence: unknown }));
  }

  return { kept, rejected };
}
