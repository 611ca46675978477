import type { DimensionRecognizer, RecognizerTables } from "./config";
import { matchTextNoise } from "./rules";
import { normalizeOptionName, tokenize } from "./text";
import type { Candidate, ClassifiedOption, DimensionType, OptionType } from "./types";

type Classification = {
  inferredType: OptionType;
  confidence: number;
};

const GENERIC_DIMENSION_LABELS = new Set(["variation", "variant", "option", "options", "name", "selected", "dropdown", "table"]);

const QUANTITY_HINT_TOKENS = new Set(["quantity", "qty"]);

// Never usable as a variant type.
const EXCLUDED_DIMENSION_LABELS = new Set(["quantity", "qty", "unrelated"]);

const HINT_DIMENSION_PATTERNS = [
  /variation_([a-z_]+?)_name/i,
  /dropdown_selected_([a-z_]+?)_name/i,
  /shopify:options\[\d+\]\.(.+)$/i,
  /jsonld:hasVariant\[\d+\]\.(.+)$/i,
  /variant-([a-z]+)/i,
  /data-([a-z]+)-name/i,
];

/**
 * Assigns each candidate one type. Checks run in a fixed order and the first
 * match wins: quantity tokens or quantity containers, page chrome, the container the option was found
 * in, exact keywords, value patterns, then whole-word keyword matches.
 */
export function classifyCandidate(candidate: Candidate, recognizers: RecognizerTables): ClassifiedOption {
  const classification = classifyText(candidate.rawText, candidate.containerHint, recognizers);
  return Object.freeze({
    ...candidate,
    ...classification,
    dimension: dimensionLabel(classification.inferredType, candidate.containerHint),
  });
}

export function classifyCandidates(candidates: readonly Candidate[], recognizers: RecognizerTables): ClassifiedOption[] {
  return candidates.map((candidate) => classifyCandidate(candidate, recognizers));
}

function classifyText(rawText: string, containerHint: string, recognizers: RecognizerTables): Classification {
  const normalized = normalizeOptionName(rawText);

  const noise = matchTextNoise(normalized, recognizers);
  if (noise === "QUANTITY_TOKEN" || noise === "QUANTITY_PREFIX") {
    return { inferredType: "quantity", confidence: 0.99 };
  }
  if (tokenize(containerHint).some((token) => QUANTITY_HINT_TOKENS.has(token))) {
    return { inferredType: "quantity", confidence: 0.99 };
  }
  if (noise) {
    return { inferredType: "unrelated", confidence: 0.95 };
  }

  const fromContainer = matchContainer(containerHint, recognizers.dimensions);
  if (fromContainer) {
    return { inferredType: fromContainer, confidence: 0.9 };
  }

  for (const dimension of recognizers.dimensions) {
    if (dimension.keywords.has(normalized)) {
      return { inferredType: dimension.type, confidence: 0.85 };
    }
  }

  for (const dimension of recognizers.dimensions) {
    if (dimension.patterns.some((pattern) => pattern.test(normalized))) {
      return { inferredType: dimension.type, confidence: 0.8 };
    }
  }

  const padded = ` ${tokenize(normalized).join(" ")} `;
  for (const dimension of recognizers.dimensions) {
    for (const keyword of dimension.keywords) {
      if (keyword.length >= 3 && padded.includes(` ${tokenize(keyword).join(" ")} `)) {
        return { inferredType: dimension.type, confidence: 0.6 };
      }
    }
  }

  return { inferredType: "unknown", confidence: 0.3 };
}

function matchContainer(containerHint: string, dimensions: readonly DimensionRecognizer[]): DimensionType | null {
  const tokens = tokenize(containerHint);
  if (tokens.length === 0) {
    return null;
  }
  const match = dimensions.find((dimension) => tokens.some((token) => dimension.containerKeywords.has(token)));
  return match?.type ?? null;
}

/** The label an option is grouped under: its type, or the dimension its container names. */
export function dimensionLabel(inferredType: OptionType, containerHint: string): string {
  if (inferredType === "quantity" || inferredType === "unrelated") {
    return "option";
  }
  if (inferredType !== "unknown") {
    return inferredType;
  }

  for (const pattern of HINT_DIMENSION_PATTERNS) {
    const label = containerHint.match(pattern)?.[1];
    if (!label) {
      continue;
    }
    const normalized = label.replace(/[_-]+/g, " ").trim().toLowerCase();
    if (normalized && !GENERIC_DIMENSION_LABELS.has(normalized) && !EXCLUDED_DIMENSION_LABELS.has(normalized)) {
      return normalized;
    }
  }

  return "option";
}
