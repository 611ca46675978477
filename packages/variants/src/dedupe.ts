import { DIMENSION_ORDER } from "./config";
import { collapseWhitespace, compactOptionKey, normalizeOptionName } from "./text";
import type { CandidateSource, FilteredOption, Variant } from "./types";

export type DeduplicateInput = {
  options: readonly FilteredOption[];
  basePriceCents: number | null;
  productId?: string;
};

export type MergedVariant = {
  variant: Variant;
  winner: FilteredOption;
  mergedCount: number;
};

const SOURCE_RANK: Record<CandidateSource, number> = {
  structured_data: 0,
  container: 1,
  dropdown: 2,
  button_group: 3,
  data_attribute: 4,
  interactive: 5,
};

type IndexedOption = {
  option: FilteredOption;
  position: number;
};

export function variantKey(type: string, name: string): string {
  return `${type}::${normalizeOptionName(name)}`;
}

/**
 * Merges options sharing a (type, name) key into one variant. The winner of a
 * collision is the option that declares a price or stock, then the higher
 * confidence, then the more reliable source; the losers fill whatever the
 * winner left empty.
 */
export function deduplicateOptions(input: DeduplicateInput): MergedVariant[] {
  const groups = new Map<string, IndexedOption[]>();

  input.options.forEach((option, position) => {
    const key = variantKey(option.dimension, option.rawText);
    const group = groups.get(key);
    if (group) {
      group.push({ option, position });
    } else {
      groups.set(key, [{ option, position }]);
    }
  });

  const merged = [...groups.values()].map((group) => {
    const ranked = [...group].sort(compareOptions);
    return { winnerPosition: ranked[0].position, merged: mergeGroup(ranked, input.basePriceCents) };
  });

  merged.sort((left, right) => {
    const byType = compareTypes(left.merged.variant.type, right.merged.variant.type);
    return byType !== 0 ? byType : left.winnerPosition - right.winnerPosition;
  });

  return merged.map((entry, index) => {
    const variant = entry.merged.variant;
    if (variant.sku === null && input.productId) {
      variant.sku = buildSku(input.productId, variant, index);
    }
    return entry.merged;
  });
}

export function deduplicateVariants(input: DeduplicateInput): Variant[] {
  return deduplicateOptions(input).map((entry) => entry.variant);
}

function mergeGroup(ranked: IndexedOption[], basePriceCents: number | null): MergedVariant {
  const options = ranked.map((entry) => entry.option);
  const winner = options[0];

  const declaredPrice = options.find((option) => typeof option.declaredPriceCents === "number")?.declaredPriceCents;
  const declaredStock = options.find((option) => typeof option.declaredStock === "number")?.declaredStock;
  const sku = options.find((option) => option.sku)?.sku;

  return {
    winner,
    mergedCount: options.length,
    variant: {
      type: winner.dimension,
      name: collapseWhitespace(winner.rawText),
      priceCents: declaredPrice ?? basePriceCents,
      stock: declaredStock ?? null,
      sku: sku ?? null,
      images: [...new Set(options.flatMap((option) => option.images))],
    },
  };
}

function compareOptions(left: IndexedOption, right: IndexedOption): number {
  const declared = Number(declaresDetails(right.option)) - Number(declaresDetails(left.option));
  if (declared !== 0) {
    return declared;
  }
  if (left.option.confidence !== right.option.confidence) {
    return right.option.confidence - left.option.confidence;
  }
  const bySource = SOURCE_RANK[left.option.source] - SOURCE_RANK[right.option.source];
  return bySource !== 0 ? bySource : left.position - right.position;
}

function declaresDetails(option: FilteredOption): boolean {
  return typeof option.declaredPriceCents === "number" || typeof option.declaredStock === "number";
}

function compareTypes(left: string, right: string): number {
  const leftRank = dimensionRank(left);
  const rightRank = dimensionRank(right);
  if (leftRank !== rightRank) {
    return leftRank - rightRank;
  }
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function dimensionRank(type: string): number {
  const index = DIMENSION_ORDER.findIndex((dimension) => dimension === type);
  return index === -1 ? DIMENSION_ORDER.length : index;
}

function buildSku(productId: string, variant: Variant, index: number): string {
  const compact = compactOptionKey(variant.name).toUpperCase().slice(0, 6);
  const suffix =
    (variant.type === "color" || variant.type === "size") && compact ? compact : `VAR${String(index + 1).padStart(3, "0")}`;
  return `${productId}-${suffix}`;
}
