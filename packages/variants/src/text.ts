const DIMENSION_LABEL_PREFIX =
  /^(?:colou?r|size|style|storage|capacity|material|pattern|model|edition|finish|flavou?r|scent|configuration)\s*:\s*/i;

const PROMOTION_PATTERNS = [
  /with \d+\s*percent savings?/gi,
  /list price:?\s*[\$€£¥₹]\s?[0-9][0-9.,]*/gi,
  /typical:?\s*[\$€£¥₹]\s?[0-9][0-9.,]*/gi,
  /\b\d+% off\b/gi,
  /\blimited time deal\b/gi,
];

const STOCK_PATTERNS = [
  /\bonly \d+ left in stock(?: - order soon)?\.?/gi,
  /\b\d+\+? bought in past month\b/gi,
  /\bcurrently unavailable\b/gi,
  /\bout of stock\b/gi,
  /\bin stock\b/gi,
  /\bunavailable\b/gi,
];

const PRICE_PATTERN = /(?:from\s+)?[\$€£¥₹]\s?[0-9][0-9.,]*/gi;

const AMAZON_SIZE_TOKEN = /\._[A-Z0-9_,]+_\.(jpe?g|png|webp)(\?.*)?$/i;

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

/**
 * Strips label prefixes, promotional copy and stock phrases from option text.
 * Prices are removed only when other text remains, so a bare "$26.58" survives
 * for the noise filter to reject.
 */
export function cleanOptionText(input: string | undefined | null): string {
  if (!input) {
    return "";
  }

  let text = collapseWhitespace(input).replace(DIMENSION_LABEL_PREFIX, "");

  for (const pattern of [...PROMOTION_PATTERNS, ...STOCK_PATTERNS]) {
    text = text.replace(pattern, " ");
  }
  text = collapseWhitespace(text);

  const withoutPrices = collapseWhitespace(text.replace(PRICE_PATTERN, " "));
  if (/[a-z0-9]/i.test(trimSeparators(withoutPrices))) {
    text = withoutPrices;
  }

  return trimSeparators(text);
}

export function normalizeOptionName(input: string): string {
  return collapseWhitespace(input).toLowerCase();
}

/** Lower-cased with everything but letters and digits removed. */
export function compactOptionKey(input: string): string {
  return input.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, "");
}

export function tokenize(input: string): string[] {
  return input
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

export function upgradeImageUrl(url: string): string {
  const trimmed = url.trim();
  if (!/amazon\./i.test(trimmed)) {
    return trimmed;
  }
  return trimmed.replace(AMAZON_SIZE_TOKEN, (_match, extension: string, query: string | undefined) => {
    return `._AC_SX679_.${extension}${query ?? ""}`;
  });
}

function trimSeparators(input: string): string {
  return input.replace(/^[\s|:,\-–]+/, "").replace(/[\s|:,\-–]+$/, "").trim();
}
