const CURRENCY_BY_SYMBOL: Readonly<Record<string, string>> = {
  "$": "USD",
  "€": "EUR",
  "£": "GBP",
  "¥": "JPY",
  "₹": "INR",
};

export const CURRENCY_SYMBOL_PATTERN = /[$€£¥₹]/;

// Grouped thousands ("1,299", "1.299", "1 299") or a plain run of digits, with up to two decimals.
const AMOUNT = String.raw`\d{1,3}(?:[.,\s]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d{1,2})?`;

const AMOUNT_AFTER_SYMBOL = new RegExp(String.raw`[$€£¥₹]\s?(${AMOUNT})`);
const AMOUNT_BEFORE_SYMBOL = new RegExp(String.raw`(${AMOUNT})\s?[$€£¥₹]`);
const ANY_AMOUNT = new RegExp(`(${AMOUNT})`);

export type ParsedPrice = {
  priceCents: number;
  currency?: string;
};

/**
 * Reads one amount from display text. When a currency symbol is present the
 * amount beside it wins over other numbers ("Size 10 - $26.58" is 2658).
 */
export function parsePrice(input: string): ParsedPrice | null {
  const text = input.replace(/\s+/g, " ").trim();
  const symbol = text.match(CURRENCY_SYMBOL_PATTERN)?.[0];

  const token = symbol
    ? (text.match(AMOUNT_AFTER_SYMBOL) ?? text.match(AMOUNT_BEFORE_SYMBOL) ?? text.match(ANY_AMOUNT))?.[1]
    : text.match(ANY_AMOUNT)?.[1];
  if (!token) {
    return null;
  }

  const priceCents = amountToCents(token);
  if (priceCents === null) {
    return null;
  }
  return symbol ? { priceCents, currency: CURRENCY_BY_SYMBOL[symbol] } : { priceCents };
}

/** Only accepts text that carries a currency symbol, so "128 GB" never reads as a price. */
export function parseDisplayedPrice(input: string | undefined): number | undefined {
  if (!input) {
    return undefined;
  }
  const parsed = parsePrice(input);
  return parsed?.currency ? parsed.priceCents : undefined;
}

export function toPriceCents(value: number | string | null | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.round(value * 100) : null;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }
  return parsePrice(value)?.priceCents ?? null;
}

// The last separator is decimal only when one or two digits follow it; every other separator groups thousands.
function amountToCents(token: string): number | null {
  const digits = token.replace(/\s/g, "");
  const lastSeparator = Math.max(digits.lastIndexOf("."), digits.lastIndexOf(","));
  const fraction = lastSeparator === -1 ? "" : digits.slice(lastSeparator + 1);
  const hasDecimals = fraction.length > 0 && fraction.length <= 2;

  const whole = Number.parseInt((hasDecimals ? digits.slice(0, lastSeparator) : digits).replace(/[.,]/g, ""), 10);
  const cents = whole * 100 + (hasDecimals ? Number.parseInt(fraction.padEnd(2, "0"), 10) : 0);
  return Number.isSafeInteger(cents) && cents > 0 ? cents : null;
}
