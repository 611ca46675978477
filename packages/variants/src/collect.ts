import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

import { parseDisplayedPrice, parsePrice } from "./price";
import { cleanOptionText, collapseWhitespace, upgradeImageUrl } from "./text";
import type { Candidate, CandidateSource } from "./types";

export type StaticStrategy = Exclude<CandidateSource, "interactive">;

export type CollectOptions = {
  maxCandidatesPerStrategy: number;
  /** Page address that relative image URLs resolve against. */
  baseUrl?: string;
};

export type StrategyDefinition = {
  source: StaticStrategy;
  collect: ($: CheerioAPI, options: CollectOptions) => Candidate[];
};

type CandidateDraft = {
  text: string | undefined;
  source: CandidateSource;
  containerHint: string;
  declaredPriceCents?: number;
  declaredStock?: number;
  sku?: string;
  images?: string[];
};

type JsonRecord = Record<string, unknown>;

const CONTAINER_SELECTORS = [
  "[id^='variation_'][id$='_name']",
  "[data-testid^='variant-']",
  "[data-cy='color-picker']",
  ".variation-container",
  ".variation-wrapper",
  "#twister",
];

const CONTAINER_ENTRY_SELECTOR = "li, button, option, [role='radio'], .a-button-text, .swatch-option";

// Configuration tables list one purchasable configuration per row, price alongside.
const OPTION_TABLE_SELECTORS = [
  ".twister-plus-buying-options",
  ".twister-dim-content",
  "[data-test-id='buying-options']",
  ".buying-options-table",
  ".configuration-table",
  ".option-table",
  ".variant-table",
];

const OPTION_TABLE_ENTRY_SELECTOR = ".a-button-group .a-button, .option-row, .config-option, .buying-option";

const BUTTON_GROUP_SELECTORS = [
  ".a-button-toggle-group",
  ".a-button-group",
  "[role='radiogroup']",
  ".swatch-container",
  ".color-swatch-container",
  ".variation-selector-box",
  ".size-button-group",
  ".color-button-group",
  ".swatches",
];

const BUTTON_SELECTOR = "button, [role='radio'], .a-button, .swatch-button, a.swatch, input[type='radio']";

const PRODUCT_SELECT_PATTERN =
  /(variation|dropdown_selected|twister|variant|option|colou?r|size|storage|capacity|style|material|flavou?r|model)/i;

const NON_PRODUCT_SELECT_PATTERN = /(quantity|qty|amount|sort|search|department|language|currency|country|locale|page)/i;

export const VARIANT_DATA_ATTRIBUTES = [
  "data-variation-name",
  "data-variant-name",
  "data-option-name",
  "data-color-name",
  "data-size-name",
  "data-storage-name",
  "data-style-name",
  "data-material-name",
];

const PRICE_SELECTORS = [
  ".a-price .a-offscreen",
  ".twisterSwatchPrice",
  ".variant-price",
  ".option-price",
  ".price",
  ".cost",
].join(", ");

const PRICE_ATTRIBUTES = ["data-price", "data-variant-price", "data-cost"];

const IMAGE_ATTRIBUTES = ["data-old-hires", "data-a-hires", "data-hires", "data-image", "data-src", "src"];

const NON_VARIANT_IMAGE =
  /(?:^|[^a-z0-9])(?:logo|icon|sprite|placeholder|loading|spacer|pixel|transparent|1x1|blank)s?(?=[^a-z0-9]|$)/i;

const IMAGE_EXTENSION = /\.(?:jpe?g|png|gif|webp)(?=$|[^a-z0-9])/i;

const STRUCTURED_VARIANT_PROPERTIES = ["color", "size", "material", "pattern"];

export const STATIC_STRATEGIES: readonly StrategyDefinition[] = [
  { source: "container", collect: collectFromContainers },
  { source: "dropdown", collect: collectFromDropdowns },
  { source: "button_group", collect: collectFromButtonGroups },
  { source: "structured_data", collect: collectFromStructuredData },
  { source: "data_attribute", collect: collectFromDataAttributes },
];

export function loadDocument(html: string): CheerioAPI {
  return load(html);
}

/** Strategies 1 to 3 against one document, tagged with the given source. */
export function collectVisibleOptions($: CheerioAPI, source: CandidateSource, options: CollectOptions): Candidate[] {
  return [
    ...collectFromContainers($, options, source),
    ...collectFromDropdowns($, options, source),
    ...collectFromButtonGroups($, options, source),
  ];
}

export function collectFromContainers($: CheerioAPI, options: CollectOptions, source: CandidateSource = "container"): Candidate[] {
  const candidates: Candidate[] = [];
  const seen = new Set<Element>();
  const groups: Array<[readonly string[], string]> = [
    [CONTAINER_SELECTORS, CONTAINER_ENTRY_SELECTOR],
    [OPTION_TABLE_SELECTORS, OPTION_TABLE_ENTRY_SELECTOR],
  ];

  for (const [containerSelectors, entrySelector] of groups) {
    for (const selector of containerSelectors) {
      $<Element, string>(selector).each((_, node) => {
        const container = $(node);
        const hint = describeContainer(container, selector);

        for (const entry of leafEntries($, container, entrySelector)) {
          if (seen.has(entry)) {
            continue;
          }
          seen.add(entry);

          const element = $(entry);
          pushCandidate(candidates, options, {
            text: readOptionLabel(element),
            source,
            containerHint: hint,
            declaredPriceCents: readDeclaredPrice(element),
            declaredStock: readDeclaredStock(element),
            images: readImages($, element, options.baseUrl),
          });
        }
      });
    }
  }

  return candidates;
}

export function collectFromDropdowns($: CheerioAPI, options: CollectOptions, source: CandidateSource = "dropdown"): Candidate[] {
  const candidates: Candidate[] = [];

  $("select").each((_, node) => {
    const select = $(node);
    const identity = [select.attr("id"), select.attr("name")].filter(Boolean).join(" ");
    if (!identity || NON_PRODUCT_SELECT_PATTERN.test(identity) || !PRODUCT_SELECT_PATTERN.test(identity)) {
      return;
    }

    const hint = select.attr("id") ?? select.attr("name") ?? "select";
    select.find("option").each((__, optionNode) => {
      const option = $(optionNode);
      pushCandidate(candidates, options, {
        text: collapseWhitespace(option.text()) || option.attr("value"),
        source,
        containerHint: hint,
        declaredPriceCents: readDeclaredPrice(option),
        declaredStock: readDeclaredStock(option),
      });
    });
  });

  return candidates;
}

export function collectFromButtonGroups(
  $: CheerioAPI,
  options: CollectOptions,
  source: CandidateSource = "button_group",
): Candidate[] {
  const candidates: Candidate[] = [];
  const seen = new Set<Element>();

  for (const selector of BUTTON_GROUP_SELECTORS) {
    $<Element, string>(selector).each((_, node) => {
      const group = $(node);
      const hint = [
        group.attr("aria-label"),
        group.attr("id"),
        group.closest("[id]").attr("id"),
        group.attr("data-testid"),
        selector.replace(/^[.#]/, ""),
      ]
        .filter(Boolean)
        .join(" ");

      for (const button of leafEntries($, group, BUTTON_SELECTOR)) {
        if (seen.has(button)) {
          continue;
        }
        seen.add(button);

        const element = $(button);
        const text = element.is("input") ? element.attr("value") : readOptionLabel(element);
        pushCandidate(candidates, options, {
          text,
          source,
          containerHint: hint,
          declaredPriceCents: readDeclaredPrice(element),
          declaredStock: readDeclaredStock(element),
          images: readImages($, element, options.baseUrl),
        });
      }
    });
  }

  return candidates;
}

export function collectFromStructuredData(
  $: CheerioAPI,
  options: CollectOptions,
  source: CandidateSource = "structured_data",
): Candidate[] {
  const candidates: Candidate[] = [];

  $("script[type='application/ld+json']").each((_, node) => {
    const parsed = parseJson($(node).text());
    if (parsed === undefined) {
      return;
    }

    for (const entry of flattenJsonLd(parsed)) {
      const types = normalizeType(entry["@type"]);
      if (!types.includes("product") && !types.includes("productgroup")) {
        continue;
      }
      const productName = asString(entry.name);

      asArray(entry.hasVariant).forEach((rawVariant, index) => {
        const variant = asRecord(rawVariant);
        if (!variant) {
          return;
        }
        const offer = firstOffer(variant.offers);
        const shared = {
          source,
          declaredPriceCents: readOfferPrice(offer),
          declaredStock: readOfferStock(offer),
          sku: asString(variant.sku) ?? asString(offer?.sku),
          images: readJsonImages(variant.image, options.baseUrl),
        };

        let described = false;
        for (const property of STRUCTURED_VARIANT_PROPERTIES) {
          const value = readPropertyValue(variant[property]);
          if (value) {
            described = true;
            pushCandidate(candidates, options, {
              ...shared,
              text: value,
              containerHint: `jsonld:hasVariant[${index}].${property}`,
            });
          }
        }

        const variantName = asString(variant.name);
        if (!described && variantName && variantName !== productName) {
          pushCandidate(candidates, options, {
            ...shared,
            text: stripProductName(variantName, productName),
            containerHint: `jsonld:hasVariant[${index}].name`,
          });
        }
      });

      asArray(entry.offers).forEach((rawOffer, index) => {
        const offer = asRecord(rawOffer);
        const offerName = asString(offer?.name) ?? asString(asRecord(offer?.itemOffered)?.name);
        if (!offer || !offerName || offerName === productName) {
          return;
        }
        pushCandidate(candidates, options, {
          text: stripProductName(offerName, productName),
          source,
          containerHint: `jsonld:offers[${index}].name`,
          declaredPriceCents: readOfferPrice(offer),
          declaredStock: readOfferStock(offer),
          sku: asString(offer.sku),
        });
      });
    }
  });

  $("script[type='application/json']").each((_, node) => {
    const parsed = asRecord(parseJson($(node).text()));
    const product = asRecord(parsed?.product) ?? parsed;
    if (!product || !Array.isArray(product.variants) || !Array.isArray(product.options)) {
      return;
    }
    candidates.push(...collectFromShopifyProduct(product, options, source, candidates.length));
  });

  return candidates;
}

export function collectFromDataAttributes(
  $: CheerioAPI,
  options: CollectOptions,
  source: CandidateSource = "data_attribute",
): Candidate[] {
  const candidates: Candidate[] = [];

  for (const attribute of VARIANT_DATA_ATTRIBUTES) {
    $<Element, string>(`[${attribute}]`).each((_, node) => {
      const element = $(node);
      pushCandidate(candidates, options, {
        text: element.attr(attribute),
        source,
        containerHint: attribute,
        declaredPriceCents: readAttributePrice(element),
        declaredStock: readDeclaredStock(element),
        images: readImages($, element, options.baseUrl),
      });
    });
  }

  return candidates;
}

function collectFromShopifyProduct(
  product: JsonRecord,
  options: CollectOptions,
  source: CandidateSource,
  alreadyCollected: number,
): Candidate[] {
  const candidates: Candidate[] = [];
  const optionNames = asArray(product.options).map((option, index) => {
    const record = asRecord(option);
    return asString(record?.name) ?? asString(option) ?? `option${index + 1}`;
  });

  for (const rawVariant of asArray(product.variants)) {
    const variant = asRecord(rawVariant);
    if (!variant) {
      continue;
    }

    const available = parseShopifyAvailability(variant.available);
    const featured = asRecord(variant.featured_image);
    optionNames.forEach((optionName, index) => {
      if (alreadyCollected + candidates.length >= options.maxCandidatesPerStrategy) {
        return;
      }
      const value = asString(variant[`option${index + 1}`]);
      if (!value || /^default title$/i.test(value)) {
        return;
      }
      pushCandidate(candidates, options, {
        text: value,
        source,
        containerHint: `shopify:options[${index}].${optionName}`,
        declaredPriceCents: parseShopifyPriceCents(variant.price) ?? undefined,
        declaredStock: available === false ? 0 : asFiniteNumber(variant.inventory_quantity),
        sku: asString(variant.sku),
        images: readJsonImages(featured?.src, options.baseUrl),
      });
    });
  }

  return candidates;
}

function pushCandidate(candidates: Candidate[], options: CollectOptions, draft: CandidateDraft): void {
  if (candidates.length >= options.maxCandidatesPerStrategy) {
    return;
  }

  const rawText = cleanOptionText(draft.text);
  if (!rawText) {
    return;
  }

  const candidate: Candidate = {
    rawText,
    source: draft.source,
    containerHint: draft.containerHint,
    images: Object.freeze([...new Set(draft.images ?? [])]),
    ...(typeof draft.declaredPriceCents === "number" ? { declaredPriceCents: draft.declaredPriceCents } : {}),
    ...(typeof draft.declaredStock === "number" ? { declaredStock: draft.declaredStock } : {}),
    ...(draft.sku ? { sku: draft.sku } : {}),
  };
  candidates.push(Object.freeze(candidate));
}

/** Matching entries that do not themselves contain another matching entry. */
function leafEntries($: CheerioAPI, scope: Cheerio<Element>, selector: string): Element[] {
  return scope
    .find(selector)
    .toArray()
    .filter((entry) => $(entry).find(selector).length === 0);
}

function describeContainer(container: Cheerio<Element>, selector: string): string {
  return (
    container.attr("id") ??
    container.attr("data-testid") ??
    container.attr("data-cy") ??
    container.attr("aria-label") ??
    selector.replace(/^[.#]/, "")
  );
}

function readOptionLabel(element: Cheerio<Element>): string | undefined {
  const text = collapseWhitespace(element.text());
  if (text) {
    return text;
  }

  const label =
    element.attr("aria-label") ??
    element.attr("title") ??
    element.find("img").first().attr("alt") ??
    element.attr("data-value") ??
    element.attr("value");
  return label?.replace(/^(?:click|tap) to select\s+/i, "");
}

function readDeclaredPrice(element: Cheerio<Element>): number | undefined {
  const priceNode = element.find(PRICE_SELECTORS).first();
  const fromNode = priceNode.length > 0 ? parseDisplayedPrice(priceNode.text()) : undefined;
  return fromNode ?? readAttributePrice(element) ?? parseDisplayedPrice(element.text());
}

function readAttributePrice(element: Cheerio<Element>): number | undefined {
  for (const attribute of PRICE_ATTRIBUTES) {
    const value = element.attr(attribute);
    if (value) {
      const parsed = parsePrice(value);
      if (parsed) {
        return parsed.priceCents;
      }
    }
  }
  return undefined;
}

function readDeclaredStock(element: Cheerio<Element>): number | undefined {
  const className = element.attr("class") ?? "";
  const signals = [element.text(), element.attr("aria-label"), element.attr("title"), element.attr("data-availability")]
    .filter(Boolean)
    .join(" ")
    .toLowerCase();

  if (
    element.is("[disabled]") ||
    element.attr("aria-disabled") === "true" ||
    /(unavailable|out-of-stock|soldout|sold-out)/i.test(className) ||
    /\b(out of stock|sold out|currently unavailable|unavailable)\b/.test(signals)
  ) {
    return 0;
  }

  const declared = element.attr("data-stock") ?? element.attr("data-quantity") ?? element.attr("data-inventory");
  if (declared && /^\d+$/.test(declared.trim())) {
    return Number.parseInt(declared, 10);
  }
  return undefined;
}

function readImages($: CheerioAPI, element: Cheerio<Element>, baseUrl: string | undefined): string[] {
  const images: string[] = [];
  const nodes = [element, ...element.find("img").toArray().map((node) => $(node))];

  for (const node of nodes) {
    for (const attribute of IMAGE_ATTRIBUTES) {
      const value = node.attr(attribute);
      const resolved = value ? resolveImageUrl(value, baseUrl) : null;
      if (resolved) {
        images.push(resolved);
      }
    }
  }

  return [...new Set(images)];
}

function readJsonImages(value: unknown, baseUrl: string | undefined): string[] {
  const images: string[] = [];
  for (const entry of asArray(value)) {
    const raw = asString(entry) ?? asString(asRecord(entry)?.url) ?? asString(asRecord(entry)?.contentUrl);
    const resolved = raw ? resolveImageUrl(raw, baseUrl) : null;
    if (resolved) {
      images.push(resolved);
    }
  }
  return images;
}

/**
 * Absolute, upgraded URL of a variant image, or null for anything that is not
 * one: placeholders, sprites and icons, non-image files, and relative paths with
 * no page address to resolve against. Protocol-relative URLs take the page's
 * protocol, else https.
 */
export function resolveImageUrl(value: string, baseUrl?: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length < 10) {
    return null;
  }

  const base = baseUrl && URL.canParse(baseUrl) ? new URL(baseUrl) : null;
  let resolved: string;
  if (/^https?:\/\//i.test(trimmed)) {
    resolved = trimmed;
  } else if (trimmed.startsWith("//")) {
    resolved = `${base?.protocol ?? "https:"}${trimmed}`;
  } else if (base && !/^[a-z][a-z0-9+.-]*:/i.test(trimmed) && URL.canParse(trimmed, base.href)) {
    resolved = new URL(trimmed, base).href;
  } else {
    return null;
  }

  if (NON_VARIANT_IMAGE.test(resolved) || !IMAGE_EXTENSION.test(resolved)) {
    return null;
  }
  return upgradeImageUrl(resolved);
}

function firstOffer(value: unknown): JsonRecord | null {
  for (const entry of asArray(value)) {
    const record = asRecord(entry);
    if (record) {
      return record;
    }
  }
  return null;
}

function readOfferPrice(offer: JsonRecord | null): number | undefined {
  if (!offer) {
    return undefined;
  }
  const specification = asRecord(offer.priceSpecification);
  const raw = offer.price ?? offer.lowPrice ?? specification?.price;
  if (typeof raw === "number") {
    return raw > 0 ? Math.round(raw * 100) : undefined;
  }
  return typeof raw === "string" ? parsePrice(raw)?.priceCents : undefined;
}

function readOfferStock(offer: JsonRecord | null): number | undefined {
  const availability = asString(offer?.availability)?.toLowerCase();
  if (!availability) {
    return undefined;
  }
  if (/(outofstock|soldout|discontinued)/.test(availability)) {
    return 0;
  }
  const inventory = asRecord(offer?.inventoryLevel);
  return asFiniteNumber(inventory?.value ?? offer?.inventoryLevel);
}

function readPropertyValue(value: unknown): string | undefined {
  const direct = asString(value);
  if (direct) {
    return direct;
  }
  const record = asRecord(value);
  return asString(record?.name) ?? asString(record?.value);
}

function stripProductName(name: string, productName: string | undefined): string {
  if (!productName || !name.startsWith(productName)) {
    return name;
  }
  const remainder = name.slice(productName.length).replace(/^[\s,\-–:(]+/, "").replace(/\)$/, "");
  return remainder || name;
}

function parseShopifyPriceCents(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    if (Number.isInteger(value)) {
      return value > 0 ? value : null;
    }
    return value > 0 ? Math.round(value * 100) : null;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    const parsed = Number.parseInt(trimmed, 10);
    return parsed > 0 ? parsed : null;
  }

  return parsePrice(trimmed)?.priceCents ?? null;
}

function parseShopifyAvailability(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value > 0;
  }
  if (typeof value !== "string") {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  if (["true", "1", "in_stock", "instock", "available"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "out_of_stock", "outofstock", "unavailable", "sold_out"].includes(normalized)) {
    return false;
  }
  return null;
}

function parseJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    // Malformed embedded JSON is treated as absent.
    return undefined;
  }
}

function flattenJsonLd(input: unknown): JsonRecord[] {
  const out: JsonRecord[] = [];

  const walk = (value: unknown) => {
    if (Array.isArray(value)) {
      for (const item of value) {
        walk(item);
      }
      return;
    }

    const record = asRecord(value);
    if (record) {
      if (Array.isArray(record["@graph"])) {
        walk(record["@graph"]);
      }
      out.push(record);
    }
  };

  walk(input);
  return out;
}

function normalizeType(type: unknown): string[] {
  return asArray(type)
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.toLowerCase());
}

function asRecord(value: unknown): JsonRecord | null {
  return value && typeof value === "object" && !Array.isArray(value) ? (value as JsonRecord) : null;
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value === undefined || value === null ? [] : [value];
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function asFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    return Math.floor(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}
