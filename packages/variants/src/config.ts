import { z } from "zod";

import recognizerData from "../data/recognizers.json";
import type { DimensionType } from "./types";

export const DIMENSION_ORDER: readonly DimensionType[] = ["color", "size", "storage", "style", "material"];

const DIMENSION_TABLE_SCHEMA = z.object({
  containerKeywords: z.array(z.string().min(1)),
  keywords: z.array(z.string().min(1)),
  patterns: z.array(z.string().min(1)),
});

const RECOGNIZER_FILE_SCHEMA = z.object({
  dimensions: z.object({
    color: DIMENSION_TABLE_SCHEMA,
    size: DIMENSION_TABLE_SCHEMA,
    storage: DIMENSION_TABLE_SCHEMA,
    style: DIMENSION_TABLE_SCHEMA,
    material: DIMENSION_TABLE_SCHEMA,
  }),
  uiPhrases: z.array(z.string().min(1)),
  placeholders: z.array(z.string().min(1)),
  navigationLabels: z.array(z.string().min(1)),
});

export type RecognizerFile = z.infer<typeof RECOGNIZER_FILE_SCHEMA>;

export type DimensionRecognizer = Readonly<{
  type: DimensionType;
  containerKeywords: ReadonlySet<string>;
  keywords: ReadonlySet<string>;
  patterns: readonly RegExp[];
}>;

export type RecognizerTables = Readonly<{
  dimensions: readonly DimensionRecognizer[];
  uiPhrases: ReadonlySet<string>;
  placeholders: ReadonlySet<string>;
  navigationLabels: ReadonlySet<string>;
}>;

export type ExtractionLimits = Readonly<{
  maxClicks: number;
  clickTimeoutMs: number;
  interactiveTimeoutMs: number;
  /** Interactive extraction only runs when fewer usable candidates than this were collected. */
  interactiveThreshold: number;
  maxOptionLength: number;
  maxCandidatesPerStrategy: number;
}>;

export type VerifierSettings = Readonly<{
  enabled: boolean;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  maxOutputTokens: number;
  /** USD per million tokens; the model's list price applies when unset. */
  inputCostPer1M?: number;
  outputCostPer1M?: number;
}>;

export type VariantConfig = Readonly<{
  recognizers: RecognizerTables;
  limits: ExtractionLimits;
  verifier: VerifierSettings;
}>;

export type VariantConfigOverrides = {
  recognizers?: RecognizerFile;
  limits?: Partial<ExtractionLimits>;
  verifier?: Partial<VerifierSettings>;
};

const DEFAULT_SMALL_MODEL = "gpt-5-mini";

export function buildRecognizerTables(input: unknown): RecognizerTables {
  const parsed = RECOGNIZER_FILE_SCHEMA.parse(input);

  const dimensions = DIMENSION_ORDER.map((type) => {
    const table = parsed.dimensions[type];
    return Object.freeze({
      type,
      containerKeywords: toLowerSet(table.containerKeywords),
      keywords: toLowerSet(table.keywords),
      patterns: Object.freeze(table.patterns.map((pattern) => new RegExp(pattern, "i"))),
    });
  });

  return Object.freeze({
    dimensions: Object.freeze(dimensions),
    uiPhrases: toLowerSet(parsed.uiPhrases),
    placeholders: toLowerSet(parsed.placeholders),
    navigationLabels: toLowerSet(parsed.navigationLabels),
  });
}

const DEFAULT_RECOGNIZERS = buildRecognizerTables(recognizerData);

export function loadVariantConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: VariantConfigOverrides = {},
): VariantConfig {
  const recognizers = overrides.recognizers ? buildRecognizerTables(overrides.recognizers) : DEFAULT_RECOGNIZERS;

  const limits: ExtractionLimits = Object.freeze({
    maxClicks: parseEnvInt(env.VARIANT_MAX_CLICKS, 5, 0, 10),
    clickTimeoutMs: parseEnvInt(env.VARIANT_CLICK_TIMEOUT_MS, 3000, 250, 15000),
    interactiveTimeoutMs: parseEnvInt(env.VARIANT_INTERACTIVE_TIMEOUT_MS, 15000, 1000, 60000),
    interactiveThreshold: parseEnvInt(env.VARIANT_INTERACTIVE_THRESHOLD, 2, 1, 20),
    maxOptionLength: parseEnvInt(env.VARIANT_MAX_OPTION_LENGTH, 64, 16, 200),
    maxCandidatesPerStrategy: parseEnvInt(env.VARIANT_MAX_CANDIDATES_PER_STRATEGY, 120, 10, 500),
    ...overrides.limits,
  });

  const apiKey = env.OPENAI_API_KEY?.trim() || undefined;
  const verifier: VerifierSettings = Object.freeze({
    enabled: env.VARIANT_VERIFIER_ENABLED !== "false",
    apiKey,
    model: env.OPENAI_MODEL_SMALL ?? DEFAULT_SMALL_MODEL,
    timeoutMs: parseEnvInt(env.VERIFIER_TIMEOUT_MS, 20000, 2000, 120000),
    maxRetries: parseEnvInt(env.VERIFIER_MAX_RETRIES, 2, 0, 5),
    maxOutputTokens: parseEnvInt(env.VERIFIER_MAX_OUTPUT_TOKENS, 400, 80, 2000),
    inputCostPer1M: parseRate(env.OPENAI_INPUT_COST_PER_1M),
    outputCostPer1M: parseRate(env.OPENAI_OUTPUT_COST_PER_1M),
    ...overrides.verifier,
  });

  return Object.freeze({ recognizers, limits, verifier });
}

export function parseEnvNumber(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = raw ? Number.parseFloat(raw) : fallback;
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, min), max);
}

export function parseEnvInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = raw ? Number.parseInt(raw, 10) : fallback;
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, min), max);
}

function parseRate(raw: string | undefined): number | undefined {
  const parsed = raw ? Number.parseFloat(raw) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function toLowerSet(values: string[]): ReadonlySet<string> {
  return new Set(values.map((value) => value.trim().toLowerCase()));
}
