import OpenAI from "openai";
import { z } from "zod";

import type { VerifierSettings } from "./config";
import { describeError, isCancellationError, isTimeoutError, withTimeout } from "./errors";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { collapseWhitespace, compactOptionKey, normalizeOptionName } from "./text";
import type { FilteredOption, VerificationResult, VerifierUnavailableReason, VerifierUsage } from "./types";

export type CompletionRequest = {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  maxOutputTokens: number;
  signal?: AbortSignal;
};

export type CompletionResponse = {
  content: string | null;
  tokenInput: number;
  tokenOutput: number;
};

export type CompletionTransport = (request: CompletionRequest) => Promise<CompletionResponse>;

export type VerifyInput = {
  title: string;
  basePriceCents: number | null;
  options: readonly FilteredOption[];
  signal?: AbortSignal;
};

export type SemanticVerifier = {
  verify(input: VerifyInput): Promise<VerificationResult>;
};

type SemanticVerifierDeps = {
  settings: VerifierSettings;
  transport?: CompletionTransport;
  logger?: Logger;
};

const VERIFIED_TYPES = ["color", "size", "storage", "style", "material", "unknown"] as const;

const VERIFIER_RESPONSE_SCHEMA = z.object({
  variants: z
    .array(
      z.object({
        type: z.enum(VERIFIED_TYPES),
        name: z.string().trim().min(1).max(80),
      }),
    )
    .max(200),
});

const SYSTEM_PROMPT =
  "You review option labels scraped from one product page and decide which are purchasable variants of that product. Return strict JSON with key variants: an array of {type, name}. type must be one of color, size, storage, style, material, unknown. Only return entries taken from the candidate list; never invent a variant. Drop page controls, quantity pickers, prices, navigation and marketing copy. Keep the candidate name, fixing only casing or obvious truncation. Correct the type when the candidate type is wrong.";

export function createOpenAiTransport(settings: VerifierSettings & { apiKey: string }): CompletionTransport {
  const client = new OpenAI({ apiKey: settings.apiKey, maxRetries: settings.maxRetries, timeout: settings.timeoutMs });

  return async (request) => {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        temperature: 0,
        max_tokens: request.maxOutputTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.userPrompt },
        ],
      },
      { signal: request.signal },
    );

    return {
      content: completion.choices[0]?.message?.content ?? null,
      tokenInput: completion.usage?.prompt_tokens ?? 0,
      tokenOutput: completion.usage?.completion_tokens ?? 0,
    };
  };
}

/**
 * Asks a language model to confirm, relabel or drop the filtered options. Every
 * failure comes back as an `unavailable` result with a reason so the caller can
 * keep the rule-based answer; only cancellation is thrown.
 */
export function createSemanticVerifier(deps: SemanticVerifierDeps): SemanticVerifier {
  const { settings } = deps;
  const logger = deps.logger ?? createLogger("verifier");
  const transport =
    deps.transport ?? (settings.apiKey ? createOpenAiTransport({ ...settings, apiKey: settings.apiKey }) : undefined);

  const unavailable = (reason: VerifierUnavailableReason, detail?: string): VerificationResult => {
    if (detail) {
      logger.warn(`verification unavailable (${reason}): ${detail}`);
    } else {
      logger.debug(`verification unavailable (${reason})`);
    }
    return { status: "unavailable", reason };
  };

  return {
    async verify(input) {
      if (!settings.enabled) {
        return unavailable("DISABLED");
      }
      if (input.options.length === 0) {
        return unavailable("NO_CANDIDATES");
      }
      if (!transport) {
        return unavailable("NO_CREDENTIAL");
      }

      let response: CompletionResponse;
      try {
        response = await withTimeout(
          transport({
            model: settings.model,
            systemPrompt: SYSTEM_PROMPT,
            userPrompt: buildUserPrompt(input),
            maxOutputTokens: settings.maxOutputTokens,
            signal: input.signal,
          }),
          settings.timeoutMs * (settings.maxRetries + 1),
          "verifier",
          input.signal,
        );
      } catch (error) {
        if (isCancellationError(error)) {
          throw error;
        }
        return unavailable(isTransportTimeout(error) ? "TIMEOUT" : "NETWORK_ERROR", describeError(error));
      }

      const content = response.content?.trim();
      if (!content) {
        return unavailable("EMPTY_RESPONSE", "service returned no content");
      }

      let payload: unknown;
      try {
        payload = JSON.parse(content);
      } catch (error) {
        return unavailable("MALFORMED_RESPONSE", describeError(error));
      }

      const parsed = VERIFIER_RESPONSE_SCHEMA.safeParse(payload);
      if (!parsed.success) {
        return unavailable("SCHEMA_MISMATCH", parsed.error.issues[0]?.message ?? "invalid shape");
      }

      const options = applyVerdicts(input.options, parsed.data.variants);
      const usage = estimateUsage(settings, response);
      logger.info(
        `verified ${options.length}/${input.options.length} options (${usage.tokenInput}+${usage.tokenOutput} tokens, $${usage.estimatedCostUsd.toFixed(6)})`,
      );
      return { status: "verified", options, usage };
    },
  };
}

function buildUserPrompt(input: VerifyInput): string {
  return JSON.stringify({
    title: input.title,
    basePrice: input.basePriceCents === null ? null : input.basePriceCents / 100,
    candidates: input.options.map((option) => ({ type: option.dimension, name: option.rawText })),
  });
}

/**
 * Maps each returned entry back to the candidate it names. Entries that match
 * no candidate are discarded, and candidates the service left out are dropped.
 */
export function applyVerdicts(
  options: readonly FilteredOption[],
  verdicts: ReadonlyArray<{ type: (typeof VERIFIED_TYPES)[number]; name: string }>,
): FilteredOption[] {
  const byName = new Map<string, FilteredOption[]>();
  const byCompactName = new Map<string, FilteredOption[]>();
  for (const option of options) {
    appendTo(byName, normalizeOptionName(option.rawText), option);
    const compact = compactOptionKey(option.rawText);
    if (compact) {
      appendTo(byCompactName, compact, option);
    }
  }

  const used = new Set<FilteredOption[]>();
  const confirmed: FilteredOption[] = [];
  for (const verdict of verdicts) {
    const group = byName.get(normalizeOptionName(verdict.name)) ?? byCompactName.get(compactOptionKey(verdict.name));
    if (!group || used.has(group)) {
      continue;
    }
    used.add(group);

    const name = collapseWhitespace(verdict.name);
    for (const option of group) {
      if (verdict.type === "unknown") {
        confirmed.push(Object.freeze({ ...option, rawText: name }));
        continue;
      }
      confirmed.push(
        Object.freeze({
          ...option,
          rawText: name,
          inferredType: verdict.type,
          dimension: verdict.type,
          confidence: Math.max(option.confidence, 0.9),
          lowConfidence: false,
        }),
      );
    }
  }

  return confirmed;
}

function appendTo(index: Map<string, FilteredOption[]>, key: string, option: FilteredOption): void {
  const group = index.get(key);
  if (group) {
    group.push(option);
  } else {
    index.set(key, [option]);
  }
}

function isTransportTimeout(error: unknown): boolean {
  if (isTimeoutError(error) || error instanceof OpenAI.APIConnectionTimeoutError) {
    return true;
  }
  return error instanceof Error && (error.name === "TimeoutError" || /timed? ?out/i.test(error.message));
}

function estimateUsage(settings: VerifierSettings, response: CompletionResponse): VerifierUsage {
  const pricing = getDefaultModelPricing(settings.model);
  const inputRatePer1M = settings.inputCostPer1M ?? pricing.inputPer1M;
  const outputRatePer1M = settings.outputCostPer1M ?? pricing.outputPer1M;
  return {
    tokenInput: response.tokenInput,
    tokenOutput: response.tokenOutput,
    estimatedCostUsd: (response.tokenInput / 1_000_000) * inputRatePer1M + (response.tokenOutput / 1_000_000) * outputRatePer1M,
  };
}

export function getDefaultModelPricing(model: string): { inputPer1M: number; outputPer1M: number } {
  const normalized = model.toLowerCase();

  if (normalized.startsWith("gpt-5-mini")) {
    return { inputPer1M: 0.25, outputPer1M: 2.0 };
  }
  if (normalized.startsWith("gpt-5-nano")) {
    return { inputPer1M: 0.05, outputPer1M: 0.4 };
  }
  if (normalized.startsWith("gpt-5")) {
    return { inputPer1M: 1.25, outputPer1M: 10.0 };
  }
  if (normalized.startsWith("gpt-4.1-mini")) {
    return { inputPer1M: 0.4, outputPer1M: 1.6 };
  }
  if (normalized.startsWith("gpt-4o-mini")) {
    return { inputPer1M: 0.15, outputPer1M: 0.6 };
  }

  return { inputPer1M: 0.25, outputPer1M: 2.0 };
}
