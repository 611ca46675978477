import { classifyCandidates } from "./classify";
import { loadDocument, STATIC_STRATEGIES } from "./collect";
import { loadVariantConfig } from "./config";
import type { VariantConfig } from "./config";
import { deduplicateOptions } from "./dedupe";
import type { MergedVariant } from "./dedupe";
import { describeError, isCancellationError, throwIfCancelled } from "./errors";
import { collectInteractively } from "./interactive";
import type { InteractionSession } from "./interactive";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { filterNoise } from "./noise-filter";
import { toPriceCents } from "./price";
import { normalizeOptionName } from "./text";
import type {
  Candidate,
  CandidateSource,
  CollectionReport,
  ExtractionOutcome,
  FilteredOption,
  PageContent,
  ProductContext,
  RejectedOption,
  VerificationResult,
  VerificationVerdict,
} from "./types";
import { createSemanticVerifier } from "./verifier";
import type { SemanticVerifier } from "./verifier";

export type ExtractVariantsInput = {
  page: PageContent;
  product: ProductContext;
  session?: InteractionSession;
  signal?: AbortSignal;
};

type PipelineDependencies = {
  config?: VariantConfig;
  verifier?: SemanticVerifier;
  logger?: Logger;
  now?: () => number;
};

const AI_CONFIDENCE_FLOOR = 0.87;
const DEGRADED_CONFIDENCE_FACTOR = 0.8;
const EMPTY_CONFIDENCE = 0.5;

export class VariantPipeline {
  private config: VariantConfig;
  private verifier: SemanticVerifier;
  private logger: Logger;
  private now: () => number;

  constructor(deps: PipelineDependencies = {}) {
    this.config = deps.config ?? loadVariantConfig();
    this.logger = deps.logger ?? createLogger("variants");
    this.verifier = deps.verifier ?? createSemanticVerifier({ settings: this.config.verifier, logger: this.logger });
    this.now = deps.now ?? Date.now;
  }

  async extract(input: ExtractVariantsInput): Promise<ExtractionOutcome> {
    const basePriceCents = toPriceCents(input.product.basePrice);
    const warnings: string[] = [];
    let candidateCount = 0;
    let rejected: RejectedOption[] = [];
    let degraded = false;
    let fallback: FilteredOption[] = [];

    try {
      const report = await this.collect(input);
      candidateCount = report.candidates.length;
      degraded = report.timedOut;
      warnings.push(...report.warnings);

      throwIfCancelled(input.signal, "classify");
      const classified = classifyCandidates(report.candidates, this.config.recognizers);
      const filtered = filterNoise(classified, {
        recognizers: this.config.recognizers,
        maxOptionLength: this.config.limits.maxOptionLength,
      });
      rejected = filtered.rejected;
      fallback = filtered.kept;

      throwIfCancelled(input.signal, "verify");
      const verification = await this.verifier.verify({
        title: input.product.title,
        basePriceCents,
        options: filtered.kept,
        signal: input.signal,
      });

      throwIfCancelled(input.signal, "dedupe");
      const options = verification.status === "verified" ? verification.options : filtered.kept;
      const merged = deduplicateOptions({ options, basePriceCents, productId: input.product.productId });

      this.logger.debug(
        `${input.product.title}: ${candidateCount} candidates, ${rejected.length} rejected, ${merged.length} variants`,
      );

      return {
        status: "success",
        verdict: buildVerdict(merged, verification.status === "verified" ? "ai" : "rule_based", degraded),
        degraded,
        warnings,
        candidateCount,
        rejected,
        verifier: summarizeVerification(verification),
      };
    } catch (error) {
      if (isCancellationError(error)) {
        this.logger.info(`${input.product.title}: cancelled (${describeError(error)})`);
        return { status: "cancelled", reason: "CANCELLATION_REQUESTED" };
      }

      this.logger.error(`${input.product.title}: pipeline failed, keeping rule-based result`, error);
      warnings.push("PIPELINE_FAILED");
      const merged = deduplicateOptions({ options: fallback, basePriceCents, productId: input.product.productId });
      return {
        status: "success",
        verdict: buildVerdict(merged, "rule_based", degraded),
        degraded,
        warnings,
        candidateCount,
        rejected,
        verifier: { status: "unavailable" },
      };
    }
  }

  async collect(input: ExtractVariantsInput): Promise<CollectionReport> {
    const { limits, recognizers } = this.config;
    const collectOptions = { maxCandidatesPerStrategy: limits.maxCandidatesPerStrategy, baseUrl: input.page.sourceUrl };
    const perStrategy: Record<CandidateSource, number> = {
      container: 0,
      dropdown: 0,
      button_group: 0,
      structured_data: 0,
      data_attribute: 0,
      interactive: 0,
    };
    const report: CollectionReport = { candidates: [], perStrategy, clicks: 0, timedOut: false, warnings: [] };

    const $ = loadDocument(input.page.html);
    for (const strategy of STATIC_STRATEGIES) {
      throwIfCancelled(input.signal, strategy.source);
      try {
        const found = strategy.collect($, collectOptions);
        perStrategy[strategy.source] = found.length;
        report.candidates.push(...found);
      } catch (error) {
        report.warnings.push(`STRATEGY_FAILED:${strategy.source}`);
        this.logger.warn(`strategy ${strategy.source} failed: ${describeError(error)}`);
      }
    }

    const usable = countUsableNames(report.candidates, this.config);
    const hasInteractiveInput = Boolean(input.session) || (input.page.snapshots?.length ?? 0) > 0;
    if (usable >= limits.interactiveThreshold || !hasInteractiveInput) {
      return report;
    }

    throwIfCancelled(input.signal, "interactive");
    this.logger.debug(`only ${usable} usable candidates, trying interactive extraction`);
    const interactive = await collectInteractively({
      page: input.page,
      session: input.session,
      limits,
      logger: this.logger,
      signal: input.signal,
      now: this.now,
      stopWhen: (fresh) => fresh.length > 0 && classifyCandidates(fresh, recognizers).some((option) => isVariantLike(option.inferredType)),
    });

    perStrategy.interactive = interactive.candidates.length;
    report.candidates.push(...interactive.candidates);
    report.clicks = interactive.clicks;
    report.timedOut = interactive.timedOut;
    if (interactive.timedOut) {
      report.warnings.push("INTERACTION_TIMEOUT");
    }
    return report;
  }
}

export async function extractVariants(
  input: ExtractVariantsInput,
  deps: PipelineDependencies = {},
): Promise<ExtractionOutcome> {
  return new VariantPipeline(deps).extract(input);
}

function countUsableNames(candidates: readonly Candidate[], config: VariantConfig): number {
  const names = new Set<string>();
  for (const option of classifyCandidates(candidates, config.recognizers)) {
    if (isVariantLike(option.inferredType)) {
      names.add(normalizeOptionName(option.rawText));
    }
  }
  return names.size;
}

function isVariantLike(type: string): boolean {
  return type !== "quantity" && type !== "unrelated";
}

function buildVerdict(merged: MergedVariant[], method: VerificationVerdict["method"], degraded: boolean): VerificationVerdict {
  const scores = merged.map((entry) => entry.winner.confidence);
  let confidence = scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : EMPTY_CONFIDENCE;
  if (method === "ai") {
    confidence = Math.max(confidence, AI_CONFIDENCE_FLOOR);
  }
  if (degraded) {
    confidence *= DEGRADED_CONFIDENCE_FACTOR;
  }

  return {
    variants: merged.map((entry) => entry.variant),
    method,
    confidence: Math.round(confidence * 100) / 100,
  };
}

function summarizeVerification(verification: VerificationResult): Extract<ExtractionOutcome, { status: "success" }>["verifier"] {
  if (verification.status === "verified") {
    return { status: "verified", usage: verification.usage };
  }
  return { status: "unavailable", reason: verification.reason };
}
