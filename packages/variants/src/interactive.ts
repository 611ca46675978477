import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

import { collectVisibleOptions, loadDocument } from "./collect";
import type { ExtractionLimits } from "./config";
import { describeError, isCancellationError, isTimeoutError, throwIfCancelled, withTimeout } from "./errors";
import type { Logger } from "./logger";
import { collapseWhitespace } from "./text";
import type { Candidate, PageContent } from "./types";

/**
 * A live page owned by the caller. The pipeline only clicks and reads; opening,
 * navigating and closing the page stay with whoever created it.
 */
export type InteractionSession = {
  /** Clicks the `index`-th match of `selector`. Resolves false when the element is missing or not clickable. */
  click(selector: string, index: number, options: { timeoutMs: number; signal: AbortSignal }): Promise<boolean>;
  content(): Promise<string>;
};

export type ClickTarget = {
  selector: string;
  index: number;
  label: string;
};

export type InteractiveCollectInput = {
  page: PageContent;
  session?: InteractionSession;
  limits: ExtractionLimits;
  logger: Logger;
  signal?: AbortSignal;
  /** Checked after every snapshot; returning true ends the phase early. */
  stopWhen?: (fresh: Candidate[]) => boolean;
  now?: () => number;
};

export type InteractiveCollectResult = {
  candidates: Candidate[];
  clicks: number;
  timedOut: boolean;
  stoppedEarly: boolean;
};

const EXPANDER_SELECTORS = [
  "[data-action='a-dropdown-button']",
  ".a-dropdown-container .a-button-dropdown",
  "#variation_color_name .a-dropdown-container",
  "#variation_size_name .a-dropdown-container",
  "#variation_storage_name .a-dropdown-container",
  ".a-button-toggle[data-action*='twister']",
  ".twister-plus-buying-options .a-button",
  "[data-testid*='variation'] .a-button",
  ".a-button[aria-label*='see']",
  ".a-button[aria-label*='view']",
  ".a-button[aria-label*='more']",
  "[data-action*='see-all']",
  "[data-action*='view-all']",
  ".size-button-group .a-button",
  ".color-button-group .a-button",
  ".twister-content .a-button",
];

const MAX_TRIGGERS_PER_SELECTOR = 5;
const SKIPPED_TRIGGER_LABELS = new Set(["", "selected", "current"]);

export function planClicks($: CheerioAPI, maxClicks: number): ClickTarget[] {
  const plan: ClickTarget[] = [];
  const seen = new Set<Element>();

  for (const selector of EXPANDER_SELECTORS) {
    const matches = $<Element, string>(selector).toArray().slice(0, MAX_TRIGGERS_PER_SELECTOR);
    for (const [index, node] of matches.entries()) {
      if (plan.length >= maxClicks) {
        return plan;
      }
      const label = collapseWhitespace($(node).text()).toLowerCase();
      if (seen.has(node) || SKIPPED_TRIGGER_LABELS.has(label)) {
        continue;
      }
      seen.add(node);
      plan.push({ selector, index, label });
    }
  }

  return plan;
}

export async function collectInteractively(input: InteractiveCollectInput): Promise<InteractiveCollectResult> {
  const { limits, logger } = input;
  const now = input.now ?? Date.now;
  const deadline = now() + limits.interactiveTimeoutMs;
  const collectOptions = { maxCandidatesPerStrategy: limits.maxCandidatesPerStrategy, baseUrl: input.page.sourceUrl };
  const result: InteractiveCollectResult = { candidates: [], clicks: 0, timedOut: false, stoppedEarly: false };

  const absorb = (html: string, label: string): boolean => {
    const fresh = collectVisibleOptions(loadDocument(html), "interactive", collectOptions);
    result.candidates.push(...fresh);
    logger.debug(`${label} yielded ${fresh.length} candidates`);
    if (input.stopWhen?.(fresh)) {
      result.stoppedEarly = true;
      return true;
    }
    return false;
  };

  for (const [index, snapshot] of (input.page.snapshots ?? []).entries()) {
    throwIfCancelled(input.signal, "interactive");
    if (now() >= deadline) {
      result.timedOut = true;
      return result;
    }
    if (absorb(snapshot, `snapshot ${index}`)) {
      return result;
    }
  }

  const session = input.session;
  if (!session) {
    return result;
  }

  for (const target of planClicks(loadDocument(input.page.html), limits.maxClicks)) {
    throwIfCancelled(input.signal, "interactive");
    const remaining = deadline - now();
    if (remaining <= 0) {
      result.timedOut = true;
      break;
    }

    const timeoutMs = Math.min(limits.clickTimeoutMs, remaining);
    const { controller, dispose } = linkAbortSignal(input.signal);
    try {
      const clicked = await withTimeout(
        session.click(target.selector, target.index, { timeoutMs, signal: controller.signal }),
        timeoutMs,
        `click ${target.selector}`,
        input.signal,
      );
      if (!clicked) {
        continue;
      }
      result.clicks += 1;

      const html = await withTimeout(session.content(), Math.max(deadline - now(), 1), "content", input.signal);
      if (absorb(html, `click ${result.clicks} (${target.label})`)) {
        break;
      }
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      if (isTimeoutError(error)) {
        controller.abort();
        if (now() >= deadline) {
          result.timedOut = true;
          break;
        }
      }
      logger.warn(`click on ${target.selector}[${target.index}] failed: ${describeError(error)}`);
    } finally {
      dispose();
    }
  }

  if (result.timedOut) {
    logger.warn(`interactive phase stopped after ${limits.interactiveTimeoutMs}ms with ${result.candidates.length} candidates`);
  }
  return result;
}

function linkAbortSignal(signal: AbortSignal | undefined): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  if (!signal) {
    return { controller, dispose: () => undefined };
  }
  const relay = () => controller.abort();
  if (signal.aborted) {
    controller.abort();
  } else {
    signal.addEventListener("abort", relay, { once: true });
  }
  return { controller, dispose: () => signal.removeEventListener("abort", relay) };
}
