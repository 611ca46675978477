import { readFile } from "node:fs/promises";
import path from "node:path";

import { fetch } from "undici";
import { z } from "zod";

import type { BatchItem, PageContent } from "@variant-sieve/variants";

const REQUEST_HEADERS = {
  "user-agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "accept-language": "en-US,en;q=0.9",
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
};

const MANIFEST_ENTRY_SCHEMA = z
  .object({
    id: z.string().min(1).optional(),
    title: z.string().min(1),
    basePrice: z.union([z.number(), z.string(), z.null()]).default(null),
    productId: z.string().min(1).optional(),
    htmlPath: z.string().min(1).optional(),
    url: z.string().url().optional(),
    snapshotPaths: z.array(z.string().min(1)).default([]),
  })
  .refine((entry) => Boolean(entry.htmlPath || entry.url), { message: "htmlPath or url is required" });

const MANIFEST_SCHEMA = z.object({
  products: z.array(MANIFEST_ENTRY_SCHEMA),
});

export type ManifestEntry = z.infer<typeof MANIFEST_ENTRY_SCHEMA>;

type ManifestDependencies = {
  readText?: (filePath: string) => Promise<string>;
  fetchHtml?: (url: string, timeoutMs: number) => Promise<string>;
  fetchTimeoutMs?: number;
};

export async function loadManifest(manifestPath: string, deps: ManifestDependencies = {}): Promise<BatchItem[]> {
  const readText = deps.readText ?? readUtf8;
  const raw = await readText(manifestPath);

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new Error(`MANIFEST_INVALID:${manifestPath}:${error instanceof Error ? error.message : "unreadable"}`);
  }

  const parsed = MANIFEST_SCHEMA.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`MANIFEST_INVALID:${manifestPath}:${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid shape"}`);
  }

  const baseDir = path.dirname(path.resolve(manifestPath));
  return parsed.data.products.map((entry, index) => toBatchItem(entry, index, baseDir, deps));
}

export function toBatchItem(entry: ManifestEntry, index: number, baseDir: string, deps: ManifestDependencies = {}): BatchItem {
  const readText = deps.readText ?? readUtf8;
  const fetchHtml = deps.fetchHtml ?? fetchPageHtml;
  const fetchTimeoutMs = deps.fetchTimeoutMs ?? 15000;

  return {
    id: entry.id ?? entry.productId ?? `product-${index + 1}`,
    product: {
      title: entry.title,
      basePrice: entry.basePrice,
      productId: entry.productId,
    },
    async loadPage(): Promise<PageContent> {
      let html: string;
      if (entry.htmlPath) {
        html = await readText(path.resolve(baseDir, entry.htmlPath));
      } else if (entry.url) {
        html = await fetchHtml(entry.url, fetchTimeoutMs);
      } else {
        throw new Error(`MANIFEST_INVALID:${entry.title}:htmlPath or url is required`);
      }

      const snapshots = await Promise.all(entry.snapshotPaths.map((snapshotPath) => readText(path.resolve(baseDir, snapshotPath))));
      return { html, snapshots, sourceUrl: entry.url };
    },
  };
}

export async function fetchPageHtml(url: string, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      redirect: "manual",
      signal: controller.signal,
      headers: REQUEST_HEADERS,
    });

    if (response.status >= 300 && response.status < 400) {
      throw new Error(`REDIRECT_BLOCKED:${response.status}:${response.headers.get("location") ?? ""}`);
    }
    if (!response.ok) {
      throw new Error(`Fetch failed with status ${response.status}`);
    }

    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
}

function readUtf8(filePath: string): Promise<string> {
  return readFile(filePath, "utf8");
}
