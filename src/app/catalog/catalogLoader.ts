/**
 * Product catalog file loading.
 *
 * Reads the shop's catalog export and turns each product row into an index
 * input:
 * - Validates file existence and the 5 MB size limit
 * - Accepts a phpMyAdmin JSON export (the `products` table entry) or a plain
 *   array of rows
 * - Normalizes markdown/HTML descriptions to plain text
 * - Skips rows with no id or no text, and counts them
 * - Optionally folds customer comments (the `comments` table) and offline
 *   review summaries into each product's text
 */
import fs from "fs";

import MarkdownIt from "markdown-it";
import { z } from "zod";

import { InvalidInputError, NotFoundError } from "@domain/errors";
import type { ProductInput } from "@domain/rag/types";
import { logEvent } from "@infrastructure/logging/Logger";

export const MAX_CATALOG_BYTES = 5 * 1024 * 1024;
export const MAX_COMMENTS_PER_PRODUCT = 5;
export const MAX_QUOTES_PER_SUMMARY = 2;

const md = new MarkdownIt({ html: true });

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

const scalar = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

const ProductRowSchema = z
  .object({
    id: scalar,
    product_id: scalar,
    nameFa: scalar,
    nameEn: scalar,
    description: scalar,
  })
  .passthrough();

type ProductRow = z.infer<typeof ProductRowSchema>;

const CommentRowSchema = z
  .object({
    product_id: scalar,
    description: scalar,
  })
  .passthrough();

const QuotesSchema = z
  .union([z.array(z.unknown()), z.string()])
  .nullish()
  .transform((value): unknown[] => {
    if (value === null || value === undefined) {
      return [];
    }
    if (Array.isArray(value)) {
      return value;
    }
    // Some exports store the list as a JSON string.
    try {
      const decoded: unknown = JSON.parse(value);
      return Array.isArray(decoded) ? decoded : [value];
    } catch {
      return [value];
    }
  });

const SummaryRowSchema = z
  .object({
    product_id: scalar,
    nameFa: scalar,
    summary: scalar,
    quotes: QuotesSchema,
  })
  .passthrough();

export interface ReviewSummary {
  nameFa: string;
  summary: string;
  quotes: string[];
}

/** Extra per-product material, keyed by product id. */
export interface CatalogExtras {
  comments: Map<string, string[]>;
  summaries: Map<string, ReviewSummary>;
}

export interface CatalogSources {
  /** phpMyAdmin export with a `comments` table, or a plain array of comment rows. */
  comments?: unknown;
  /** Array of `{ product_id, nameFa, summary, quotes }` rows. */
  summaries?: unknown;
}

export interface CatalogFileOptions {
  commentsPath?: string;
  summariesPath?: string;
}

const TableEntrySchema = z.object({
  type: z.literal("table"),
  name: z.string(),
  data: z.array(z.unknown()).nullish(),
});

export interface CatalogParseResult {
  products: ProductInput[];
  skipped: number;
}

export function normalizeDescription(raw: string): string {
  if (!raw.trim()) {
    return "";
  }

  return md
    .render(raw)
    .replace(/<[^>]+>/g, " ")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

function cleanText(raw: unknown): string {
  return typeof raw === "string" ? raw.replace(/\s+/g, " ").trim() : "";
}

function reviewSections(comments: readonly string[], review: ReviewSummary | undefined): string {
  let text = "";

  if (comments.length > 0) {
    text += `\nCOMMENTS:\n${comments.join("\n")}`;
  }
  if (review) {
    text += `\nSUMMARY:\n${review.summary}`;
    if (review.quotes.length > 0) {
      text += `\nQUOTES:\n${review.quotes.map((quote) => `- ${quote}`).join("\n")}`;
    }
  }

  return text;
}

export function productText(
  row: { nameFa: string; nameEn: string; description: string },
  comments: readonly string[] = [],
  review?: ReviewSummary
): string {
  return (
    `PRODUCT: ${row.nameFa} | ${row.nameEn}\nDESC: ${normalizeDescription(row.description)}` +
    reviewSections(comments, review)
  );
}

function extractRows(data: unknown, tableName: string, label: string): unknown[] {
  if (!Array.isArray(data)) {
    throw new InvalidInputError(`${label} must be a JSON array`);
  }
  const entries: unknown[] = data;

  for (const entry of entries) {
    const table = TableEntrySchema.safeParse(entry);
    if (table.success && table.data.name === tableName) {
      return table.data.data ?? [];
    }
  }

  // Not a phpMyAdmin export: a plain array of rows.
  return entries.filter((entry) => {
    const table = TableEntrySchema.safeParse(entry);
    return !table.success;
  });
}

/** Up to `MAX_COMMENTS_PER_PRODUCT` non-empty comments per product id, in file order. */
export function groupComments(data: unknown): Map<string, string[]> {
  const grouped = new Map<string, string[]>();

  for (const raw of extractRows(data, "comments", "Comments")) {
    const row = CommentRowSchema.safeParse(raw);
    if (!row.success || !row.data.product_id) {
      continue;
    }
    const text = cleanText(row.data.description);
    if (!text) {
      continue;
    }

    const list = grouped.get(row.data.product_id) ?? [];
    if (list.length < MAX_COMMENTS_PER_PRODUCT) {
      list.push(text);
      grouped.set(row.data.product_id, list);
    }
  }

  return grouped;
}

/** Last summary per product id wins; quotes are capped at `MAX_QUOTES_PER_SUMMARY`. */
export function parseSummaries(data: unknown): Map<string, ReviewSummary> {
  if (!Array.isArray(data)) {
    throw new InvalidInputError("Summaries must be a JSON array");
  }
  const rows: unknown[] = data;
  const summaries = new Map<string, ReviewSummary>();

  for (const raw of rows) {
    const row = SummaryRowSchema.safeParse(raw);
    if (!row.success || !row.data.product_id || !row.data.summary) {
      continue;
    }

    summaries.set(row.data.product_id, {
      nameFa: row.data.nameFa,
      summary: row.data.summary,
      quotes: row.data.quotes
        .map(cleanText)
        .filter((quote) => quote.length > 0)
        .slice(0, MAX_QUOTES_PER_SUMMARY),
    });
  }

  return summaries;
}

function toInput(row: ProductRow, extras: CatalogExtras): ProductInput | null {
  const productId = row.id || row.product_id;
  if (!productId) {
    return null;
  }

  if (!row.nameFa && !row.nameEn && !normalizeDescription(row.description)) {
    return null;
  }

  const comments = extras.comments.get(productId) ?? [];
  const review = extras.summaries.get(productId);

  return {
    productId,
    textDescription: productText(row, comments, review),
    metadata: { nameFa: row.nameFa, nameEn: row.nameEn },
  };
}

export function parseCatalog(data: unknown, sources: CatalogSources = {}): CatalogParseResult {
  const extras: CatalogExtras = {
    comments: sources.comments === undefined ? new Map() : groupComments(sources.comments),
    summaries: sources.summaries === undefined ? new Map() : parseSummaries(sources.summaries),
  };
  const products: ProductInput[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const raw of extractRows(data, "products", "Catalog")) {
    const row = ProductRowSchema.safeParse(raw);
    const input = row.success ? toInput(row.data, extras) : null;
    if (input) {
      products.push(input);
      seen.add(input.productId);
    } else {
      skipped++;
    }
  }

  // A reviewed product missing from the catalog is still searchable by its summary.
  for (const [productId, review] of extras.summaries) {
    if (seen.has(productId)) {
      continue;
    }
    products.push({
      productId,
      textDescription: `PRODUCT: ${review.nameFa}` + reviewSections([], review),
      metadata: { nameFa: review.nameFa, nameEn: "" },
    });
  }

  return { products, skipped };
}

function readJsonFile(filepath: string, label: string): unknown {
  if (!fs.existsSync(filepath)) {
    throw new NotFoundError(`${label} file not found`, { filepath });
  }

  const fileStats = fs.statSync(filepath);
  if (fileStats.size > MAX_CATALOG_BYTES) {
    throw new InvalidInputError("File too large (max 5MB)", {
      filepath,
      size: fileStats.size,
    });
  }

  try {
    const data: unknown = JSON.parse(fs.readFileSync(filepath, "utf-8"));
    return data;
  } catch (error: unknown) {
    throw new InvalidInputError(`${label} file is not valid JSON`, {
      filepath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export function loadCatalogFile(
  filepath: string,
  options: CatalogFileOptions = {}
): CatalogParseResult {
  if (!filepath) {
    throw new InvalidInputError("filepath required");
  }

  const data = readJsonFile(filepath, "Catalog");
  const sources: CatalogSources = {};
  if (options.commentsPath) {
    sources.comments = readJsonFile(options.commentsPath, "Comments");
  }
  if (options.summariesPath) {
    sources.summaries = readJsonFile(options.summariesPath, "Summaries");
  }

  const result = parseCatalog(data, sources);

  logEvent("CATALOG_LOADED", {
    filepath,
    commentsPath: options.commentsPath ?? null,
    summariesPath: options.summariesPath ?? null,
    products: result.products.length,
    skipped: result.skipped,
  });

  return result;
}
