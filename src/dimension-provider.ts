import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { Logger } from "./logger.ts";
import { defaultLogger } from "./logger.ts";
import type { ImageDimensions } from "./page-types.ts";

export const GALLICA_IIIF_PATTERN = /^https:\/\/gallica\.bnf\.fr\/iiif\/ark:\/12148\/([^/]+)\/(f\d+)/;
export const GALLICA_IIIF_PREFIX = "https://gallica.bnf.fr/iiif";
export const GALLICA_IIIF_V3_PREFIX = "https://openapi.bnf.fr/iiif/presentation/v3";
export const GALLICA_PAGINATION_URL = "https://gallica.bnf.fr/services/Pagination";
export const GALLICA_REQUEST_TIMEOUT_MS = 10_000;
export const IIIF_INFO_ATTEMPTS = 5;

/**
 * Resolves pixel dimensions of a page image. Rejecting means the lookup failed;
 * resolving to undefined means the dimensions cannot be determined at all.
 */
export interface DimensionProvider {
  resolveDimensions(imageUri: string): Promise<ImageDimensions | undefined>;
}

export class DimensionLookupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DimensionLookupError";
  }
}

export interface GallicaPageEntry {
  ordre?: string;
  image_width?: string;
  image_height?: string;
}

/** Parsed pagination documents keyed by ark id, kept for the lifetime of one run. */
export class PaginationCache {
  private readonly entries = new Map<string, GallicaPageEntry[]>();

  get(arkId: string): GallicaPageEntry[] | undefined {
    return this.entries.get(arkId);
  }

  set(arkId: string, pages: GallicaPageEntry[]): void {
    this.entries.set(arkId, pages);
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface IiifDimensionProviderOptions {
  cache?: PaginationCache;
  logger?: Logger;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  attempts?: number;
}

const iiifInfoSchema = z.object({
  width: z.number(),
  height: z.number(),
});

const paginationParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (name) => name === "page",
});

export function patchGallicaIiifUri(uri: string): string {
  if (!uri.startsWith(GALLICA_IIIF_PREFIX)) return uri;
  return uri.replace(GALLICA_IIIF_PREFIX, GALLICA_IIIF_V3_PREFIX);
}

export function parseGallicaIiifUri(uri: string): { arkId: string; pageNumber: string } | undefined {
  const match = GALLICA_IIIF_PATTERN.exec(uri);
  if (!match) return undefined;
  return { arkId: match[1], pageNumber: match[2] };
}

export function parsePaginationXml(xml: string): GallicaPageEntry[] {
  const pages: GallicaPageEntry[] = [];
  collectPageEntries(paginationParser.parse(xml), pages);
  return pages;
}

export function findGallicaPageDimensions(
  pages: readonly GallicaPageEntry[],
  pageNumber: string,
): ImageDimensions | undefined {
  const order = pageNumber.startsWith("f") ? pageNumber.slice(1) : pageNumber;
  for (const page of pages) {
    if (page.ordre !== order || !page.image_width || !page.image_height) continue;
    const width = Number.parseInt(page.image_width, 10);
    const height = Number.parseInt(page.image_height, 10);
    if (Number.isFinite(width) && Number.isFinite(height)) return { width, height };
  }
  return undefined;
}

export class IiifDimensionProvider implements DimensionProvider {
  private readonly cache: PaginationCache;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly attempts: number;

  constructor(options: IiifDimensionProviderOptions = {}) {
    this.cache = options.cache ?? new PaginationCache();
    this.logger = options.logger ?? defaultLogger;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.attempts = options.attempts ?? IIIF_INFO_ATTEMPTS;
  }

  async resolveDimensions(imageUri: string): Promise<ImageDimensions | undefined> {
    const gallica = parseGallicaIiifUri(imageUri);
    if (gallica) {
      this.logger.debug(
        `Detected Gallica URI, using pagination XML for ARK ${gallica.arkId}, page ${gallica.pageNumber}`,
      );
      return this.resolveFromPagination(gallica.arkId, gallica.pageNumber);
    }
    return this.resolveFromInfoJson(imageUri);
  }

  private async resolveFromPagination(arkId: string, pageNumber: string): Promise<ImageDimensions | undefined> {
    try {
      const pages = await this.loadPagination(arkId);
      const dimensions = findGallicaPageDimensions(pages, pageNumber);
      if (!dimensions) {
        this.logger.warn(`Page ${pageNumber} not found in pagination XML for ${arkId}`);
        return undefined;
      }
      this.logger.debug(`Found dimensions for page ${pageNumber}: ${dimensions.width}x${dimensions.height}`);
      return dimensions;
    } catch (error: unknown) {
      this.logger.error(
        `Failed to fetch dimensions from Gallica XML for ${arkId}, page ${pageNumber}: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  private async loadPagination(arkId: string): Promise<GallicaPageEntry[]> {
    const cached = this.cache.get(arkId);
    if (cached) {
      this.logger.debug(`Using cached pagination XML for ARK ${arkId}`);
      return cached;
    }

    const url = `${GALLICA_PAGINATION_URL}?ark=${encodeURIComponent(arkId)}`;
    this.logger.info(`Fetching pagination XML from ${url}`);
    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(GALLICA_REQUEST_TIMEOUT_MS) });
    if (!response.ok) throw new Error(`Pagination request failed with status ${response.status}`);

    const pages = parsePaginationXml(await response.text());
    this.cache.set(arkId, pages);
    this.logger.info(`Cached pagination XML for ARK ${arkId}`);
    return pages;
  }

  private async resolveFromInfoJson(imageUri: string): Promise<ImageDimensions> {
    const infoUrl = `${imageUri}/info.json`;
    let lastError: unknown;

    for (let attempt = 0; attempt < this.attempts; attempt++) {
      try {
        this.logger.debug(`Loading IIIF manifest from ${infoUrl} (attempt ${attempt + 1})`);
        const response = await this.fetchImpl(infoUrl, { signal: AbortSignal.timeout((1 + attempt) * 1000) });
        if (!response.ok) throw new Error(`IIIF info request failed with status ${response.status}`);
        const info = iiifInfoSchema.parse(await response.json());
        this.logger.debug(`Fetched image dimensions from ${infoUrl}: ${info.width}x${info.height}`);
        return { width: info.width, height: info.height };
      } catch (error: unknown) {
        lastError = error;
        this.logger.error(`Attempt ${attempt + 1} failed for ${infoUrl}: ${describeError(error)}`);
        if (attempt + 1 < this.attempts) await this.sleep((1 + attempt) * 1000);
      }
    }

    throw new DimensionLookupError(
      `Failed to fetch image dimensions from ${infoUrl} after ${this.attempts} attempts: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function collectPageEntries(node: unknown, pages: GallicaPageEntry[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectPageEntries(item, pages);
    return;
  }
  if (typeof node !== "object" || node === null) return;

  for (const [key, value] of Object.entries(node)) {
    if (key === "page" && Array.isArray(value)) {
      for (const entry of value) {
        if (typeof entry === "object" && entry !== null) pages.push(toGallicaPageEntry(entry));
      }
    } else {
      collectPageEntries(value, pages);
    }
  }
}

function toGallicaPageEntry(entry: object): GallicaPageEntry {
  const fields = new Map<string, unknown>(Object.entries(entry));
  return {
    ordre: readText(fields.get("ordre")),
    image_width: readText(fields.get("image_width")),
    image_height: readText(fields.get("image_height")),
  };
}

function readText(value: unknown): string | undefined {
  return typeof value === "string" ? value.trim() : undefined;
}
