import { open, readFile } from "node:fs/promises";
import { checkPageBoundaries } from "./boundary-check.ts";
import type { DimensionProvider } from "./dimension-provider.ts";
import { describeError, patchGallicaIiifUri } from "./dimension-provider.ts";
import type { Logger } from "./logger.ts";
import { defaultLogger } from "./logger.ts";
import { readPageRecords } from "./page-source.ts";
import type { ReadPageRecordsOptions } from "./page-source.ts";
import { parsePage } from "./page-schema.ts";
import { computePageStatistics } from "./page-statistics.ts";
import type { BatchTotals, ImageDimensions, Page, PageReport, PageStatistics } from "./page-types.ts";
import { SENTINEL_DIMENSION } from "./page-types.ts";

export interface ProcessPageOptions {
  timestamp: string;
  gitVersion?: string;
  patchGallicaV3?: boolean;
  logger?: Logger;
}

export interface ReportSink {
  write(line: string): Promise<void>;
  close(): Promise<void>;
}

export interface RunBoundaryCheckInput {
  inputPath: string;
  outputPath: string;
  gitVersion?: string;
  patchGallicaV3?: boolean;
  random?: boolean;
}

export interface RunBoundaryCheckDependencies {
  dimensionProvider: DimensionProvider;
  logger?: Logger;
  now?: () => Date;
  readPages?: (inputPath: string, options: ReadPageRecordsOptions) => AsyncIterable<unknown>;
  openSink?: (outputPath: string) => Promise<ReportSink>;
}

export interface RunBoundaryCheckResult {
  totals: BatchTotals;
  failedPages: number;
}

export const EMPTY_BATCH_TOTALS: Readonly<BatchTotals> = Object.freeze({
  total_pages: 0,
  total_lines: 0,
  out_of_bounds_lines: 0,
  out_of_bounds_paragraphs: 0,
  out_of_bounds_regions: 0,
  total_out_of_bounds: 0,
});

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** `iiif` is only consulted when `iiif_img_base_uri` is absent, not when it is null. */
export function resolveImageUri(page: Page): string | undefined {
  const uri = page.iiif_img_base_uri !== undefined ? page.iiif_img_base_uri : page.iiif;
  return uri ?? undefined;
}

/**
 * Builds the report for one page, or returns undefined when the page has no
 * image reference or its dimensions cannot be determined. A rejected dimension
 * lookup is not fatal: the page is checked against SENTINEL_DIMENSION on both
 * axes and the lookup error is recorded in the report.
 */
export async function processPage(
  page: Page,
  dimensionProvider: DimensionProvider,
  { timestamp, gitVersion, patchGallicaV3 = false, logger = defaultLogger }: ProcessPageOptions,
): Promise<PageReport | undefined> {
  const sourceUri = resolveImageUri(page);
  if (!sourceUri) {
    logger.error(`No IIIF base URI found for page ${page.id}.`);
    return undefined;
  }

  const imageUri = patchGallicaV3 ? patchGallicaIiifUri(sourceUri) : sourceUri;
  if (imageUri !== sourceUri) logger.info(`Patched IIIF link for page ${page.id} to ${imageUri}`);

  let dimensions: ImageDimensions | undefined;
  let lookupError: string | undefined;
  try {
    dimensions = await dimensionProvider.resolveDimensions(imageUri);
    logger.info(`Retrieved IIIF for ${page.id} from ${imageUri}`);
  } catch (error: unknown) {
    lookupError = describeError(error);
    logger.error(`Failed to fetch image dimensions for ${page.id}: ${lookupError}`);
    dimensions = { width: SENTINEL_DIMENSION, height: SENTINEL_DIMENSION };
  }

  if (!dimensions) {
    logger.error(`Could not determine image dimensions for ${page.id}`);
    return undefined;
  }

  const boundaries = checkPageBoundaries(page, dimensions.width, dimensions.height, logger);
  const statistics = computePageStatistics(page, logger);

  const report: PageReport = {
    page_id: page.id,
    ts: timestamp,
    facsimile_width: dimensions.width,
    facsimile_height: dimensions.height,
    ...boundaries,
    pages_stats: statistics,
    cc: page.cc ?? null,
    iiif_manifest: { iiif_base_uri: imageUri },
  };
  if (lookupError !== undefined) report.error = lookupError;
  if (gitVersion) report.git_version = gitVersion;
  return report;
}

export function addReportToTotals(totals: BatchTotals, report: PageReport): BatchTotals {
  const outOfBoundsLines = totals.out_of_bounds_lines + report.out_of_bounds_lines.length;
  const outOfBoundsParagraphs = totals.out_of_bounds_paragraphs + report.out_of_bounds_paragraphs.length;
  const outOfBoundsRegions = totals.out_of_bounds_regions + report.out_of_bounds_regions.length;
  return {
    total_pages: totals.total_pages + 1,
    total_lines: totals.total_lines + report.total_lines,
    out_of_bounds_lines: outOfBoundsLines,
    out_of_bounds_paragraphs: outOfBoundsParagraphs,
    out_of_bounds_regions: outOfBoundsRegions,
    total_out_of_bounds: outOfBoundsLines + outOfBoundsParagraphs + outOfBoundsRegions,
  };
}

export function aggregateBatchTotals(reports: Iterable<PageReport>): BatchTotals {
  let totals: BatchTotals = { ...EMPTY_BATCH_TOTALS };
  for (const report of reports) totals = addReportToTotals(totals, report);
  return totals;
}

export async function runBoundaryCheck(
  { inputPath, outputPath, gitVersion, patchGallicaV3 = false, random = false }: RunBoundaryCheckInput,
  {
    dimensionProvider,
    logger = defaultLogger,
    now = () => new Date(),
    readPages = readPageRecords,
    openSink = openReportSink,
  }: RunBoundaryCheckDependencies,
): Promise<RunBoundaryCheckResult> {
  logger.info("Starting line boundary check...");
  const timestamp = formatTimestamp(now());
  const sink = await openSink(outputPath);
  let totals: BatchTotals = { ...EMPTY_BATCH_TOTALS };
  let failedPages = 0;

  try {
    for await (const record of readPages(inputPath, { random })) {
      const page = parsePage(record);
      const report = await processPage(page, dimensionProvider, { timestamp, gitVersion, patchGallicaV3, logger });
      if (!report) {
        failedPages += 1;
        continue;
      }
      await sink.write(`${JSON.stringify(report)}\n`);
      totals = addReportToTotals(totals, report);
    }
  } finally {
    await sink.close();
  }

  logger.info(
    `Batch summary: ${totals.total_lines} lines, ${totals.out_of_bounds_lines} out-of-bounds lines, ${totals.out_of_bounds_paragraphs} out-of-bounds paragraphs, ${totals.out_of_bounds_regions} out-of-bounds regions, ${totals.total_out_of_bounds} total out-of-bounds, ${totals.total_pages} total pages, ${failedPages} failed pages`,
  );
  return { totals, failedPages };
}

export interface RunPageStatisticsDependencies {
  logger?: Logger;
  now?: () => Date;
  openSink?: (outputPath: string) => Promise<ReportSink>;
}

export async function runPageStatistics(
  inputPath: string,
  outputPath: string,
  { logger = defaultLogger, now = () => new Date(), openSink = openReportSink }: RunPageStatisticsDependencies = {},
): Promise<PageStatistics & { timestamp: string }> {
  const page = parsePage(JSON.parse(await readFile(inputPath, "utf8")));
  const statistics = { ...computePageStatistics(page, logger), timestamp: formatTimestamp(now()) };

  const sink = await openSink(outputPath);
  try {
    await sink.write(`${JSON.stringify(statistics)}\n`);
  } finally {
    await sink.close();
  }
  return statistics;
}

export async function openReportSink(outputPath: string): Promise<ReportSink> {
  if (outputPath === "-") {
    return {
      write: (line) =>
        new Promise((resolve, reject) => {
          process.stdout.write(line, (error) => (error ? reject(error) : resolve()));
        }),
      close: async () => {},
    };
  }

  const handle = await open(outputPath, "w");
  return {
    write: async (line) => {
      await handle.write(line, null, "utf8");
    },
    close: () => handle.close(),
  };
}
