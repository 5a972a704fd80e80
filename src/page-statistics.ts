import { hasCoordinateQuad } from "./boundary-check.ts";
import { computeDescriptiveStatistics, roundTo } from "./descriptive-stats.ts";
import { extractLineText } from "./line-text.ts";
import type { Logger } from "./logger.ts";
import { defaultLogger } from "./logger.ts";
import type {
  BoundingBox,
  CoordinateQuad,
  Line,
  Page,
  PageStatistics,
  Paragraph,
  ParagraphCoverage,
} from "./page-types.ts";
import { LOW_COVERAGE_TEXT_DUMP_PERCENT, LOW_COVERAGE_WARNING_PERCENT } from "./page-types.ts";

interface ParagraphGeometry {
  /** 1-based position of the paragraph across the whole page. */
  paragraphNumber: number;
  paragraph: Paragraph;
  box: BoundingBox;
  lineArea: number;
}

/**
 * Computes layout statistics for one page. Each line gains a `text` field
 * holding its joined segment text before counts and coverage are taken.
 */
export function computePageStatistics(page: Page, logger: Logger = defaultLogger): PageStatistics {
  const paragraphs = page.r.flatMap((region) => region.p);
  const lines = paragraphs.flatMap((paragraph) => paragraph.l);

  reportReversedLineOrder(paragraphs, logger);

  for (const line of lines) line.text = extractLineText(line);

  const numRegions = page.r.length;
  const numParagraphs = paragraphs.length;
  const numLines = lines.length;
  const numEmptyLines = lines.filter((line) => !line.text).length;

  const lineWidths = placedQuads(lines).map((quad) => quad[2]);
  // Heights only count lines that also carry text segments; widths count every placed line.
  const lineHeights = placedQuads(lines.filter((line) => line.t !== undefined && line.t.length > 0)).map(
    (quad) => quad[3],
  );

  const geometries = collectParagraphGeometries(paragraphs);
  const largestParagraph = findLargestParagraphBox(geometries);
  logger.info(`Largest paragraph coordinates: ${JSON.stringify(largestParagraph ?? {})}`);

  return {
    num_regions: numRegions,
    num_paragraphs: numParagraphs,
    num_lines: numLines,
    num_empty_lines: numEmptyLines,
    avg_paragraphs_per_region: averageOf(numParagraphs, numRegions),
    avg_lines_per_region: averageOf(numLines, numRegions),
    avg_lines_per_paragraph: averageOf(numLines, numParagraphs),
    line_width_stats: computeDescriptiveStatistics(lineWidths),
    line_height_stats: computeDescriptiveStatistics(lineHeights),
    largest_paragraph_coords: largestParagraph ?? null,
    paragraph_coverages: geometries.map((geometry) => measureCoverage(geometry, logger)),
  };
}

export function reportReversedLineOrder(paragraphs: readonly Paragraph[], logger: Logger): void {
  paragraphs.forEach((paragraph, index) => {
    const placed = placedQuads(paragraph.l);
    for (let lineIndex = 1; lineIndex < placed.length; lineIndex++) {
      const previous = placed[lineIndex - 1];
      const current = placed[lineIndex];
      const previousTop = previous[1];
      const currentBottom = current[1] + current[3];
      if (currentBottom < previousTop) {
        logger.warn(
          `Paragraph ${index + 1} has reversed line order between lines ${lineIndex - 1} and ${lineIndex}: prev top y=${previousTop}, next bottom y=${currentBottom}`,
        );
      }
    }
  });
}

export function computeBoundingBox(quads: readonly CoordinateQuad[]): BoundingBox {
  const minX = Math.min(...quads.map((quad) => quad[0]));
  const minY = Math.min(...quads.map((quad) => quad[1]));
  const maxX = Math.max(...quads.map((quad) => quad[0] + quad[2]));
  const maxY = Math.max(...quads.map((quad) => quad[1] + quad[3]));
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

function collectParagraphGeometries(paragraphs: readonly Paragraph[]): ParagraphGeometry[] {
  const geometries: ParagraphGeometry[] = [];
  paragraphs.forEach((paragraph, index) => {
    const quads = placedQuads(paragraph.l);
    if (quads.length === 0) return;
    geometries.push({
      paragraphNumber: index + 1,
      paragraph,
      box: computeBoundingBox(quads),
      lineArea: quads.reduce((sum, quad) => sum + quad[2] * quad[3], 0),
    });
  });
  return geometries;
}

function findLargestParagraphBox(geometries: readonly ParagraphGeometry[]): BoundingBox | undefined {
  let largest: BoundingBox | undefined;
  let maxArea = 0;
  for (const { box } of geometries) {
    const area = box.width * box.height;
    if (area > maxArea) {
      maxArea = area;
      largest = box;
    }
  }
  return largest;
}

function measureCoverage(geometry: ParagraphGeometry, logger: Logger): ParagraphCoverage {
  const { box, paragraphNumber } = geometry;
  const boundingArea = box.width * box.height;
  const coverage = boundingArea > 0 ? roundTo((geometry.lineArea / boundingArea) * 100) : 0;

  if (coverage < LOW_COVERAGE_WARNING_PERCENT) {
    logger.warn(
      `Paragraph ${paragraphNumber} coverage below ${LOW_COVERAGE_WARNING_PERCENT}%: ${coverage}% at x=${box.x}, y=${box.y}, width=${box.width}, height=${box.height}`,
    );
  }
  if (coverage < LOW_COVERAGE_TEXT_DUMP_PERCENT) {
    logger.debug(`Paragraph ${paragraphNumber} coverage below ${LOW_COVERAGE_TEXT_DUMP_PERCENT}%, emitting line texts:`);
    for (const line of geometry.paragraph.l) logger.debug(line.text ?? "");
  }

  return { coords: { ...box }, coverage_percent: coverage };
}

function placedQuads(lines: readonly Line[]): CoordinateQuad[] {
  const quads: CoordinateQuad[] = [];
  for (const line of lines) {
    if (hasCoordinateQuad(line.c)) quads.push(line.c);
  }
  return quads;
}

function averageOf(numerator: number, denominator: number): number {
  return denominator > 0 ? roundTo(numerator / denominator) : 0;
}
