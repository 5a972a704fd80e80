import type { Logger } from "./logger.ts";
import { defaultLogger } from "./logger.ts";
import type {
  BoundaryCheckResult,
  CoordinateQuad,
  OutOfBoundsExcess,
  OutOfBoundsLine,
  OutOfBoundsParagraph,
  OutOfBoundsRegion,
  Page,
} from "./page-types.ts";
import { MIN_QUAD_LENGTH } from "./page-types.ts";

export function hasCoordinateQuad(coord: CoordinateQuad | undefined): coord is CoordinateQuad {
  return coord !== undefined && coord.length >= MIN_QUAD_LENGTH;
}

export function isQuadWithinImage(coord: CoordinateQuad, imageWidth: number, imageHeight: number): boolean {
  const [x, y, width, height] = coord;
  return x >= 0 && y >= 0 && x + width <= imageWidth && y + height <= imageHeight;
}

/** Returns undefined when the quad fits the image, otherwise the per-edge overflow. */
export function measureQuadExcess(
  coord: CoordinateQuad,
  imageWidth: number,
  imageHeight: number,
  pOf: string | null,
): OutOfBoundsExcess | undefined {
  if (isQuadWithinImage(coord, imageWidth, imageHeight)) return undefined;
  const [x, y, width, height] = coord;
  return {
    coord,
    pOf,
    excess_width: Math.max(0, x + width - imageWidth),
    excess_height: Math.max(0, y + height - imageHeight),
    excess_x: Math.max(0, -x),
    excess_y: Math.max(0, -y),
  };
}

export function checkPageBoundaries(
  page: Page,
  imageWidth: number,
  imageHeight: number,
  logger: Logger = defaultLogger,
): BoundaryCheckResult {
  const outOfBoundsLines: OutOfBoundsLine[] = [];
  const outOfBoundsParagraphs: OutOfBoundsParagraph[] = [];
  const outOfBoundsRegions: OutOfBoundsRegion[] = [];
  let totalLines = 0;
  // pOf carries over to every following region until another region sets it.
  let currentPOf: string | null = null;

  const measure = (coord: CoordinateQuad | undefined, kind: string) => {
    if (!hasCoordinateQuad(coord)) return undefined;
    const excess = measureQuadExcess(coord, imageWidth, imageHeight, currentPOf);
    if (excess) logger.error(`${kind} out of bounds: ${JSON.stringify(coord)}`);
    return excess;
  };

  page.r.forEach((region, regionSeq) => {
    if (region.pOf !== undefined) currentPOf = region.pOf;

    const regionExcess = measure(region.c, "Region");
    if (regionExcess) outOfBoundsRegions.push({ region_seq: regionSeq, ...regionExcess });

    region.p.forEach((paragraph, paragraphSeq) => {
      const paragraphExcess = measure(paragraph.c, "Paragraph");
      if (paragraphExcess) outOfBoundsParagraphs.push({ paragraph_seq: paragraphSeq, ...paragraphExcess });

      paragraph.l.forEach((line, lineSeq) => {
        totalLines += 1;
        const lineExcess = measure(line.c, "Line");
        if (lineExcess) outOfBoundsLines.push({ line_seq: lineSeq, ...lineExcess });
      });
    });
  });

  return {
    total_lines: totalLines,
    out_of_bounds_lines: outOfBoundsLines,
    out_of_bounds_paragraphs: outOfBoundsParagraphs,
    out_of_bounds_regions: outOfBoundsRegions,
  };
}
