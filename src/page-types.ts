export type CoordinateQuad = number[];

export interface TextSegment {
  tx?: string | null;
  [field: string]: unknown;
}

export interface Line {
  c?: CoordinateQuad;
  t?: TextSegment[];
  /** Joined segment text, written once by the statistics pass. */
  text?: string;
  [field: string]: unknown;
}

export interface Paragraph {
  c?: CoordinateQuad;
  l: Line[];
  [field: string]: unknown;
}

export interface Region {
  c?: CoordinateQuad;
  /** `null` clears the tag carried over from earlier regions. */
  pOf?: string | null;
  p: Paragraph[];
  [field: string]: unknown;
}

export interface Page {
  id: string;
  r: Region[];
  iiif_img_base_uri?: string | null;
  iiif?: string | null;
  cc?: unknown;
  [field: string]: unknown;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface OutOfBoundsExcess {
  coord: CoordinateQuad;
  pOf: string | null;
  excess_width: number;
  excess_height: number;
  excess_x: number;
  excess_y: number;
}

export interface OutOfBoundsLine extends OutOfBoundsExcess {
  line_seq: number;
}

export interface OutOfBoundsParagraph extends OutOfBoundsExcess {
  paragraph_seq: number;
}

export interface OutOfBoundsRegion extends OutOfBoundsExcess {
  region_seq: number;
}

export interface BoundaryCheckResult {
  total_lines: number;
  out_of_bounds_lines: OutOfBoundsLine[];
  out_of_bounds_paragraphs: OutOfBoundsParagraph[];
  out_of_bounds_regions: OutOfBoundsRegion[];
}

export interface DescriptiveStatistics {
  count: number;
  mean: number;
  median: number;
  mode: number | null;
  min: number;
  max: number;
  range: number;
  variance: number;
  std_dev: number;
  skewness: number;
  kurtosis: number;
}

export interface ParagraphCoverage {
  coords: BoundingBox;
  coverage_percent: number;
}

export interface PageStatistics {
  num_regions: number;
  num_paragraphs: number;
  num_lines: number;
  num_empty_lines: number;
  avg_paragraphs_per_region: number;
  avg_lines_per_region: number;
  avg_lines_per_paragraph: number;
  line_width_stats: DescriptiveStatistics;
  line_height_stats: DescriptiveStatistics;
  largest_paragraph_coords: BoundingBox | null;
  paragraph_coverages: ParagraphCoverage[];
}

export interface PageReport extends BoundaryCheckResult {
  page_id: string;
  ts: string;
  facsimile_width: number;
  facsimile_height: number;
  pages_stats: PageStatistics;
  cc: unknown;
  iiif_manifest: { iiif_base_uri: string };
  error?: string;
  git_version?: string;
}

export interface BatchTotals {
  total_pages: number;
  total_lines: number;
  out_of_bounds_lines: number;
  out_of_bounds_paragraphs: number;
  out_of_bounds_regions: number;
  total_out_of_bounds: number;
}

export const MIN_QUAD_LENGTH = 4;
export const SENTINEL_DIMENSION = 999999;
export const LOW_COVERAGE_WARNING_PERCENT = 80;
export const LOW_COVERAGE_TEXT_DUMP_PERCENT = 70;
export const STATISTICS_DECIMALS = 2;
