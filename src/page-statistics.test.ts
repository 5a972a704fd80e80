import { describe, expect, it } from "vitest";

import { computeBoundingBox, computePageStatistics } from "./page-statistics.ts";
import { createTestLogger, line, page, paragraph, region } from "./test-fixtures.ts";
import type { Line } from "./page-types.ts";

function buildSamplePage() {
  const untextedLine: Line = { c: [0, 100, 50, 10], t: [] };
  const blankSegmentLine: Line = { c: [0, 130, 100, 10], t: [{ tx: "" }] };
  return page([
    region([
      paragraph([line([0, 0, 100, 10], "Hello", "world"), line([0, 10, 100, 10], "again")]),
      paragraph([line(undefined, "floating"), {}]),
    ]),
    region([paragraph([untextedLine, blankSegmentLine])]),
    region([]),
  ]);
}

describe("computePageStatistics", () => {
  it("counts structure and averages per region and paragraph", () => {
    const stats = computePageStatistics(buildSamplePage(), createTestLogger());

    expect(stats.num_regions).toBe(3);
    expect(stats.num_paragraphs).toBe(3);
    expect(stats.num_lines).toBe(6);
    expect(stats.num_empty_lines).toBe(3);
    expect(stats.avg_paragraphs_per_region).toBe(1);
    expect(stats.avg_lines_per_region).toBe(2);
    expect(stats.avg_lines_per_paragraph).toBe(2);
  });

  it("writes the joined text onto every line", () => {
    const input = buildSamplePage();

    computePageStatistics(input, createTestLogger());

    const texts = input.r.flatMap((r) => r.p.flatMap((p) => p.l.map((l) => l.text)));
    expect(texts).toEqual(["Hello world", "again", "floating", "", "", ""]);
  });

  it("collects widths from placed lines and heights only from placed lines with segments", () => {
    const stats = computePageStatistics(buildSamplePage(), createTestLogger());

    expect(stats.line_width_stats).toMatchObject({
      count: 4,
      mean: 87.5,
      median: 100,
      mode: 100,
      min: 50,
      max: 100,
      range: 50,
      variance: 625,
      std_dev: 25,
      skewness: -1.5,
    });
    expect(stats.line_height_stats).toMatchObject({
      count: 3,
      mean: 10,
      std_dev: 0,
      skewness: 0,
      kurtosis: 0,
    });
  });

  it("reports coverage only for paragraphs with placed lines", () => {
    const stats = computePageStatistics(buildSamplePage(), createTestLogger());

    expect(stats.paragraph_coverages).toEqual([
      { coords: { x: 0, y: 0, width: 100, height: 20 }, coverage_percent: 100 },
      { coords: { x: 0, y: 100, width: 100, height: 40 }, coverage_percent: 37.5 },
    ]);
    expect(stats.largest_paragraph_coords).toEqual({ x: 0, y: 100, width: 100, height: 40 });
  });

  it("logs low coverage paragraphs and their line texts", () => {
    const logger = createTestLogger();

    computePageStatistics(buildSamplePage(), logger);

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Paragraph 3 coverage below 80%: 37.5% at x=0, y=100, width=100, height=40",
    );
    expect(logger.debug.mock.calls).toEqual([
      ["Paragraph 3 coverage below 70%, emitting line texts:"],
      [""],
      [""],
    ]);
  });

  it("warns when a line ends above the top of the line before it", () => {
    const logger = createTestLogger();
    const input = page([region([paragraph([line([0, 100, 10, 10], "b"), line(undefined, "x"), line([0, 50, 10, 20], "a")])])]);

    computePageStatistics(input, logger);

    expect(logger.warn).toHaveBeenCalledWith(
      "Paragraph 1 has reversed line order between lines 0 and 1: prev top y=100, next bottom y=70",
    );
  });

  it("returns zero averages for pages without paragraphs", () => {
    const stats = computePageStatistics(page([region([]), region([])]), createTestLogger());

    expect(stats).toEqual({
      num_regions: 2,
      num_paragraphs: 0,
      num_lines: 0,
      num_empty_lines: 0,
      avg_paragraphs_per_region: 0,
      avg_lines_per_region: 0,
      avg_lines_per_paragraph: 0,
      line_width_stats: expect.objectContaining({ count: 0, mode: null }),
      line_height_stats: expect.objectContaining({ count: 0, mode: null }),
      largest_paragraph_coords: null,
      paragraph_coverages: [],
    });
  });

  it("rounds averages that fall exactly between two cents to the even cent", () => {
    const regions = Array.from({ length: 8 }, () => region([paragraph([])]));
    regions[0].p.push(paragraph([]));

    const stats = computePageStatistics(page(regions), createTestLogger());

    expect(stats.num_paragraphs).toBe(9);
    expect(stats.avg_paragraphs_per_region).toBe(1.12);
  });

  it("keeps the first paragraph when two boxes have the same area", () => {
    const input = page([
      region([paragraph([line([0, 0, 20, 10], "a")]), paragraph([line([50, 50, 10, 20], "b")])]),
    ]);

    const stats = computePageStatistics(input, createTestLogger());

    expect(stats.largest_paragraph_coords).toEqual({ x: 0, y: 0, width: 20, height: 10 });
  });

  it("gives zero coverage to a paragraph whose box has no area", () => {
    const input = page([region([paragraph([line([5, 5, 0, 10], "a")])])]);

    const stats = computePageStatistics(input, createTestLogger());

    expect(stats.paragraph_coverages).toEqual([{ coords: { x: 5, y: 5, width: 0, height: 10 }, coverage_percent: 0 }]);
    expect(stats.largest_paragraph_coords).toBeNull();
  });

  it("rounds coverage to two decimals", () => {
    const input = page([region([paragraph([line([0, 0, 30, 10], "a"), line([0, 20, 90, 10], "b")])])]);

    const stats = computePageStatistics(input, createTestLogger());

    expect(stats.paragraph_coverages[0].coverage_percent).toBe(44.44);
  });
});

describe("computeBoundingBox", () => {
  it("spans all quads", () => {
    expect(computeBoundingBox([[10, 20, 30, 5], [5, 40, 10, 10]])).toEqual({ x: 5, y: 20, width: 35, height: 30 });
  });
});
