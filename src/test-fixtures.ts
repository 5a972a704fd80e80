import { vi } from "vitest";
import type { Mock } from "vitest";
import type { Logger } from "./logger.ts";
import type { CoordinateQuad, Line, Page, Paragraph, Region } from "./page-types.ts";

export type TestLogger = { [Level in keyof Logger]: Mock<(message: string) => void> };

export function createTestLogger(): TestLogger {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

export function line(c: CoordinateQuad | undefined, ...texts: string[]): Line {
  const result: Line = {};
  if (c) result.c = c;
  if (texts.length > 0) result.t = texts.map((tx) => ({ tx }));
  return result;
}

export function paragraph(lines: Line[], c?: CoordinateQuad): Paragraph {
  return c ? { c, l: lines } : { l: lines };
}

export function region(paragraphs: Paragraph[], extra: { c?: CoordinateQuad; pOf?: string | null } = {}): Region {
  return { ...extra, p: paragraphs };
}

export function page(
  regions: Region[],
  extra: { id?: string; iiif_img_base_uri?: string | null; iiif?: string | null; cc?: unknown } = {},
): Page {
  return { id: "GDL-1891-03-12-a-p0001", ...extra, r: regions };
}
