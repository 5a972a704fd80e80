import { z } from "zod";
import type { Page } from "./page-types.ts";

const coordinateQuadSchema = z.array(z.number());

const textSegmentSchema = z
  .object({
    tx: z.string().nullish(),
  })
  .passthrough();

const lineObjectSchema = z
  .object({
    c: coordinateQuadSchema.optional(),
    t: z.array(textSegmentSchema).optional(),
    text: z.string().optional(),
  })
  .passthrough();

// Some exports write an empty line as `[]` instead of an object.
const lineSchema = z.preprocess(
  (value) => (Array.isArray(value) && value.length === 0 ? {} : value),
  lineObjectSchema,
);

const paragraphSchema = z
  .object({
    c: coordinateQuadSchema.optional(),
    l: z.array(lineSchema),
  })
  .passthrough();

const regionSchema = z
  .object({
    c: coordinateQuadSchema.optional(),
    pOf: z.string().nullish(),
    p: z.array(paragraphSchema),
  })
  .passthrough();

export const pageSchema = z
  .object({
    id: z.string(),
    r: z.array(regionSchema),
    iiif_img_base_uri: z.string().nullish(),
    iiif: z.string().nullish(),
  })
  .passthrough();

export class PageSchemaError extends Error {
  readonly pageId: string | undefined;
  readonly issues: string[];

  constructor(pageId: string | undefined, issues: string[]) {
    super(`Invalid page record ${pageId ?? "<unknown>"}: ${issues.join("; ")}`);
    this.name = "PageSchemaError";
    this.pageId = pageId;
    this.issues = issues;
  }
}

export function parsePage(raw: unknown): Page {
  const result = pageSchema.safeParse(raw);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
  throw new PageSchemaError(readPageId(raw), issues);
}

function readPageId(raw: unknown): string | undefined {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return undefined;
  return typeof raw.id === "string" ? raw.id : undefined;
}
