import type { Line } from "./page-types.ts";

export function extractLineText(line: Line): string {
  if (!line.t) return "";
  return line.t
    .map((segment) => segment.tx)
    .filter((text): text is string => typeof text === "string" && text.length > 0)
    .join(" ")
    .trim();
}
