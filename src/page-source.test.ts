import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { beforeAll, describe, expect, it } from "vitest";

import { listPageFiles, readJsonLines, readPageRecords } from "./page-source.ts";

// bzip2 of '{"id":"d"}\n{"id":"e"}\n'
const BZIP2_PAGES = Buffer.from(
  "QlpoOTFBWSZTWcgDjnwAAAlZgAAQEAAAEAYgAAogADEMCAqpoxqRa0b7UURT4u5IpwoSGQBxz4A=",
  "base64",
);

async function collect(records: AsyncIterable<unknown>): Promise<unknown[]> {
  const items: unknown[] = [];
  for await (const record of records) items.push(record);
  return items;
}

describe("readPageRecords", () => {
  let inputDir = "";

  beforeAll(async () => {
    inputDir = await mkdtemp(join(tmpdir(), "page-bbox-qa-source-"));
    await writeFile(join(inputDir, "GDL-1891-pages.jsonl"), '{"id":"a"}\n\n{"id":"b"}\n');
    await writeFile(join(inputDir, "GDL-1892-pages.jsonl.gz"), gzipSync('{"id":"c"}\r\n'));
    await writeFile(join(inputDir, "GDL-1893-pages.jsonl.bz2"), BZIP2_PAGES);
    await writeFile(join(inputDir, "GDL-1891-issues.jsonl"), '{"id":"issue"}\n');
    await mkdir(join(inputDir, "nested"));
  });

  it("lists only page files of a directory, sorted by name", async () => {
    expect(await listPageFiles(inputDir)).toEqual([
      join(inputDir, "GDL-1891-pages.jsonl"),
      join(inputDir, "GDL-1892-pages.jsonl.gz"),
      join(inputDir, "GDL-1893-pages.jsonl.bz2"),
    ]);
  });

  it("reads records from plain, gzipped and bzip2 files in order", async () => {
    expect(await collect(readPageRecords(inputDir))).toEqual([
      { id: "a" },
      { id: "b" },
      { id: "c" },
      { id: "d" },
      { id: "e" },
    ]);
  });

  it("decodes a single bzip2 page file", async () => {
    expect(await collect(readPageRecords(join(inputDir, "GDL-1893-pages.jsonl.bz2")))).toEqual([
      { id: "d" },
      { id: "e" },
    ]);
  });

  it("rejects when a compressed file cannot be read", async () => {
    const unreadable = join(inputDir, "archive.jsonl.gz");
    await mkdir(unreadable);

    await expect(collect(readJsonLines(unreadable))).rejects.toMatchObject({ code: "EISDIR" });
  });

  it("reads a single file path", async () => {
    expect(await collect(readPageRecords(join(inputDir, "GDL-1891-issues.jsonl")))).toEqual([{ id: "issue" }]);
  });

  it("applies the shuffle to the file order in random mode", async () => {
    const records = readPageRecords(inputDir, { random: true, shuffle: (files) => [...files].reverse() });

    expect(await collect(records)).toEqual([{ id: "d" }, { id: "e" }, { id: "c" }, { id: "a" }, { id: "b" }]);
  });

  it("reports the file and line of malformed JSON", async () => {
    const filePath = join(inputDir, "broken.jsonl");
    await writeFile(filePath, '{"id":"ok"}\n{"id":\n');

    await expect(collect(readPageRecords(filePath))).rejects.toThrow(`Invalid JSON in ${filePath} at line 2:`);
  });
});
