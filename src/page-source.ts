import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { createGunzip } from "node:zlib";
import unbzip2Stream from "unbzip2-stream";

const PAGE_FILE_PATTERN = /pages\.jsonl(?:\.bz2|\.gz)?$/;

export interface ReadPageRecordsOptions {
  random?: boolean;
  shuffle?: <T>(items: T[]) => T[];
}

export async function listPageFiles(inputPath: string): Promise<string[]> {
  const inputStat = await stat(inputPath);
  if (!inputStat.isDirectory()) return [inputPath];

  const fileNames = await readdir(inputPath);
  return fileNames
    .filter((fileName) => PAGE_FILE_PATTERN.test(fileName))
    .sort((left, right) => left.localeCompare(right))
    .map((fileName) => join(inputPath, fileName));
}

/** Yields one decoded JSON record per non-blank line of the page files. */
export async function* readPageRecords(
  inputPath: string,
  { random = false, shuffle = shuffleInPlace }: ReadPageRecordsOptions = {},
): AsyncGenerator<unknown> {
  const files = await listPageFiles(inputPath);
  const ordered = random ? shuffle([...files]) : files;

  for (const filePath of ordered) {
    yield* readJsonLines(filePath);
  }
}

export async function* readJsonLines(filePath: string): AsyncGenerator<unknown> {
  const lines = createInterface({ input: openTextStream(filePath), crlfDelay: Infinity });
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber += 1;
    if (line.trim().length === 0) continue;
    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in ${filePath} at line ${lineNumber}: ${detail}`);
    }
    yield record;
  }
}

function openTextStream(filePath: string): NodeJS.ReadableStream {
  const raw = createReadStream(filePath);
  const decoder = createDecoder(filePath);
  if (!decoder) return raw;
  // pipe() leaves source errors on the source; readline only listens to the decoder.
  raw.on("error", (error) => decoder.emit("error", error));
  return raw.pipe(decoder);
}

function createDecoder(filePath: string): NodeJS.ReadWriteStream | undefined {
  if (filePath.endsWith(".bz2")) return unbzip2Stream();
  if (filePath.endsWith(".gz")) return createGunzip();
  return undefined;
}

function shuffleInPlace<T>(items: T[]): T[] {
  for (let index = items.length - 1; index > 0; index--) {
    const swapIndex = Math.floor(Math.random() * (index + 1));
    [items[index], items[swapIndex]] = [items[swapIndex], items[index]];
  }
  return items;
}
