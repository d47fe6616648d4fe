/**
 * Tab-delimited source handling shared by the readers.
 *
 * Tatoeba exports are plain TSV: one record per line, no quoting.
 * Files may be gzipped; anything ending in `.gz` is decompressed.
 */

import { readFile } from "node:fs/promises";
import { gunzipSync } from "node:zlib";
import { InvalidFileError } from "./errors.js";
import type { Row } from "./types.js";

/**
 * A row together with its 1-based line number in the source.
 */
export interface NumberedRow {
  line: number;
  row: Row;
}

/**
 * Split source text into rows. Blank lines are skipped and a trailing
 * `\r` (CRLF files) is dropped.
 */
export function splitRows(text: string): NumberedRow[] {
  const rows: NumberedRow[] = [];
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, "");
    if (line.length === 0) continue;
    rows.push({ line: i + 1, row: line.split("\t") });
  }

  return rows;
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Parse an id column.
 *
 * @throws InvalidFileError if the column is not an integer
 */
export function parseIdColumn(value: string, line: number): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new InvalidFileError(`Invalid sentence id: ${JSON.stringify(value)}`, line);
  }
  return parseInt(value, 10);
}

/**
 * Decode a buffer as UTF-8.
 */
export function decodeBuffer(buffer: Buffer | Uint8Array): string {
  const decoder = new TextDecoder("utf-8");
  return decoder.decode(buffer);
}

/**
 * Read a source file into a string, gunzipping `.gz` files.
 */
export async function readSource(path: string): Promise<string> {
  const buffer = await readFile(path);
  if (!path.endsWith(".gz")) {
    return decodeBuffer(buffer);
  }

  try {
    return decodeBuffer(gunzipSync(buffer));
  } catch (err) {
    throw new InvalidFileError(`Could not decompress ${path}`, undefined, {
      cause: err,
    });
  }
}
