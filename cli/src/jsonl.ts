/**
 * JSONL (JSON Lines) reader and writer
 */

import * as fs from "fs";
import * as readline from "readline";
import { writeFileAtomic } from "./atomic-write.js";

/**
 * Converts one parsed line into a record, throwing when it has the wrong
 * shape
 */
export type LineDecoder<T> = (value: unknown) => T;

export interface ReadJSONLOptions {
  /**
   * Skip malformed lines instead of throwing
   */
  skipErrors?: boolean;
  /**
   * Custom error handler for malformed lines
   */
  onError?: (lineNumber: number, line: string, error: Error) => void;
}

function decodeLine<T>(
  line: string,
  lineNumber: number,
  decode: LineDecoder<T>,
  options: ReadJSONLOptions
): T | null {
  try {
    return decode(JSON.parse(line));
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    options.onError?.(lineNumber, line, parseError);
    if (!options.skipErrors) {
      throw new Error(
        `Failed to parse JSON at line ${lineNumber}: ${parseError.message}`
      );
    }
    return null;
  }
}

/**
 * Read a JSONL file and parse all lines
 * Uses streaming for large files
 */
export async function readJSONL<T>(
  filePath: string,
  decode: LineDecoder<T>,
  options: ReadJSONLOptions = {}
): Promise<T[]> {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const records: T[] = [];
  const rl = readline.createInterface({
    input: fs.createReadStream(filePath, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    if (line.trim() === "") {
      continue;
    }
    const record = decodeLine(line, lineNumber, decode, options);
    if (record !== null) {
      records.push(record);
    }
  }

  return records;
}

/**
 * Read a JSONL file synchronously (for smaller files)
 */
export function readJSONLSync<T>(
  filePath: string,
  decode: LineDecoder<T>,
  options: ReadJSONLOptions = {}
): T[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const records: T[] = [];
  const lines = fs.readFileSync(filePath, "utf8").split("\n");
  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line === "") {
      return;
    }
    const record = decodeLine(line, index + 1, decode, options);
    if (record !== null) {
      records.push(record);
    }
  });
  return records;
}

/**
 * Append one record. The file is rewritten through a temp file so a reader
 * never sees a half-written line.
 */
export function appendJSONLSync<T>(filePath: string, record: T): void {
  const existing = fs.existsSync(filePath)
    ? fs.readFileSync(filePath, "utf8")
    : "";
  const prefix =
    existing === "" || existing.endsWith("\n") ? existing : existing + "\n";
  writeFileAtomic(filePath, prefix + JSON.stringify(record) + "\n");
}
