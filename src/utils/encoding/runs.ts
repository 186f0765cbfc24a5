import { RleError } from "./rleErrors";

// Helpers shared by the RLE codecs. Text is always handled as a sequence of
// code points; a surrogate pair is one character, a combining mark is its own.

export type Run = {
  char: string;
  length: number;
};

// A decoded unit: one literal repeated `count` times. offset is where the
// token started in the parsed input (code points).
export type RunToken = {
  literal: string;
  count: number;
  offset: number;
};

export interface DecodeOptions {
  // upper bound on decoded string length, in UTF-16 code units (String.length)
  maxOutputLength?: number;
}

export const kDefaultMaxOutputLength = 16 * 1024 * 1024;

export function isDecimalDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

// Groups text into maximal runs of identical consecutive characters.
export function scanRuns(text: string): Run[] {
  const runs: Run[] = [];
  let current: Run | undefined;
  for (const ch of text) {
    if (current && current.char === ch) {
      current.length += 1;
      continue;
    }
    current = { char: ch, length: 1 };
    runs.push(current);
  }
  return runs;
}

export type CountRead = {
  count: number;
  next: number;
};

// Reads an optional COUNT ([1-9][0-9]*) at chars[start]. No digit means a count of 1.
// baseOffset maps indices of `chars` to offsets in the original input for errors.
export function readCount(chars: readonly string[], start: number, baseOffset: number): CountRead {
  if (!isDecimalDigit(chars[start])) {
    return { count: 1, next: start };
  }
  if (chars[start] === "0") {
    throw new RleError(
      "MalformedCount",
      `Malformed count at position ${baseOffset + start}: counts are positive integers without leading zeros`,
      baseOffset + start,
    );
  }

  let end = start;
  while (isDecimalDigit(chars[end])) {
    end += 1;
  }
  return { count: Number(chars.slice(start, end).join("")), next: end };
}

export function resolveMaxOutputLength(value: number | undefined): number {
  if (value === undefined) {
    return kDefaultMaxOutputLength;
  }
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`maxOutputLength must be a positive integer, got ${value}`);
  }
  return value;
}

export function expandTokens(tokens: readonly RunToken[], maxOutputLength: number): string {
  const parts: string[] = [];
  let produced = 0;
  for (const token of tokens) {
    // an astral literal costs two units per repeat
    const units = token.count * token.literal.length;
    if (units > maxOutputLength - produced) {
      throw new RleError(
        "OutputTooLarge",
        `Decoded output would exceed ${maxOutputLength} characters (token at position ${token.offset})`,
        token.offset,
      );
    }
    produced += units;
    parts.push(token.literal.repeat(token.count));
  }
  return parts.join("");
}
