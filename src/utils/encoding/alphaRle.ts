// Compressed RLE restricted to ASCII letters, no header, no escaping:
// "AAABCC" <-> "A3BC2". Kept for streams written before the escaped codec.

import { RleError } from "./rleErrors";
import { DecodeOptions, expandTokens, isDecimalDigit, readCount, resolveMaxOutputLength, RunToken, scanRuns } from "./runs";

function isAsciiLetter(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z]$/.test(ch);
}

function checkTextInput(text: string): void {
  if (typeof text !== "string") {
    throw new RleError("InvalidInputType", `Input must be a string, got ${typeof text}`);
  }
  if (text.length === 0) {
    throw new RleError("EmptyInput", "Input must be non-empty");
  }
}

export function looksLikeAlphaRle(text: string): boolean {
  return Array.from(text).some((ch) => isDecimalDigit(ch));
}

export function alphaRleEncode(text: string): string {
  checkTextInput(text);

  const out: string[] = [];
  let position = 0;
  for (const run of scanRuns(text)) {
    if (!isAsciiLetter(run.char)) {
      throw new RleError(
        "InvalidCharacter",
        `Character '${run.char}' at position ${position} is not a letter (A-Z or a-z)`,
        position,
      );
    }
    out.push(run.char);
    if (run.length > 1) {
      out.push(String(run.length));
    }
    position += run.length;
  }
  return out.join("");
}

export function alphaRleDecode(text: string, options: DecodeOptions = {}): string {
  checkTextInput(text);
  const maxOutputLength = resolveMaxOutputLength(options.maxOutputLength);

  const chars = Array.from(text);
  const tokens: RunToken[] = [];
  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (isDecimalDigit(ch)) {
      throw new RleError("MalformedCount", `Count at position ${i} has no preceding letter`, i);
    }
    if (!isAsciiLetter(ch)) {
      throw new RleError("InvalidCharacter", `Character '${ch}' at position ${i} is not a letter (A-Z or a-z)`, i);
    }
    const { count, next } = readCount(chars, i + 1, 0);
    tokens.push({ literal: ch, count, offset: i });
    i = next;
  }

  return expandTokens(tokens, maxOutputLength);
}
