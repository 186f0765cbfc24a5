// Escaped run-length codec. Any text can be represented:
//
//   "##"  literal '#'
//   "#d"  literal digit d
//   c     any other character, as itself
//
// each token optionally followed by a run count [1-9][0-9]* (absent means 1).
// Encoded streams start with the "##00" header.
//
//   "AAAA" <-> "##00A4"     "555" <-> "##00#53"     "B12" <-> "##00B#1#2"

import { RleError } from "./rleErrors";
import {
  DecodeOptions,
  expandTokens,
  isDecimalDigit,
  readCount,
  resolveMaxOutputLength,
  RunToken,
  scanRuns,
} from "./runs";

export type { DecodeOptions };

export const kEscapedRleHeader = "##00";
export const kEscapeChar = "#";

export type RleToken = RunToken & {
  escaped: boolean;
};

export function isEscapedRleStream(text: string): boolean {
  return text.startsWith(kEscapedRleHeader);
}

function encodeLiteral(ch: string): string {
  if (ch === kEscapeChar || isDecimalDigit(ch)) {
    return kEscapeChar + ch;
  }
  return ch;
}

export function escapedRleEncode(text: string): string {
  if (typeof text !== "string") {
    throw new RleError("InvalidInputType", `Input must be a string, got ${typeof text}`);
  }
  if (text.length === 0) {
    throw new RleError("EmptyInput", "Input must be non-empty");
  }

  const out: string[] = [kEscapedRleHeader];
  for (const run of scanRuns(text)) {
    out.push(encodeLiteral(run.char));
    if (run.length > 1) {
      out.push(String(run.length));
    }
  }
  return out.join("");
}

// Splits a body (the stream without its header) into tokens.
// baseOffset is added to every reported position; by default positions refer
// to the full stream, header included.
export function tokenizeEscapedRleBody(body: string, baseOffset: number = kEscapedRleHeader.length): RleToken[] {
  const chars = Array.from(body);
  const tokens: RleToken[] = [];
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i];
    const offset = baseOffset + i;
    let literal: string;
    let escaped = false;

    if (ch === kEscapeChar) {
      const next = chars[i + 1];
      if (next === undefined) {
        throw new RleError("DanglingEscape", `Dangling escape '#' at end of encoded string (position ${offset})`, offset);
      }
      if (next !== kEscapeChar && !isDecimalDigit(next)) {
        throw new RleError(
          "InvalidEscape",
          `Invalid escape sequence '#${next}' at position ${offset}: '#' must be followed by '#' or a digit`,
          offset,
        );
      }
      literal = next;
      escaped = true;
      i += 2;
    } else if (isDecimalDigit(ch)) {
      // counts are consumed right after their literal, so a digit here has none
      throw new RleError("MalformedCount", `Count at position ${offset} has no preceding character`, offset);
    } else {
      literal = ch;
      i += 1;
    }

    const { count, next } = readCount(chars, i, baseOffset);
    i = next;
    tokens.push({ literal, count, escaped, offset });
  }

  return tokens;
}

export function escapedRleDecode(stream: string, options: DecodeOptions = {}): string {
  if (typeof stream !== "string") {
    throw new RleError("InvalidInputType", `Encoded input must be a string, got ${typeof stream}`);
  }
  const maxOutputLength = resolveMaxOutputLength(options.maxOutputLength);

  if (!isEscapedRleStream(stream)) {
    throw new RleError("MissingHeader", `Encoded input must begin with the '${kEscapedRleHeader}' header`, 0);
  }
  const body = stream.substring(kEscapedRleHeader.length);
  if (body.length === 0) {
    throw new RleError("EmptyBody", "Encoded input has a header but no body", kEscapedRleHeader.length);
  }

  return expandTokens(tokenizeEscapedRleBody(body), maxOutputLength);
}
