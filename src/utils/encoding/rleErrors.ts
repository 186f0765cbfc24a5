import { defineEnum } from "../enum";

export const kRleErrorKind = defineEnum({
  InvalidInputType: { value: "InvalidInputType", title: "input is not text" },
  EmptyInput: { value: "EmptyInput", title: "input is empty" },
  MissingHeader: { value: "MissingHeader", title: "missing or malformed header" },
  EmptyBody: { value: "EmptyBody", title: "header with no body" },
  DanglingEscape: { value: "DanglingEscape", title: "dangling escape" },
  InvalidEscape: { value: "InvalidEscape", title: "invalid escape sequence" },
  MalformedCount: { value: "MalformedCount", title: "malformed count" },
  InvalidCharacter: { value: "InvalidCharacter", title: "character not allowed by codec" },
  OutputTooLarge: { value: "OutputTooLarge", title: "decoded output too large" },
} as const);

export type RleErrorKey = typeof kRleErrorKind.$key;

// offset is a code point index into the input that was being parsed.
export class RleError extends Error {
  constructor(
    public readonly kind: RleErrorKey,
    message: string,
    public readonly offset?: number,
  ) {
    super(message);
    this.name = "RleError";
  }
}

export function isRleError(error: unknown, kind?: RleErrorKey): error is RleError {
  if (!(error instanceof RleError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}
