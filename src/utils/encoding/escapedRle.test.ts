import { escapedRleDecode, escapedRleEncode, isEscapedRleStream, tokenizeEscapedRleBody } from "./escapedRle";
import { RleError, RleErrorKey } from "./rleErrors";

function expectRleError(fn: () => unknown, kind: RleErrorKey, offset?: number): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(RleError);
  if (caught instanceof RleError) {
    expect(caught.kind).toBe(kind);
    if (offset !== undefined) {
      expect(caught.offset).toBe(offset);
    }
  }
}

// small deterministic generator so failures are reproducible
function makeRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

describe("escapedRleEncode", () => {
  const cases: [string, string][] = [
    ["A", "##00A"],
    ["AAAA", "##00A4"],
    ["#", "##00##"],
    ["###", "##00##3"],
    ["5", "##00#5"],
    ["555", "##00#53"],
    ["B12", "##00B#1#2"],
    ["AAABCC", "##00A3BC2"],
    ["Z0##A", "##00Z#0##2A"],
    ["aaaaaaaaaaaa", "##00a12"],
  ];

  it.each(cases)("encodes %j as %j", (input, expected) => {
    expect(escapedRleEncode(input)).toBe(expected);
  });

  it("escapes a header-looking input like any other text", () => {
    expect(escapedRleEncode("##00")).toBe("##00##2#02");
  });

  it("emits one count-free token per character when nothing repeats", () => {
    const encoded = escapedRleEncode("aB3#x");
    expect(encoded).toBe("##00aB#3##x");
    const tokens = tokenizeEscapedRleBody(encoded.substring(4));
    expect(tokens.map((t) => t.literal)).toEqual(["a", "B", "3", "#", "x"]);
    expect(tokens.every((t) => t.count === 1)).toBe(true);
  });

  it("keeps whitespace runs", () => {
    expect(escapedRleEncode("a  \n\n\nb")).toBe("##00a 2\n3b");
  });

  it("treats a surrogate pair as one character", () => {
    expect(escapedRleEncode("😀😀\u00e9")).toBe("##00😀2\u00e9");
  });

  it("treats combining marks as characters of their own", () => {
    expect(escapedRleEncode("e\u0301\u0301")).toBe("##00e\u03012");
  });

  it("rejects empty input", () => {
    expectRleError(() => escapedRleEncode(""), "EmptyInput");
  });

  it("rejects input that is not a string", () => {
    const notText: unknown = 42;
    expectRleError(() => escapedRleEncode(notText as string), "InvalidInputType");
  });
});

describe("escapedRleDecode", () => {
  const cases: [string, string][] = [
    ["##00A", "A"],
    ["##00A4", "AAAA"],
    ["##00##", "#"],
    ["##00##3", "###"],
    ["##00#5", "5"],
    ["##00#53", "555"],
    ["##00B#1#2", "B12"],
    ["##00Z#0##2A", "Z0##A"],
    ["##00x12", "xxxxxxxxxxxx"],
    ["##00😀2\u00e9", "😀😀\u00e9"],
  ];

  it.each(cases)("decodes %j as %j", (input, expected) => {
    expect(escapedRleDecode(input)).toBe(expected);
  });

  it("reads a count after an escaped digit as the run length", () => {
    expect(escapedRleDecode("##00#910")).toBe("9999999999");
  });

  it("fails without the header", () => {
    expectRleError(() => escapedRleDecode("A4"), "MissingHeader", 0);
    expectRleError(() => escapedRleDecode("#00A4"), "MissingHeader", 0);
  });

  it("rejects a header with no body", () => {
    expectRleError(() => escapedRleDecode("##00"), "EmptyBody", 4);
  });

  it("fails on a dangling escape", () => {
    expectRleError(() => escapedRleDecode("##00#"), "DanglingEscape", 4);
    expectRleError(() => escapedRleDecode("##00ab#"), "DanglingEscape", 6);
  });

  it("fails on an escape that is not followed by '#' or a digit", () => {
    expectRleError(() => escapedRleDecode("##00#x"), "InvalidEscape", 4);
  });

  it("fails on a count with a leading zero", () => {
    expectRleError(() => escapedRleDecode("##00A01"), "MalformedCount", 5);
    expectRleError(() => escapedRleDecode("##00Z#10##2A"), "MalformedCount", 7);
  });

  it("fails on a zero count", () => {
    expectRleError(() => escapedRleDecode("##00A0"), "MalformedCount", 5);
    expectRleError(() => escapedRleDecode("##00#50"), "MalformedCount", 6);
  });

  it("fails on a count with no preceding character", () => {
    expectRleError(() => escapedRleDecode("##005"), "MalformedCount", 4);
  });

  it("rejects input that is not a string", () => {
    const notText: unknown = null;
    expectRleError(() => escapedRleDecode(notText as string), "InvalidInputType");
  });

  it("enforces the output limit", () => {
    expect(escapedRleDecode("##00A5", { maxOutputLength: 5 })).toBe("AAAAA");
    expectRleError(() => escapedRleDecode("##00A5B", { maxOutputLength: 5 }), "OutputTooLarge", 6);
    expectRleError(() => escapedRleDecode("##00A99999999999999999999"), "OutputTooLarge", 4);
  });

  it("measures the output limit in string length for astral characters", () => {
    expect(escapedRleDecode("##00😀3", { maxOutputLength: 6 })).toBe("😀😀😀");
    expectRleError(() => escapedRleDecode("##00😀3", { maxOutputLength: 5 }), "OutputTooLarge", 4);
  });

  it("throws a plain error for a bad output limit", () => {
    expect(() => escapedRleDecode("##00A", { maxOutputLength: 0 })).toThrow(
      "maxOutputLength must be a positive integer, got 0",
    );
  });
});

describe("tokenizeEscapedRleBody", () => {
  it("reports literal, count and position of each token", () => {
    expect(tokenizeEscapedRleBody("A4#53")).toEqual([
      { literal: "A", count: 4, escaped: false, offset: 4 },
      { literal: "5", count: 3, escaped: true, offset: 6 },
    ]);
  });

  it("uses the given base offset", () => {
    expect(tokenizeEscapedRleBody("##2x", 0)).toEqual([
      { literal: "#", count: 2, escaped: true, offset: 0 },
      { literal: "x", count: 1, escaped: false, offset: 3 },
    ]);
  });
});

describe("isEscapedRleStream", () => {
  it("checks for the header at the start only", () => {
    expect(isEscapedRleStream("##00A")).toBe(true);
    expect(isEscapedRleStream("A##00")).toBe(false);
    expect(isEscapedRleStream("##0")).toBe(false);
  });
});

describe("escaped RLE round trip", () => {
  const alphabet = ["A", "b", "#", "0", "5", "9", " ", "\n", "😀", "\u0301", "-"];

  it("decodes every encoded string back to the original", () => {
    const rng = makeRng(1234);
    for (let n = 0; n < 300; n += 1) {
      const length = 1 + Math.floor(rng() * 40);
      let text = "";
      for (let i = 0; i < length; i += 1) {
        const ch = alphabet[Math.floor(rng() * alphabet.length)];
        // bias towards runs
        text += rng() < 0.3 ? ch.repeat(1 + Math.floor(rng() * 12)) : ch;
      }
      const encoded = escapedRleEncode(text);
      expect(encoded.startsWith("##00")).toBe(true);
      expect(escapedRleDecode(encoded)).toBe(text);
    }
  });
});
