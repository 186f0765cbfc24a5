import { defineEnum } from "../enum";
import { err, ok, Result } from "../errorHandling";
import { alphaRleDecode, alphaRleEncode, looksLikeAlphaRle } from "./alphaRle";
import { escapedRleDecode, escapedRleEncode, isEscapedRleStream } from "./escapedRle";
import { isRleError } from "./rleErrors";
import { DecodeOptions } from "./runs";

export const kRleCodec = defineEnum({
  escaped: { value: "escaped", title: "Escaped RLE (any text, '##00' header)" },
  alpha: { value: "alpha", title: "Letters-only RLE (A-Z, a-z)" },
} as const);

export type RleCodecKey = typeof kRleCodec.$key;

export type RleCodec = {
  key: RleCodecKey;
  title: string;
  encode: (text: string) => string;
  decode: (text: string, options?: DecodeOptions) => string;
  // whether `auto` mode should treat the text as already encoded
  detect: (text: string) => boolean;
};

// auto: let the codec decide whether the text is already encoded
export type TransformMode = "encode" | "decode" | "auto";

export type TransformOutcome = {
  operation: "encode" | "decode";
  output: string;
};

const rleCodecs: Record<RleCodecKey, RleCodec> = {
  escaped: {
    key: "escaped",
    title: kRleCodec.infoByKey.escaped.title,
    encode: escapedRleEncode,
    decode: escapedRleDecode,
    detect: isEscapedRleStream,
  },
  alpha: {
    key: "alpha",
    title: kRleCodec.infoByKey.alpha.title,
    encode: alphaRleEncode,
    decode: alphaRleDecode,
    detect: looksLikeAlphaRle,
  },
};

export function resolveRleCodec(name: string): RleCodec {
  const info = kRleCodec.coerceByKey(name);
  if (!info) {
    throw new Error(`Unsupported codec: ${name} (expected one of: ${kRleCodec.keys.join(", ")})`);
  }
  return rleCodecs[info.key];
}

export function transform(
  codec: RleCodec,
  mode: TransformMode,
  text: string,
  options: DecodeOptions = {},
): TransformOutcome {
  const operation = mode === "auto" ? (codec.detect(text) ? "decode" : "encode") : mode;
  if (operation === "decode") {
    return { operation, output: codec.decode(text, options) };
  }
  return { operation, output: codec.encode(text) };
}

// Same as transform, but codec errors come back as values. Anything that is
// not an RleError is a bug and still throws.
export function tryTransform(
  codec: RleCodec,
  mode: TransformMode,
  text: string,
  options: DecodeOptions = {},
): Result<TransformOutcome> {
  try {
    return ok(transform(codec, mode, text, options));
  } catch (error) {
    if (isRleError(error)) {
      return err(error.message);
    }
    throw error;
  }
}
