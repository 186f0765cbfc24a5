import { ConfigOverrides } from "../backend/configLoader";
import { kRleCodec } from "../utils/encoding/codecRegistry";

// as handed over by commander; everything arrives as strings.
export interface CommandLineOptions {
  codec?: string;
  input?: string;
  output?: string;
  config?: string;
  maxOutput?: string;
  logFile?: string;
}

export function parsePositiveInt(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^[1-9][0-9]*$/.test(trimmed)) {
    throw new Error(`Invalid ${label}: ${value} (expected a positive integer)`);
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid ${label}: ${value} (too large)`);
  }
  return parsed;
}

export function parseConfigOverrides(cmd?: CommandLineOptions | undefined): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (cmd?.config) {
    overrides.configPath = cmd.config;
  }
  if (cmd?.codec) {
    const info = kRleCodec.coerceByKey(cmd.codec);
    if (!info) {
      throw new Error(`Unsupported codec: ${cmd.codec} (expected one of: ${kRleCodec.keys.join(", ")})`);
    }
    overrides.codec = info.key;
  }
  if (cmd?.maxOutput) {
    overrides.maxOutputLength = parsePositiveInt(cmd.maxOutput, "--max-output");
  }
  if (cmd?.logFile) {
    overrides.logFile = cmd.logFile;
  }
  return overrides;
}
