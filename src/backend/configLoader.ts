import Ajv from "ajv";
import { config as loadDotenv } from "dotenv";
import * as fs from "node:fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "node:path";

import configSchema from "./rlecodec.schema.json";

import { RleCodecKey } from "../utils/encoding/codecRegistry";
import { kDefaultMaxOutputLength } from "../utils/encoding/runs";

export const kConfigFileName = "rlecodec.jsonc";
export const kConfigPathEnvVar = "RLECODEC_CONFIG";
export const kLogFileEnvVar = "RLECODEC_LOG_FILE";

export interface ConfigFile {
  codec?: RleCodecKey;
  maxOutputLength?: number;
  logFile?: string;
}

export interface ResolvedConfig {
  codec: RleCodecKey;
  maxOutputLength: number;
  logFile: string | null;
  // null when running on defaults
  configPath: string | null;
}

// values from the command line; they win over the environment and the file.
export interface ConfigOverrides {
  configPath?: string;
  codec?: RleCodecKey;
  maxOutputLength?: number;
  logFile?: string;
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ConfigFile>(configSchema);

// .env.local first: dotenv never overwrites a variable that is already set.
export function loadEnvironment(directory: string): void {
  loadDotenv({ path: path.join(directory, ".env.local") });
  loadDotenv({ path: path.join(directory, ".env") });
}

export function parseConfigText(text: string, filePath: string): ConfigFile {
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const first = parseErrors[0];
    throw new ConfigLoadError(
      `Failed to parse config file: ${filePath} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
    );
  }

  if (!validateConfigFile(parsed)) {
    const messages = validateConfigFile.errors?.map((e) => `${e.instancePath || "/"} ${e.message}`) || [];
    throw new ConfigValidationError(
      `Config validation failed: ${filePath}\n${messages.join("\n")}`,
      validateConfigFile.errors || [],
    );
  }
  return parsed;
}

export function loadConfigFile(filePath: string): ConfigFile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Failed to read config file: ${filePath}`, error instanceof Error ? error : undefined);
  }
  return parseConfigText(text, filePath);
}

// --config, then $RLECODEC_CONFIG, then ./rlecodec.jsonc if it exists.
export function findConfigPath(
  explicitPath: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv,
): string | null {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }
  const fromEnv = env[kConfigPathEnvVar];
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }
  const local = path.join(cwd, kConfigFileName);
  return fs.existsSync(local) ? local : null;
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const configPath = findConfigPath(overrides.configPath, cwd, env);
  const file: ConfigFile = configPath ? loadConfigFile(configPath) : {};

  const logFileFromEnv = env[kLogFileEnvVar];
  let logFile: string | null = null;
  if (overrides.logFile) {
    logFile = path.resolve(cwd, overrides.logFile);
  } else if (logFileFromEnv) {
    logFile = path.resolve(cwd, logFileFromEnv);
  } else if (file.logFile && configPath) {
    logFile = path.resolve(path.dirname(configPath), file.logFile);
  }

  return {
    codec: overrides.codec ?? file.codec ?? "escaped",
    maxOutputLength: overrides.maxOutputLength ?? file.maxOutputLength ?? kDefaultMaxOutputLength,
    logFile,
    configPath,
  };
}
