import * as path from "node:path";
import { loadEnvironment, resolveConfig, ResolvedConfig } from "../backend/configLoader";
import * as cons from "../utils/console";
import { RleCodec, resolveRleCodec, TransformMode, TransformOutcome } from "../utils/encoding/codecRegistry";
import { ensureDir, readTextFileAsync, stripFinalNewline, writeTextFile } from "../utils/fileSystem";
import { CommandLineOptions, parseConfigOverrides } from "./parseOptions";

export type Session = {
  config: ResolvedConfig;
  codec: RleCodec;
};

export function openSession(options?: CommandLineOptions, cwd: string = process.cwd()): Session {
  loadEnvironment(cwd);
  const config = resolveConfig(parseConfigOverrides(options), cwd);
  if (config.logFile) {
    ensureDir(path.dirname(config.logFile));
  }
  cons.setLogFile(config.logFile);
  if (config.configPath) {
    cons.dim(`Using config: ${config.configPath}`);
  }
  return { config, codec: resolveRleCodec(config.codec) };
}

export async function readInputText(text: string | undefined, inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    if (text !== undefined) {
      throw new Error("Pass either text or --input <file>, not both");
    }
    return stripFinalNewline(await readTextFileAsync(inputPath));
  }
  if (text === undefined) {
    throw new Error("No input: pass the text as an argument or use --input <file>");
  }
  return text;
}

// auto mode says which way it went, the explicit modes print the bare result.
export function renderOutcome(mode: TransformMode, outcome: TransformOutcome): string {
  if (mode !== "auto") {
    return outcome.output;
  }
  return outcome.operation === "decode" ? `Decoded => ${outcome.output}` : `Encoded => ${outcome.output}`;
}

export async function emitOutput(text: string, outputPath: string | undefined): Promise<void> {
  if (outputPath) {
    await writeTextFile(outputPath, text);
    cons.success(`Wrote ${outputPath}`);
    return;
  }
  process.stdout.write(text + "\n");
}
