#!/usr/bin/env node

import { Command } from "commander";
import { CommandLineOptions } from "./frontend/parseOptions";
import { replCommand } from "./frontend/repl";
import { transformCommand } from "./frontend/transformCommand";
import * as cons from "./utils/console";
import { kRleCodec } from "./utils/encoding/codecRegistry";
import { errorMessage } from "./utils/errorHandling";

const kVersion = "0.1.0";

function addCommonOptions(command: Command): Command {
  return command
    .option("-c, --codec <name>", `Codec to use (${kRleCodec.keys.join(", ")})`)
    .option("--config <path>", "Config file (default: ./rlecodec.jsonc)")
    .option("--max-output <n>", "Largest decoded output accepted, in characters")
    .option("--log-file <path>", "Append log messages to a file");
}

function addIoOptions(command: Command): Command {
  return command
    .option("-i, --input <file>", "Read the text from a file instead of the argument")
    .option("-o, --output <file>", "Write the result to a file instead of stdout");
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("rlecodec")
    .description("Run-length encode and decode text, with escaping for digits and '#'")
    .version(kVersion, "-v, --version", "Output version information");

  addIoOptions(addCommonOptions(program.command("encode [text]")))
    .alias("e")
    .description("Encode text")
    .action(async (text?: string, options?: CommandLineOptions) => {
      await transformCommand("encode", text, options);
    });

  addIoOptions(addCommonOptions(program.command("decode [stream]")))
    .alias("d")
    .description("Decode an encoded stream")
    .action(async (stream?: string, options?: CommandLineOptions) => {
      await transformCommand("decode", stream, options);
    });

  addIoOptions(addCommonOptions(program.command("auto [text]")))
    .alias("a")
    .description("Decode if the text looks encoded, otherwise encode it")
    .action(async (text?: string, options?: CommandLineOptions) => {
      await transformCommand("auto", text, options);
    });

  addCommonOptions(program.command("repl"))
    .alias("r")
    .description("Interactive encode/decode loop")
    .action(async (options?: CommandLineOptions) => {
      await replCommand(options);
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  cons.error(errorMessage(error));
  process.exitCode = 1;
});
