import * as readline from "node:readline";
import * as cons from "../utils/console";
import { kRleCodec, RleCodec, resolveRleCodec, tryTransform } from "../utils/encoding/codecRegistry";
import { kEscapedRleHeader } from "../utils/encoding/escapedRle";
import { renderHelpTemplate } from "../utils/help";
import { openSession, renderOutcome } from "./core";
import { CommandLineOptions } from "./parseOptions";

export type ReplState = {
  codec: RleCodec;
  maxOutputLength: number;
};

export type ReplStep =
  | { kind: "quit" }
  | { kind: "help" }
  | { kind: "output"; text: string }
  | { kind: "info"; text: string }
  | { kind: "invalid"; text: string };

type ParsedReplCommand = {
  name: string;
  args: string[];
};

const replCommandNames = new Set(["h", "help", "q", "quit", "exit", "codec"]);

export function getPrompt(state: ReplState): string {
  if (state.codec.key === "alpha") {
    return "Enter a string (alphabetic to encode, or RLE to decode): ";
  }
  return `Enter text (starts with '${kEscapedRleHeader}' to decode; otherwise encode): `;
}

// Only known names count as commands, so text such as ":-)" still gets encoded.
export function parseReplCommand(line: string): ParsedReplCommand | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(":")) {
    return null;
  }

  const parts = trimmed.slice(1).trim().split(/\s+/);
  const name = (parts.shift() || "").toLowerCase();
  if (!replCommandNames.has(name)) {
    return null;
  }
  return { name, args: parts };
}

function handleCodecCommand(args: string[], state: ReplState): ReplStep {
  if (args.length === 0) {
    return { kind: "info", text: `codec: ${state.codec.key}` };
  }
  if (args.length > 1 || !kRleCodec.isValidKey(args[0])) {
    return { kind: "invalid", text: `Usage: :codec ${kRleCodec.keys.join("|")}` };
  }
  state.codec = resolveRleCodec(args[0]);
  return { kind: "info", text: `codec: ${state.codec.key}` };
}

export function handleReplLine(line: string, state: ReplState): ReplStep {
  const command = parseReplCommand(line);
  if (command) {
    switch (command.name) {
      case "h":
      case "help":
        return { kind: "help" };
      case "q":
      case "quit":
      case "exit":
        return { kind: "quit" };
      case "codec":
        return handleCodecCommand(command.args, state);
    }
  }

  if (line.length === 0) {
    return { kind: "invalid", text: "Invalid input: input cannot be empty." };
  }

  // "::" escapes a leading colon, so "::q" is the text ":q"
  const text = line.startsWith("::") ? line.slice(1) : line;
  const result = tryTransform(state.codec, "auto", text, { maxOutputLength: state.maxOutputLength });
  if (!result.ok) {
    return { kind: "invalid", text: `Error: ${result.error}` };
  }
  return { kind: "output", text: renderOutcome("auto", result.value) };
}

export type ReplStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  // prompts are only shown to a person typing
  interactive: boolean;
};

const stdioStreams: ReplStreams = {
  input: process.stdin,
  output: process.stdout,
  interactive: process.stdin.isTTY === true,
};

export async function replCommand(options?: CommandLineOptions, streams: ReplStreams = stdioStreams): Promise<void> {
  const session = openSession(options);
  const state: ReplState = {
    codec: session.codec,
    maxOutputLength: session.config.maxOutputLength,
  };

  cons.h1("rlecodec repl");
  cons.info(`Codec: ${state.codec.title}`);
  cons.info("Type :help for commands. Use :quit to exit.\n");

  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
    terminal: streams.interactive,
  });

  rl.on("SIGINT", () => {
    cons.info("\nExiting REPL...");
    rl.close();
  });

  const prompt = () => {
    if (streams.interactive) {
      rl.setPrompt(getPrompt(state));
      rl.prompt();
    }
  };

  // the async iterator queues lines, so piped input arriving in one chunk is not lost.
  // leaving the loop closes the interface.
  prompt();
  for await (const line of rl) {
    const step = handleReplLine(line, state);
    if (step.kind === "quit") {
      break;
    }
    switch (step.kind) {
      case "help":
        streams.output.write(renderHelpTemplate("repl"));
        break;
      case "output":
        streams.output.write(step.text + "\n");
        break;
      case "info":
        cons.info(step.text);
        break;
      case "invalid":
        cons.error(step.text);
        break;
    }
    prompt();
  }
}
