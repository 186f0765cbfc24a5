import * as cons from "../utils/console";
import { tryTransform, TransformMode } from "../utils/encoding/codecRegistry";
import { emitOutput, openSession, readInputText, renderOutcome } from "./core";
import { CommandLineOptions } from "./parseOptions";

export async function transformCommand(
  mode: TransformMode,
  text: string | undefined,
  options?: CommandLineOptions,
): Promise<void> {
  const session = openSession(options);
  cons.dim(`rlecodec: ${mode} (${session.codec.key})`);

  const input = await readInputText(text, options?.input);
  const result = tryTransform(session.codec, mode, input, { maxOutputLength: session.config.maxOutputLength });
  if (!result.ok) {
    cons.error(`Error: ${result.error}`);
    process.exitCode = 1;
    return;
  }

  // files get the bare result, the terminal gets the labelled one
  const rendered = options?.output ? result.value.output : renderOutcome(mode, result.value);
  await emitOutput(rendered, options?.output);
}
