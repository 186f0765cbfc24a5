import * as fs from "fs";
import * as path from "path";

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export async function readTextFileAsync(filePath: string, encoding?: BufferEncoding): Promise<string> {
  return fs.promises.readFile(filePath, encoding || "utf-8");
}

export async function writeTextFile(filePath: string, content: string, encoding?: BufferEncoding): Promise<void> {
  ensureDir(path.dirname(path.resolve(filePath)));
  await fs.promises.writeFile(filePath, content, { encoding: encoding || "utf-8" });
}

// drops a single trailing line break, the one editors add at end of file.
export function stripFinalNewline(text: string): string {
  if (text.endsWith("\r\n")) {
    return text.slice(0, -2);
  }
  if (text.endsWith("\n")) {
    return text.slice(0, -1);
  }
  return text;
}
