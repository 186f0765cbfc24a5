import * as fs from "node:fs";
import * as path from "node:path";
import { kRleCodec } from "./encoding/codecRegistry";
import { kEscapedRleHeader } from "./encoding/escapedRle";

// {{VARIABLE_NAME}} gets replaced with the string value.
export function applyTemplateVariables(template: string, variables: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(variables)) {
    output = output.split(`{{${key}}}`).join(value);
  }
  return output;
}

function loadHelpTemplate(templateName: string): string {
  const templatePath = path.resolve(__dirname, "..", "..", "templates", "help", `${templateName}.txt`);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Help template not found: ${templatePath}`);
  }
  return fs.readFileSync(templatePath, "utf-8");
}

export function renderHelpTemplate(templateName: string): string {
  const template = loadHelpTemplate(templateName);
  const variables: Record<string, string> = {
    HEADER: kEscapedRleHeader,
    CODECS: kRleCodec.keys.join(", "),
  };
  return applyTemplateVariables(template, variables);
}
