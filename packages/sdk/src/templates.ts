/**
 * Starter documents for init
 */

import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { TemplateError } from "./errors.js";
import type { TemplateName } from "./types.js";

const TEMPLATE_DIR = fileURLToPath(new URL("../templates/", import.meta.url));

export const BUILTIN_TEMPLATES: readonly TemplateName[] = ["planning", "minimal"];

export function isBuiltinTemplate(name: string): name is TemplateName {
  return BUILTIN_TEMPLATES.some((builtin) => builtin === name);
}

/**
 * Location of a template: built-in names map to the bundled files, anything
 * else is taken as a path
 */
export function templatePath(template: string): string {
  return isBuiltinTemplate(template) ? `${TEMPLATE_DIR}${template}.yaml` : template;
}

/**
 * Read template text
 * @param template - "planning" (default), "minimal", or a path to a YAML file
 * @throws {TemplateError} If the template cannot be read
 */
export async function loadTemplate(template = ""): Promise<string> {
  const name = template === "" ? "planning" : template;
  try {
    return await fs.readFile(templatePath(name), "utf-8");
  } catch (err) {
    throw new TemplateError(name, { cause: err });
  }
}
