import type { PromptParams, PromptTemplate } from "./types";

const PLACEHOLDER = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Render `{param}` placeholders. `{{` and `}}` produce literal braces.
 * Null or undefined values render as "".
 */
export function renderPrompt(template: PromptTemplate, params: PromptParams): string {
  const missing = template.params.filter((param) => !Object.hasOwn(params, param));
  if (missing.length > 0) {
    throw new Error(
      `Missing required parameters for template '${template.name}': ${missing.join(", ")}`
    );
  }

  return template.template.replace(PLACEHOLDER, (match: string, key: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    if (key === undefined || !Object.hasOwn(params, key)) {
      throw new Error(`Template '${template.name}' references unknown parameter '${key ?? match}'`);
    }
    const value = params[key];
    return value == null ? "" : String(value);
  });
}
