/**
 * Unit tests for the local prompt store and prompt rendering
 */

import { describe, it, expect, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { LocalPromptStore } from "@/lib/services/prompts/localPromptStore";
import { renderPrompt } from "@/lib/services/prompts/render";

describe("renderPrompt", () => {
  const template = {
    name: "test.greeting",
    template: "Hello {name}, you have {count} orders. Use {{braces}} literally.",
    description: "",
    params: ["name", "count"],
  };

  it("substitutes parameters and unescapes doubled braces", () => {
    expect(renderPrompt(template, { name: "Ana", count: 3 })).toBe(
      "Hello Ana, you have 3 orders. Use {braces} literally."
    );
  });

  it("renders null values as empty strings", () => {
    expect(renderPrompt(template, { name: null, count: 0 })).toBe(
      "Hello , you have 0 orders. Use {braces} literally."
    );
  });

  it("requires every declared parameter", () => {
    expect(() => renderPrompt(template, { name: "Ana" })).toThrow(
      "Missing required parameters for template 'test.greeting': count"
    );
  });

  it("rejects placeholders with no value", () => {
    const undeclared = { ...template, template: "Hi {name} from {team}", params: ["name"] };

    expect(() => renderPrompt(undeclared, { name: "Ana" })).toThrow(
      "Template 'test.greeting' references unknown parameter 'team'"
    );
  });

  it("ignores inherited object properties", () => {
    const inherited = { ...template, template: "x {toString} y", params: [] };

    expect(() => renderPrompt(inherited, {})).toThrow(
      "Template 'test.greeting' references unknown parameter 'toString'"
    );
    expect(() => renderPrompt({ ...template, params: ["constructor"] }, {})).toThrow(
      "Missing required parameters for template 'test.greeting': constructor"
    );
  });
});

describe("LocalPromptStore", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("loads a template by category and name", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts" });

    const template = store.get("extract", "user");

    expect(template).toEqual({
      name: "extract.user",
      template: "Extract the purchase order fields from this text:\n\n{ocr_text}",
      description: "Document text to extract from",
      params: ["ocr_text"],
    });
  });

  it("returns null for unknown templates and categories", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts" });

    expect(store.get("classify", "nope")).toBeNull();
    expect(store.get("invoices", "system")).toBeNull();
  });

  it("prefers the store language and falls back per template", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts", language: "es", fallbackLanguage: "en" });

    expect(store.get("classify", "user")?.template.startsWith("Clasifica este correo.")).toBe(true);
    expect(store.get("classify", "system")?.template.startsWith("You are an email classifier")).toBe(true);
    expect(store.get("extract", "system")?.name).toBe("extract.system");
  });

  it("lists categories across both languages", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts", language: "es" });

    expect(store.listCategories()).toEqual(["classify", "extract", "notify"]);
  });

  it("lists the prompts of a category", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts" });

    expect(store.listPrompts("notify")).toEqual(["system", "confirmation", "missing_info"]);
    expect(store.listPrompts("invoices")).toEqual([]);
  });

  it("renders a template by name", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts" });

    expect(store.getAndRender("extract", "user", { ocr_text: "PO-1" })).toBe(
      "Extract the purchase order fields from this text:\n\nPO-1"
    );
  });

  it("fails on an unknown template or missing parameters", () => {
    const store = new LocalPromptStore({ promptsDir: "prompts" });

    expect(() => store.getAndRender("classify", "nope")).toThrow("Prompt template 'classify/nope' not found");
    expect(() => store.getAndRender("classify", "user", { subject: "PO" })).toThrow(
      "Missing required parameters for template 'classify.user': sender, body, has_attachment"
    );
  });

  it("requires the prompts directory to exist", () => {
    expect(() => new LocalPromptStore({ promptsDir: "no-such-prompts-dir" })).toThrow(
      /^Prompts directory not found: /
    );
  });

  it("rejects a malformed prompt file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prompts-"));
    tempDirs.push(dir);
    fs.mkdirSync(path.join(dir, "en"));
    fs.writeFileSync(path.join(dir, "en", "broken.json"), JSON.stringify({ system: { description: "no template" } }));
    const store = new LocalPromptStore({ promptsDir: dir });

    expect(() => store.get("broken", "system")).toThrow(/^Invalid prompt file /);
  });

  it("fills in defaults for description and params", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prompts-"));
    tempDirs.push(dir);
    fs.mkdirSync(path.join(dir, "en"));
    fs.writeFileSync(path.join(dir, "en", "misc.json"), JSON.stringify({ hello: { template: "Hi" } }));
    const store = new LocalPromptStore({ promptsDir: dir });

    expect(store.get("misc", "hello")).toEqual({ name: "misc.hello", template: "Hi", description: "", params: [] });
  });
});
