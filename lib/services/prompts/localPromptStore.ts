/**
 * Prompt store backed by JSON files on disk.
 *
 * Layout:
 *   prompts/
 *     en/classify.json   -> category "classify"
 *     en/notify.json
 *     es/...
 *
 * Each file maps a prompt name to { template, description?, params? }.
 * Lookups try the store language first, then the fallback language.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { renderPrompt } from "./render";
import type { PromptParams, PromptStore, PromptTemplate } from "./types";

const promptFileSchema = z.record(
  z.string(),
  z.object({
    template: z.string(),
    description: z.string().default(""),
    params: z.array(z.string()).default([]),
  })
);

type PromptFile = z.infer<typeof promptFileSchema>;

export type LocalPromptStoreOptions = {
  promptsDir: string;
  language?: string;
  fallbackLanguage?: string;
};

export class LocalPromptStore implements PromptStore {
  readonly language: string;
  readonly fallbackLanguage: string;
  private readonly baseDir: string;
  private readonly cache = new Map<string, PromptFile | null>();

  constructor(options: LocalPromptStoreOptions) {
    this.baseDir = path.resolve(options.promptsDir);
    this.language = options.language ?? "en";
    this.fallbackLanguage = options.fallbackLanguage ?? "en";

    if (!fs.existsSync(this.baseDir)) {
      throw new Error(`Prompts directory not found: ${this.baseDir}`);
    }
  }

  get(category: string, name: string): PromptTemplate | null {
    for (const lang of this.languages()) {
      const entry = this.loadCategory(category, lang)?.[name];
      if (entry) {
        return {
          name: `${category}.${name}`,
          template: entry.template,
          description: entry.description,
          params: entry.params,
        };
      }
    }
    return null;
  }

  listCategories(): string[] {
    const categories = new Set<string>();
    for (const lang of this.languages()) {
      const langDir = path.join(this.baseDir, lang);
      if (!fs.existsSync(langDir)) continue;
      for (const file of fs.readdirSync(langDir)) {
        if (file.endsWith(".json")) categories.add(path.basename(file, ".json"));
      }
    }
    return [...categories].sort();
  }

  listPrompts(category: string): string[] {
    for (const lang of this.languages()) {
      const data = this.loadCategory(category, lang);
      if (data) return Object.keys(data);
    }
    return [];
  }

  getAndRender(category: string, name: string, params: PromptParams = {}): string {
    const template = this.get(category, name);
    if (!template) {
      throw new Error(`Prompt template '${category}/${name}' not found`);
    }
    return renderPrompt(template, params);
  }

  private languages(): string[] {
    return this.language === this.fallbackLanguage
      ? [this.language]
      : [this.language, this.fallbackLanguage];
  }

  private loadCategory(category: string, lang: string): PromptFile | null {
    const cacheKey = `${lang}/${category}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) return cached;

    const filePath = path.join(this.baseDir, lang, `${category}.json`);
    if (!fs.existsSync(filePath)) {
      this.cache.set(cacheKey, null);
      return null;
    }

    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    const parsed = promptFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid prompt file ${filePath}: ${parsed.error.message}`);
    }

    this.cache.set(cacheKey, parsed.data);
    return parsed.data;
  }
}
