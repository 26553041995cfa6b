export type PromptTemplate = {
  /** "<category>.<name>", e.g. "classify.system" */
  name: string;
  template: string;
  description: string;
  params: string[];
};

export type PromptParams = Record<string, string | number | boolean | null | undefined>;

/**
 * Prompt templates organised by category (one file per category) and name,
 * with a per-store language and a fallback language.
 */
export interface PromptStore {
  readonly language: string;
  readonly fallbackLanguage: string;
  get(category: string, name: string): PromptTemplate | null;
  listCategories(): string[];
  listPrompts(category: string): string[];
  /** Throws when the template is unknown or a declared param is missing. */
  getAndRender(category: string, name: string, params?: PromptParams): string;
}
