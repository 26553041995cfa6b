import type { z } from "zod";

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

/**
 * Language model capability used by the classify, extract and notify stages.
 *
 * Implementations hold configuration only and are shared between runs.
 */
export interface LlmService {
  /**
   * Ask for a response matching `schema`. Throws when the model refuses or
   * the response does not parse.
   */
  structuredOutput<T extends z.ZodTypeAny>(
    messages: ChatMessage[],
    schema: T,
    schemaName: string
  ): Promise<z.infer<T>>;

  /** Free-text completion; "" when the model returns no content. */
  generateText(messages: ChatMessage[]): Promise<string>;
}
