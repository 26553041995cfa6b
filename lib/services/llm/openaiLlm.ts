/**
 * OpenAI-backed language model service.
 *
 * Structured calls go through the SDK's zod helper so the response is parsed
 * and checked against the same schema the stage declares.
 */

import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { z } from "zod";
import type { ChatMessage, LlmService } from "./types";

export type OpenAiLlmOptions = {
  apiKey: string;
  model?: string;
  baseUrl?: string | null;
  timeoutMs?: number;
  maxRetries?: number;
};

const STRUCTURED_TEMPERATURE = 0.1;

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  if (message.role === "system") {
    return { role: "system", content: message.content };
  }
  return { role: "user", content: message.content };
}

export class OpenAiLlmService implements LlmService {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAiLlmOptions) {
    this.model = options.model || "gpt-4o-mini";
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? undefined,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  async structuredOutput<T extends z.ZodTypeAny>(
    messages: ChatMessage[],
    schema: T,
    schemaName: string
  ): Promise<z.infer<T>> {
    const completion = await this.client.beta.chat.completions.parse({
      model: this.model,
      messages: messages.map(toOpenAiMessage),
      response_format: zodResponseFormat(schema, schemaName),
      temperature: STRUCTURED_TEMPERATURE,
    });

    const message = completion.choices[0]?.message;
    if (message?.refusal) {
      throw new Error(`LLM refused to respond for ${schemaName}: ${message.refusal}`);
    }
    if (message?.parsed == null) {
      throw new Error(`LLM response could not be parsed into ${schemaName}`);
    }
    return schema.parse(message.parsed);
  }

  async generateText(messages: ChatMessage[]): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(toOpenAiMessage),
    });
    return completion.choices[0]?.message?.content ?? "";
  }
}
