// src/services/chatModel.ts
// What: OpenAI chat-completions adapter for the generative model.
// How: Sends the assembled messages with a strict json_schema response format describing the answer reply and
//      passes the caller's AbortSignal through to the HTTP request. Returns the raw message content; validation
//      happens in the generation orchestrator.

import type OpenAI from 'openai';
import type { ChatMessage, CompletionOptions, GenerativeModel } from '../models/types.js';

export const AnswerReplyJSONSchema = {
  name: 'AnswerReply',
  strict: true,
  schema: {
    type: 'object' as const,
    additionalProperties: false,
    properties: {
      answer: {
        type: 'string' as const,
        description: 'The answer to the user question.',
      },
      citations: {
        type: 'array' as const,
        items: { type: 'string' as const },
        description: 'Ids of the context chunks the answer relies on.',
      },
      images: {
        type: 'array' as const,
        items: { type: 'string' as const },
        description: 'Ids of the listed images that illustrate the answer.',
      },
    },
    required: ['answer', 'citations', 'images'],
  },
};

export interface OpenAIChatModelOptions {
  model: string;
  temperature?: number;
  maxCompletionTokens?: number;
}

export class OpenAIChatModel implements GenerativeModel {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAIChatModelOptions,
  ) {}

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        temperature: this.options.temperature ?? 0.2,
        max_completion_tokens: this.options.maxCompletionTokens ?? 1500,
        messages: messages.map(toMessageParam),
        response_format: {
          type: 'json_schema',
          json_schema: AnswerReplyJSONSchema,
        },
      },
      { signal: options.signal },
    );
    return completion.choices[0]?.message?.content ?? '';
  }
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
