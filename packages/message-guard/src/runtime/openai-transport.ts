import type OpenAI from 'openai';
import type { ChatMessage } from '../types/guard-types.js';
import type { ReplyOutcome, ReplyTransport } from './reply-hook.js';

interface CompletionLike {
  model: string;
  choices: Array<{ message: { content: string | null; tool_calls?: unknown[] } }>;
}

/** The slice of the OpenAI client the transport needs */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<CompletionLike>;
    };
  };
}

export interface OpenAITransportOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

function toParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Chat-completions transport. The unguarded path sends the flattened
 * prompt as a single user message, the way the host does.
 */
export function createOpenAITransport(
  client: ChatCompletionsClient,
  options: OpenAITransportOptions
): ReplyTransport {
  const send = async (messages: ChatMessage[]): Promise<ReplyOutcome> => {
    const completion = await client.chat.completions.create({
      model: options.model,
      messages: messages.map(toParam),
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    });

    const choice = completion.choices[0];
    return {
      content: choice?.message.content ?? '',
      model: completion.model,
      toolCalls: choice?.message.tool_calls,
    };
  };

  return {
    completePrompt: (prompt) => send([{ role: 'user', content: prompt }]),
    completeMessages: (messages) => send(messages),
  };
}
