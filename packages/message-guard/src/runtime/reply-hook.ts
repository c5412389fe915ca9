import { structuredLogger } from '@replyguard/shared';
import type { ChatMessage, GuardRequest, GuardResult } from '../types/guard-types.js';

export interface ReplyOutcome {
  content: string;
  reasoning?: string;
  model?: string;
  toolCalls?: unknown[];
}

/**
 * How the host reaches its completion model. The guard only picks which
 * of the two calls to make.
 */
export interface ReplyTransport {
  completePrompt(prompt: string): Promise<ReplyOutcome>;
  completeMessages(messages: ChatMessage[]): Promise<ReplyOutcome>;
}

/** Anything that can turn a request into a guard decision */
export interface GuardDecider {
  decide(request: GuardRequest): GuardResult;
}

/** What the host calls in place of its own generate method */
export type ReplyHook = (request: GuardRequest) => Promise<ReplyOutcome>;

/**
 * Build the host-facing hook. Transport errors reach the host untouched.
 */
export function createReplyHook(decider: GuardDecider, transport: ReplyTransport): ReplyHook {
  return async (request) => {
    const result = decider.decide(request);

    if (result.kind === 'fallback') {
      structuredLogger.debug(`[message-guard] sending original prompt: ${result.reason.message}`, {
        path: result.path,
        reason: result.reason.kind,
      });
      return transport.completePrompt(result.prompt);
    }

    const outcome = await transport.completeMessages(result.messages);
    structuredLogger.debug('[message-guard] structured request completed', {
      path: result.path,
      model: outcome.model,
      messageCount: result.messages.length,
    });
    return { ...outcome, content: (outcome.content || '').trim() };
  };
}
