import type { ChatMessage, ChatRole, MergedMessage, StructuredRequest } from '../types/guard-types.js';
import { ConfigurationError } from '../types/errors.js';

// =====================================================
// MESSAGE ASSEMBLER
// Wraps merged history in the prefix/suffix system messages
// =====================================================

function assertWindow(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * The history window to apply: a positive override wins, otherwise the
 * host's own size is used unchanged (0 meaning no window at all).
 */
export function resolveContextLimit(override: number, hostContextSize = 0): number {
  assertWindow(override, 'max context size override');
  assertWindow(hostContextSize, 'host context size');
  return override > 0 ? override : hostContextSize;
}

/**
 * @param maxContextSize 0 keeps every merged message; N keeps the newest N
 */
export function assemble(
  prefix: string,
  merged: readonly MergedMessage[],
  suffix: string,
  maxContextSize: number
): StructuredRequest {
  assertWindow(maxContextSize, 'max context size');

  const history =
    maxContextSize > 0 && merged.length > maxContextSize
      ? merged.slice(merged.length - maxContextSize)
      : [...merged];

  return { prefix, history, suffix };
}

function push(messages: ChatMessage[], role: ChatRole, text: string): void {
  const content = text.trim();
  if (content) {
    messages.push({ role, content });
  }
}

/**
 * Render the wire shape: `system, (user|assistant)+, system`. An assistant
 * message's label goes out as a user message right before it.
 */
export function toChatMessages(request: StructuredRequest): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: request.prefix.trim() }];

  for (const message of request.history) {
    if (message.role === 'assistant' && message.annotation) {
      push(messages, 'user', message.annotation);
    }
    push(messages, message.role, message.lines.join('\n'));
  }

  messages.push({ role: 'system', content: request.suffix.trim() });
  return messages;
}

export function summarizeMessages(messages: readonly ChatMessage[]): string {
  const counts: Record<ChatRole, number> = { system: 0, user: 0, assistant: 0 };
  for (const message of messages) {
    counts[message.role]++;
  }
  return `${messages.length} messages (${counts.system} system, ${counts.user} user, ${counts.assistant} assistant)`;
}
