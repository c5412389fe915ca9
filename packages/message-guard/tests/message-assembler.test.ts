import { describe, it, expect } from 'vitest';
import { BotIdentitySet } from '../src/services/identity-matcher.js';
import {
  assemble,
  resolveContextLimit,
  summarizeMessages,
  toChatMessages,
} from '../src/services/message-assembler.js';
import { classify } from '../src/services/turn-classifier.js';
import { merge } from '../src/services/turn-merger.js';
import { ConfigurationError } from '../src/types/errors.js';
import type { MergedMessage } from '../src/types/guard-types.js';
import { BOT, makeTurn } from './helpers/turns.js';

const ALICE = { platform: 'qq', userId: 'alice' };
const botSet = BotIdentitySet.fromAccounts([BOT]);

const scenarioTurns = [makeTurn(0, ALICE, 'hi'), makeTurn(1, BOT, 'hello'), makeTurn(2, BOT, 'how are you')];

function history(count: number): MergedMessage[] {
  return Array.from({ length: count }, (_, idx) => ({
    role: 'user' as const,
    identity: { platform: 'qq', userId: `u${idx}` },
    lines: [`line ${idx}`],
  }));
}

describe('Message Assembler', () => {
  it('should join merged bot turns into one assistant message', () => {
    const merged = merge(classify(scenarioTurns, botSet), true);

    expect(toChatMessages(assemble('RULES', merged, 'GOAL', 0))).toEqual([
      { role: 'system', content: 'RULES' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello\nhow are you' },
      { role: 'system', content: 'GOAL' },
    ]);
  });

  it('should send every turn separately when merging is off', () => {
    const merged = merge(classify(scenarioTurns, botSet), false);

    expect(toChatMessages(assemble('RULES', merged, 'GOAL', 0))).toEqual([
      { role: 'system', content: 'RULES' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'assistant', content: 'how are you' },
      { role: 'system', content: 'GOAL' },
    ]);
  });

  it('should frame an assistant label as a user message', () => {
    const merged = merge(
      classify(
        [
          makeTurn(0, ALICE, 'T1, 小明: 今晚吃啥？', { timestampLabel: 'T1', displayName: '小明' }),
          makeTurn(1, BOT, 'T2, 麦麦(你): 火锅可以', { timestampLabel: 'T2', displayName: '麦麦(你)' }),
          makeTurn(2, BOT, 'T3, 麦麦(你): 我知道一家店', { timestampLabel: 'T3', displayName: '麦麦(你)' }),
        ],
        botSet
      ),
      true
    );

    expect(toChatMessages(assemble('sys-prefix', merged, 'sys-suffix', 0))).toEqual([
      { role: 'system', content: 'sys-prefix' },
      { role: 'user', content: 'T1, 小明: 今晚吃啥？' },
      { role: 'user', content: 'T2, 麦麦(你):' },
      { role: 'assistant', content: '火锅可以\n我知道一家店' },
      { role: 'system', content: 'sys-suffix' },
    ]);
  });

  it('should keep prefix and suffix with an empty history', () => {
    const messages = toChatMessages(assemble('RULES', [], 'GOAL', 5));

    expect(messages).toEqual([
      { role: 'system', content: 'RULES' },
      { role: 'system', content: 'GOAL' },
    ]);
  });

  it('should drop the oldest history first', () => {
    const request = assemble('RULES', history(5), 'GOAL', 2);

    expect(request.prefix).toBe('RULES');
    expect(request.suffix).toBe('GOAL');
    expect(request.history.map((message) => message.lines[0])).toEqual(['line 3', 'line 4']);
  });

  it('should keep everything when the window is 0 or larger than the history', () => {
    expect(assemble('RULES', history(3), 'GOAL', 0).history).toHaveLength(3);
    expect(assemble('RULES', history(3), 'GOAL', 10).history).toHaveLength(3);
  });

  it('should reject negative or fractional windows', () => {
    expect(() => assemble('RULES', history(1), 'GOAL', -1)).toThrow(ConfigurationError);
    expect(() => assemble('RULES', history(1), 'GOAL', 1.5)).toThrow(ConfigurationError);
  });

  it('should always start and end with exactly one system message', () => {
    for (let size = 0; size <= 4; size++) {
      const messages = toChatMessages(assemble('RULES', history(size), 'GOAL', 0));
      const systemIndexes = messages.flatMap((message, idx) => (message.role === 'system' ? [idx] : []));

      expect(systemIndexes).toEqual([0, messages.length - 1]);
      expect(messages.length).toBeGreaterThanOrEqual(2);
    }
  });

  it('should summarise role counts', () => {
    const merged = merge(classify(scenarioTurns, botSet), true);
    const messages = toChatMessages(assemble('RULES', merged, 'GOAL', 0));

    expect(summarizeMessages(messages)).toBe('4 messages (2 system, 1 user, 1 assistant)');
  });
});

describe('resolveContextLimit', () => {
  it('should inherit the host size when the override is 0', () => {
    expect(resolveContextLimit(0, 20)).toBe(20);
  });

  it('should prefer a positive override', () => {
    expect(resolveContextLimit(8, 20)).toBe(8);
  });

  it('should reject negative values', () => {
    expect(() => resolveContextLimit(-3, 20)).toThrow(ConfigurationError);
    expect(() => resolveContextLimit(0, -1)).toThrow(ConfigurationError);
  });
});
