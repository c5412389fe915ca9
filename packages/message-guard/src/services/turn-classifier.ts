import type { ClassifiedTurn, HistoryTurn } from '../types/guard-types.js';
import { isBot, type BotIdentitySet } from './identity-matcher.js';

/**
 * Split an assistant turn's `<timestamp>, <name>:` header from what the bot
 * actually said. Without that exact header the whole body is content.
 */
export function splitAssistantBody(turn: HistoryTurn): { labelFragment: string; contentFragment: string } {
  const header = `${turn.timestampLabel}, ${turn.displayName}:`;
  if (turn.timestampLabel && turn.displayName && turn.body.startsWith(header)) {
    const content = turn.body.slice(header.length).trim();
    if (content) {
      return { labelFragment: header, contentFragment: content };
    }
  }
  return { labelFragment: '', contentFragment: turn.body };
}

/**
 * Assign roles turn by turn. Only the identity decides; display names are
 * ignored. Order and count are preserved.
 */
export function classify(turns: readonly HistoryTurn[], botSet: BotIdentitySet): ClassifiedTurn[] {
  return turns.map((turn): ClassifiedTurn => {
    if (!isBot(turn.identity, botSet)) {
      return { ...turn, role: 'user' };
    }
    return { ...turn, role: 'assistant', ...splitAssistantBody(turn) };
  });
}
