import type { ClassifiedTurn, IdentityKey, MergedMessage } from '../types/guard-types.js';

function sameIdentity(a: IdentityKey, b: IdentityKey): boolean {
  return a.platform === b.platform && a.userId === b.userId;
}

function canJoin(current: MergedMessage, next: MergedMessage): boolean {
  return current.role === next.role && sameIdentity(current.identity, next.identity);
}

function toMessage(turn: ClassifiedTurn): MergedMessage {
  if (turn.role === 'user') {
    return { role: 'user', identity: { ...turn.identity }, lines: [turn.body] };
  }
  const message: MergedMessage = {
    role: 'assistant',
    identity: { ...turn.identity },
    lines: [turn.contentFragment],
  };
  if (turn.labelFragment) {
    message.annotation = turn.labelFragment;
  }
  return message;
}

/**
 * Join adjacent messages that share role and identity. The first message's
 * annotation is kept; later ones in the run are dropped. Running it on its
 * own output changes nothing.
 */
export function coalesce(messages: readonly MergedMessage[]): MergedMessage[] {
  const merged: MergedMessage[] = [];

  for (const message of messages) {
    const last = merged[merged.length - 1];
    if (last && canJoin(last, message)) {
      last.lines.push(...message.lines);
      continue;
    }
    merged.push({ ...message, identity: { ...message.identity }, lines: [...message.lines] });
  }

  return merged;
}

export function merge(turns: readonly ClassifiedTurn[], enabled: boolean): MergedMessage[] {
  const messages = turns.map(toMessage);
  return enabled ? coalesce(messages) : messages;
}
