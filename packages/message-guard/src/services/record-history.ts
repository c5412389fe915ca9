import type { TemplateRules } from '../config/template-rules.js';
import type { HistoryRecord, HistoryTurn } from '../types/guard-types.js';
import { IdentityResolutionError } from '../types/errors.js';
import { normalizeMessageContent } from '../utils/content-normalizer.js';
import { formatTimestamp, type TimeMode } from '../utils/time-format.js';
import { isBot, type BotIdentitySet } from './identity-matcher.js';

export interface RecordRenderContext {
  rules: TemplateRules;
  botSet: BotIdentitySet;
  botNickname: string;
  timeMode: TimeMode;
  /** Unix seconds */
  now: number;
}

function resolveSpeakerName(record: HistoryRecord, context: RecordRenderContext): string {
  const identity = { platform: record.platform, userId: record.userId };
  if (isBot(identity, context.botSet)) {
    return `${context.botNickname}${context.rules.selfNameSuffix}`;
  }
  return (
    record.personName ||
    record.nickname ||
    record.cardName ||
    record.userId ||
    context.rules.anonymousName
  );
}

/**
 * Build history turns from the records the host already gathered. Identity
 * comes from the record itself, never from rendered text. Records without
 * content are skipped before order indices are assigned.
 */
export function turnsFromRecords(
  records: readonly HistoryRecord[],
  context: RecordRenderContext
): HistoryTurn[] {
  const turns: HistoryTurn[] = [];

  records.forEach((record, position) => {
    if (!record.platform || !record.userId) {
      throw new IdentityResolutionError(`History record ${position} has no platform/user id`, {
        position,
        platform: record.platform,
      });
    }

    const content = normalizeMessageContent(record.content, context.rules);
    if (!content) {
      return;
    }

    const time = Number.isFinite(record.time) && record.time > 0 ? record.time : context.now;
    const timestampLabel = formatTimestamp(time, context.timeMode, context.now);
    const displayName = resolveSpeakerName(record, context);

    turns.push({
      identity: { platform: record.platform, userId: record.userId },
      displayName,
      timestampLabel,
      body: `${timestampLabel}, ${displayName}: ${content}`,
      orderIndex: turns.length,
    });
  });

  return turns;
}
