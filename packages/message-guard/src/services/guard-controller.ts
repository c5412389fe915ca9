import { structuredLogger } from '@replyguard/shared';
import type { GuardSettings } from '../config/guard-config.js';
import { isRewritePrompt } from '../config/template-rules.js';
import type {
  ChatKind,
  FallbackReason,
  GuardRequest,
  GuardResult,
  HistoryTurn,
  ReplyPath,
} from '../types/guard-types.js';
import { isGuardError } from '../types/errors.js';
import { inferTimeMode } from '../utils/time-format.js';
import { locateHistoryRegion, parseHistoryTurns } from './prompt-segmenter.js';
import { turnsFromRecords } from './record-history.js';
import { classify } from './turn-classifier.js';
import { merge } from './turn-merger.js';
import { assemble, resolveContextLimit, summarizeMessages, toChatMessages } from './message-assembler.js';

// =====================================================
// GUARD CONTROLLER
// Decides once per request: structured messages, or the original prompt
// =====================================================

export class GuardController {
  constructor(private readonly settings: GuardSettings) {}

  /**
   * Which call path a request belongs to. Rewrite prompts are recognised by
   * their template markers regardless of chat kind.
   */
  resolvePath(prompt: string, chatKind: ChatKind): ReplyPath {
    return isRewritePrompt(prompt, this.settings.rules) ? 'rewrite' : chatKind;
  }

  private disabledReason(request: GuardRequest, path: ReplyPath): FallbackReason | null {
    const { config } = this.settings;
    if (!config.enabled) {
      return { kind: 'GuardDisabled', message: 'message guard is disabled' };
    }
    const chatEnabled = request.chatKind === 'group' ? config.applyGroup : config.applyPrivate;
    if (!chatEnabled) {
      return { kind: 'PathDisabled', message: `${request.chatKind} replies are not guarded` };
    }
    if (path === 'rewrite' && !config.applyRewrite) {
      return { kind: 'PathDisabled', message: 'rewrite replies are not guarded' };
    }
    return null;
  }

  private collectTurns(request: GuardRequest, historyLines: string[], now: number): HistoryTurn[] {
    const { config, rules, botSet } = this.settings;
    if (request.history) {
      return turnsFromRecords(request.history, {
        rules,
        botSet,
        botNickname: config.botNickname,
        timeMode: inferTimeMode(request.prompt),
        now,
      });
    }
    return parseHistoryTurns(historyLines, rules);
  }

  /**
   * Run the whole pipeline or nothing. Guard errors become a fallback when
   * `fallbackToOriginal` is on and are rethrown otherwise; any other error
   * always propagates.
   */
  guard(request: GuardRequest): GuardResult {
    const path = this.resolvePath(request.prompt, request.chatKind);
    const disabled = this.disabledReason(request, path);
    if (disabled) {
      return { kind: 'fallback', path, reason: disabled, prompt: request.prompt };
    }

    const { config, rules, botSet } = this.settings;
    try {
      const now = request.now ?? Date.now() / 1000;
      const layout = locateHistoryRegion(request.prompt, rules);
      const turns = this.collectTurns(request, layout.historyLines, now);
      const merged = merge(classify(turns, botSet), config.mergeConsecutive);
      const limit = resolveContextLimit(config.maxContextSizeOverride, request.hostContextSize);
      const structured = assemble(layout.prefix, merged, layout.suffix, limit);
      const messages = toChatMessages(structured);

      if (config.verbose) {
        structuredLogger.info(`[message-guard] structured ${path} prompt: ${summarizeMessages(messages)}`, {
          path,
          strategy: layout.strategy,
          historyCount: turns.length,
          messageCount: messages.length,
        });
      }
      return { kind: 'structured', path, request: structured, messages };
    } catch (error) {
      if (!isGuardError(error)) {
        throw error;
      }

      structuredLogger.warn(`[message-guard] structuring failed: ${error.message}`, {
        path,
        reason: error.kind,
      });
      if (!config.fallbackToOriginal) {
        throw error;
      }
      return {
        kind: 'fallback',
        path,
        reason: { kind: error.kind, message: error.message },
        prompt: request.prompt,
      };
    }
  }
}
