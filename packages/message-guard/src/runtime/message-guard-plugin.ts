import type { EventEmitter } from 'events';
import { logger, structuredLogger, toError } from '@replyguard/shared';
import {
  createGuardSettings,
  loadGuardConfig,
  type GuardConfig,
  type GuardSettings,
} from '../config/guard-config.js';
import { GuardController } from '../services/guard-controller.js';
import type { GuardRequest, GuardResult, IdentityKey } from '../types/guard-types.js';
import { createReplyHook, type GuardDecider, type ReplyHook, type ReplyTransport } from './reply-hook.js';

export const LIFECYCLE_READY = 'ready';
export const LIFECYCLE_STOP = 'stop';

export interface MessageGuardPluginOptions {
  /** Defaults to reading `MESSAGE_GUARD_*` from the environment */
  loadConfig?: () => GuardConfig;
  /** Bot accounts known to the host, added to the configured ones */
  botAccounts?: readonly IdentityKey[];
}

/**
 * Message Guard Plugin
 *
 * Stays inert until the host's lifecycle emits `ready`; until then, and
 * after `stop`, every request goes out as the original prompt. Settings are
 * resolved once per activation and shared read-only by all requests.
 */
export class MessageGuardPlugin implements GuardDecider {
  private controller: GuardController | null = null;
  private lifecycle: EventEmitter | null = null;
  private readonly onReady = () => {
    try {
      this.activate();
    } catch (error) {
      structuredLogger.error('[message-guard] activation failed, prompts pass through', toError(error));
    }
  };
  private readonly onStop = () => this.deactivate();

  constructor(private readonly options: MessageGuardPluginOptions = {}) {}

  get isActive(): boolean {
    return this.controller !== null;
  }

  attach(lifecycle: EventEmitter): void {
    this.detach();
    this.lifecycle = lifecycle;
    lifecycle.on(LIFECYCLE_READY, this.onReady);
    lifecycle.on(LIFECYCLE_STOP, this.onStop);
  }

  detach(): void {
    if (!this.lifecycle) return;
    this.lifecycle.off(LIFECYCLE_READY, this.onReady);
    this.lifecycle.off(LIFECYCLE_STOP, this.onStop);
    this.lifecycle = null;
  }

  activate(): GuardSettings {
    const config = (this.options.loadConfig ?? loadGuardConfig)();
    const settings = createGuardSettings(config, this.options.botAccounts);
    this.controller = new GuardController(settings);

    if (!config.enabled) {
      logger.info('[message-guard] loaded but disabled by configuration');
    } else {
      logger.info(`[message-guard] active for ${settings.botSet.size} bot account(s), template ${settings.rules.version}`);
    }
    return settings;
  }

  deactivate(): void {
    if (this.controller) {
      logger.info('[message-guard] deactivated');
    }
    this.controller = null;
  }

  decide(request: GuardRequest): GuardResult {
    if (!this.controller) {
      return {
        kind: 'fallback',
        path: request.chatKind,
        reason: { kind: 'NotActivated', message: 'host has not signalled ready' },
        prompt: request.prompt,
      };
    }
    return this.controller.guard(request);
  }

  hookFor(transport: ReplyTransport): ReplyHook {
    return createReplyHook(this, transport);
  }
}
