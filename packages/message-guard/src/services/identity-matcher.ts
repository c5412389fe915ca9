import type { IdentityKey } from '../types/guard-types.js';
import { ConfigurationError } from '../types/errors.js';

function keyOf(identity: IdentityKey): string {
  return JSON.stringify([identity.platform, identity.userId]);
}

/**
 * The bot's own accounts across platforms. Built once at activation and
 * never mutated afterwards.
 */
export class BotIdentitySet {
  private readonly keys: ReadonlySet<string>;
  readonly accounts: readonly IdentityKey[];

  private constructor(accounts: readonly IdentityKey[]) {
    this.accounts = Object.freeze(accounts.map((account) => Object.freeze({ ...account })));
    this.keys = new Set(this.accounts.map(keyOf));
  }

  static fromAccounts(accounts: readonly IdentityKey[]): BotIdentitySet {
    return new BotIdentitySet(accounts);
  }

  static empty(): BotIdentitySet {
    return new BotIdentitySet([]);
  }

  has(identity: IdentityKey): boolean {
    return this.keys.has(keyOf(identity));
  }

  get size(): number {
    return this.keys.size;
  }
}

/**
 * Exact match on platform and user id. No trimming, no case folding.
 */
export function isBot(identity: IdentityKey, botSet: BotIdentitySet): boolean {
  return botSet.has(identity);
}

/**
 * Parse a `platform:userId,platform:userId` account list.
 */
export function parseBotAccounts(raw: string): IdentityKey[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf(':');
      const platform = entry.slice(0, separator);
      const userId = entry.slice(separator + 1);
      if (separator <= 0 || userId.length === 0) {
        throw new ConfigurationError(`Malformed bot account "${entry}", expected platform:userId`);
      }
      return { platform, userId };
    });
}
