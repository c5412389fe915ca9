import type { TemplateRules } from '../config/template-rules.js';

// `<name:id>` mentions and reply references left in raw message text
const USER_REFERENCE = /<([^<>:]+):([^<>]+)>/g;
const PICTURE_TOKEN = /\[picid:[^\]]+\]/g;

/**
 * Prepare a raw history record's text for the model: resolve user
 * references to names and collapse picture ids into a placeholder.
 */
export function normalizeMessageContent(raw: string, rules: TemplateRules): string {
  if (!raw.trim()) {
    return '';
  }

  return raw
    .replace(USER_REFERENCE, (_match, name: string) => name)
    .replace(PICTURE_TOKEN, rules.imagePlaceholder)
    .trim();
}
