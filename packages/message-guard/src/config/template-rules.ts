import { ConfigurationError } from '../types/errors.js';

/**
 * Template Rules
 *
 * The layout contract of the host's reply prompt. Every delimiter the
 * segmenter relies on lives here, keyed by template version. A host that
 * changes its prompt layout needs a new version; the old rules never
 * loosen to accept it.
 *
 * Marker-mode history trusts the host to escape message text: a message
 * line that starts with `[platform:userId]<timestamp>, ` is read as a new
 * turn, and one that starts with a suffix starter after the last such turn
 * is read as the suffix. Hosts that cannot escape line starts should pass
 * their history records instead.
 */

export interface TemplateRules {
  version: string;
  /** A line starting with one of these ends the prefix (reply prompts) */
  timeAnchors: readonly string[];
  /** A line containing one of these ends the prefix (rewrite prompts) */
  historyHeaders: readonly string[];
  /** First line starting with one of these begins the suffix */
  suffixStarters: readonly string[];
  /** Markers identifying a rewrite prompt */
  rewriteMarkers: readonly string[];
  /** Lines allowed ahead of the first turn */
  preambleStarters: readonly string[];
  /** Non-timestamped lines that still belong to a history block */
  historyLinePatterns: readonly RegExp[];
  /** Human-readable time label, unanchored */
  timestampPattern: RegExp;
  /** Turn header: `[platform:userId]<timestamp>, <name>: <utterance>` */
  turnHeaderPattern: RegExp;
  /** Timeline line, identity marker optional */
  timelinePattern: RegExp;
  /** Valid contents of an identity marker */
  identityMarkerPattern: RegExp;
  selfNameSuffix: string;
  anonymousName: string;
  imagePlaceholder: string;
}

const TIMESTAMP_SOURCE =
  '刚刚|\\d+秒前|\\d+分钟前|\\d+小时前|\\d+天前|' +
  '\\d{1,2}:\\d{2}(?::\\d{2})?|\\d{1,2}-\\d{1,2}\\s+\\d{1,2}:\\d{2}(?::\\d{2})?';

const TEMPLATE_V1: TemplateRules = Object.freeze({
  version: 'v1',
  timeAnchors: Object.freeze(['当前时间：']),
  historyHeaders: Object.freeze(['下面是群里正在聊的内容', '这是你们之前聊的内容']),
  suffixStarters: Object.freeze([
    '现在',
    '你现在想补充说明',
    '你正在',
    '现在请你对这句内容进行改写',
    '请你根据聊天内容',
    '改写后的回复',
    '你的名字是',
  ]),
  rewriteMarkers: Object.freeze([
    '现在请你对这句内容进行改写',
    '改写后的回复',
    '你现在想补充说明你刚刚自己的发言内容',
  ]),
  preambleStarters: Object.freeze(['以下聊天开始时间：']),
  historyLinePatterns: Object.freeze([/^图片信息：$/, /^\[图片.*的内容：/, /^以下聊天开始时间：/]),
  timestampPattern: new RegExp(`(?:${TIMESTAMP_SOURCE})`),
  turnHeaderPattern: new RegExp(
    `^\\s*\\[(?<marker>[^\\]]*)\\](?<timestamp>${TIMESTAMP_SOURCE}),\\s+(?<rest>.+)$`
  ),
  timelinePattern: new RegExp(`^\\s*(?:\\[[^\\]]+\\])?(?:${TIMESTAMP_SOURCE}),\\s+.+$`),
  identityMarkerPattern: /^(?<platform>[^:\s]+):(?<userId>[^:\s]+)$/,
  selfNameSuffix: '(你)',
  anonymousName: '某人',
  imagePlaceholder: '[图片]',
});

const TEMPLATES: Readonly<Record<string, TemplateRules>> = Object.freeze({
  v1: TEMPLATE_V1,
});

export const DEFAULT_TEMPLATE_VERSION = 'v1';

export function resolveTemplateRules(version: string = DEFAULT_TEMPLATE_VERSION): TemplateRules {
  const rules = TEMPLATES[version];
  if (!rules) {
    throw new ConfigurationError(`Unknown prompt template version: ${version}`, {
      supported: Object.keys(TEMPLATES),
    });
  }
  return rules;
}

export function isRewritePrompt(prompt: string, rules: TemplateRules): boolean {
  return rules.rewriteMarkers.some((marker) => prompt.includes(marker));
}
