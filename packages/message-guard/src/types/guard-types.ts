// =====================================================
// MESSAGE GUARD TYPES
// Request-scoped shapes flowing from raw prompt to chat messages
// =====================================================

export type ChatRole = 'system' | 'user' | 'assistant';
export type HistoryRole = Exclude<ChatRole, 'system'>;

/** A speaker account. Equality is exact on both fields. */
export interface IdentityKey {
  platform: string;
  userId: string;
}

export interface HistoryTurn {
  identity: IdentityKey;
  displayName: string;
  timestampLabel: string;
  /** Rendered turn text after the identity marker, e.g. `12:30, alice: hi` */
  body: string;
  orderIndex: number;
}

export interface UserTurn extends HistoryTurn {
  role: 'user';
}

export interface AssistantTurn extends HistoryTurn {
  role: 'assistant';
  /** `<timestamp>, <name>:` header, empty when the body has none */
  labelFragment: string;
  contentFragment: string;
}

export type ClassifiedTurn = UserTurn | AssistantTurn;

export interface MergedMessage {
  role: HistoryRole;
  identity: IdentityKey;
  lines: string[];
  /** Label of the first assistant turn in the run, sent as user framing */
  annotation?: string;
}

export interface StructuredRequest {
  prefix: string;
  history: MergedMessage[];
  suffix: string;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface HistorySegments {
  prefix: string;
  suffix: string;
  turns: HistoryTurn[];
}

/**
 * A chat record as gathered by the host, before any rendering.
 * `time` is a unix timestamp in seconds.
 */
export interface HistoryRecord {
  platform: string;
  userId: string;
  nickname?: string;
  cardName?: string;
  personName?: string;
  content: string;
  time: number;
}

export type ChatKind = 'group' | 'private';
export type ReplyPath = ChatKind | 'rewrite';

export interface GuardRequest {
  prompt: string;
  chatKind: ChatKind;
  /** Records already gathered by the host; when present they replace the prompt's history lines */
  history?: HistoryRecord[];
  /** History window the host was configured with */
  hostContextSize?: number;
  /** Unix seconds, defaults to the current time */
  now?: number;
}

export type ErrorKind = 'SegmentationError' | 'IdentityResolutionError' | 'ConfigurationError';

export type FallbackKind = ErrorKind | 'NotActivated' | 'GuardDisabled' | 'PathDisabled';

export interface FallbackReason {
  kind: FallbackKind;
  message: string;
}

export type GuardResult =
  | { kind: 'structured'; path: ReplyPath; request: StructuredRequest; messages: ChatMessage[] }
  | { kind: 'fallback'; path: ReplyPath; reason: FallbackReason; prompt: string };
