// Types
export * from './types/guard-types.js';
export * from './types/errors.js';

// Configuration
export * from './config/template-rules.js';
export * from './config/guard-config.js';

// Pipeline
export * from './services/identity-matcher.js';
export * from './services/prompt-segmenter.js';
export * from './services/record-history.js';
export * from './services/turn-classifier.js';
export * from './services/turn-merger.js';
export * from './services/message-assembler.js';
export * from './services/guard-controller.js';

// Utilities
export * from './utils/time-format.js';
export * from './utils/content-normalizer.js';

// Host integration
export * from './runtime/reply-hook.js';
export * from './runtime/openai-transport.js';
export * from './runtime/message-guard-plugin.js';
