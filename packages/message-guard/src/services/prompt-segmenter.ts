import type { TemplateRules } from '../config/template-rules.js';
import type { HistorySegments, HistoryTurn } from '../types/guard-types.js';
import { IdentityResolutionError, SegmentationError } from '../types/errors.js';

// =====================================================
// PROMPT SEGMENTER
// Splits a flattened reply prompt into prefix, history turns and suffix
// =====================================================

export interface PromptLayout {
  prefix: string;
  suffix: string;
  historyLines: string[];
  strategy: 'time-anchor' | 'history-header' | 'timeline';
}

interface LineRange {
  start: number;
  end: number;
}

function findSuffixStart(lines: string[], from: number, rules: TemplateRules): number | null {
  for (let idx = from; idx < lines.length; idx++) {
    const stripped = lines[idx].trim();
    if (rules.suffixStarters.some((starter) => stripped.startsWith(starter))) {
      return idx;
    }
  }
  return null;
}

function isTimestampedLine(line: string, rules: TemplateRules): boolean {
  return rules.timelinePattern.test(line);
}

/**
 * Where the suffix search may begin: after the last timestamped turn line,
 * so continuation lines of earlier turns never end the history.
 */
function historyTail(lines: string[], from: number, rules: TemplateRules): number {
  for (let idx = lines.length - 1; idx >= from; idx--) {
    if (isTimestampedLine(lines[idx], rules)) {
      return idx + 1;
    }
  }
  return from;
}

function isHistoryLikeLine(line: string, hasOpenBlock: boolean, rules: TemplateRules): boolean {
  if (!line) {
    return hasOpenBlock;
  }
  return isTimestampedLine(line, rules) || rules.historyLinePatterns.some((pattern) => pattern.test(line));
}

/**
 * Longest run of history-like lines containing at least one timestamped line.
 */
function scanTimeline(lines: string[], rules: TemplateRules): LineRange | null {
  let best: LineRange | null = null;
  let blockStart: number | null = null;
  let timestamped = 0;

  for (let idx = 0; idx <= lines.length; idx++) {
    const atEnd = idx === lines.length;
    const line = atEnd ? '' : lines[idx].trim();

    if (!atEnd && isHistoryLikeLine(line, blockStart !== null, rules)) {
      if (blockStart === null) {
        blockStart = idx;
        timestamped = 0;
      }
      if (isTimestampedLine(line, rules)) {
        timestamped++;
      }
      continue;
    }

    if (blockStart !== null) {
      if (timestamped >= 1 && (best === null || idx - blockStart > best.end - best.start)) {
        best = { start: blockStart, end: idx };
      }
      blockStart = null;
      timestamped = 0;
    }
  }

  return best;
}

function toLayout(
  lines: string[],
  range: LineRange,
  strategy: PromptLayout['strategy']
): PromptLayout | null {
  const prefix = lines.slice(0, range.start).join('\n').trim();
  const suffix = lines.slice(range.end).join('\n').trim();
  if (!prefix || !suffix) {
    return null;
  }
  return { prefix, suffix, historyLines: lines.slice(range.start, range.end), strategy };
}

/**
 * Locate the prefix, the history region and the suffix of a prompt.
 * Tries the time anchor, then the history header, then a timeline scan.
 */
export function locateHistoryRegion(raw: string, rules: TemplateRules): PromptLayout {
  const lines = raw.split(/\r?\n/);

  const anchorIndex = lines.findIndex((line) =>
    rules.timeAnchors.some((anchor) => line.trim().startsWith(anchor))
  );
  if (anchorIndex !== -1) {
    const start = anchorIndex + 1;
    const end = findSuffixStart(lines, historyTail(lines, start, rules), rules) ?? lines.length;
    const layout = toLayout(lines, { start, end }, 'time-anchor');
    if (layout) return layout;
  }

  const headerIndex = lines.findIndex((line) =>
    rules.historyHeaders.some((header) => line.includes(header))
  );
  if (headerIndex !== -1) {
    let start = headerIndex + 1;
    while (start < lines.length && !lines[start].trim()) {
      start++;
    }
    const end = findSuffixStart(lines, historyTail(lines, start, rules), rules) ?? lines.length;
    const layout = toLayout(lines, { start, end }, 'history-header');
    if (layout) return layout;
  }

  const timeline = scanTimeline(lines, rules);
  if (timeline) {
    const layout = toLayout(lines, timeline, 'timeline');
    if (layout) return layout;
  }

  throw new SegmentationError('Prompt prefix/suffix markers not found', {
    templateVersion: rules.version,
    lineCount: lines.length,
  });
}

interface OpenTurn {
  marker: { platform: string; userId: string };
  timestampLabel: string;
  displayName: string;
  utterance: string[];
  line: number;
}

function closeTurn(turn: OpenTurn, orderIndex: number): HistoryTurn {
  const utterance = turn.utterance.join('\n').trim();
  if (!utterance) {
    throw new SegmentationError(`History turn at line ${turn.line + 1} has an empty body`, {
      line: turn.line + 1,
    });
  }
  return {
    identity: { ...turn.marker },
    displayName: turn.displayName,
    timestampLabel: turn.timestampLabel,
    body: `${turn.timestampLabel}, ${turn.displayName}: ${utterance}`,
    orderIndex,
  };
}

function splitSpeaker(rest: string, lineNumber: number): { displayName: string; utterance: string } {
  const delimiter = rest.indexOf(': ');
  if (delimiter > 0) {
    return { displayName: rest.slice(0, delimiter), utterance: rest.slice(delimiter + 2) };
  }
  if (rest.endsWith(':') && rest.length > 1) {
    return { displayName: rest.slice(0, -1), utterance: '' };
  }
  throw new SegmentationError(`History turn at line ${lineNumber} has no speaker delimiter`, {
    line: lineNumber,
  });
}

/**
 * Parse history lines into turns. A turn begins at a header line carrying
 * an identity marker; any other line continues the current turn's body.
 */
export function parseHistoryTurns(lines: readonly string[], rules: TemplateRules): HistoryTurn[] {
  const turns: HistoryTurn[] = [];
  let current: OpenTurn | null = null;

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx];
    const header = rules.turnHeaderPattern.exec(line);
    if (header?.groups) {
      const { marker = '', timestamp = '', rest = '' } = header.groups;
      const identity = rules.identityMarkerPattern.exec(marker.trim())?.groups;
      if (!identity?.platform || !identity.userId) {
        throw new IdentityResolutionError(`Malformed identity marker "[${marker}]" at line ${idx + 1}`, {
          line: idx + 1,
        });
      }

      if (current) {
        turns.push(closeTurn(current, turns.length));
      }
      const { displayName, utterance } = splitSpeaker(rest, idx + 1);
      current = {
        marker: { platform: identity.platform, userId: identity.userId },
        timestampLabel: timestamp,
        displayName,
        utterance: [utterance],
        line: idx,
      };
      continue;
    }

    if (current) {
      current.utterance.push(line);
      continue;
    }

    const stripped = line.trim();
    if (!stripped || rules.preambleStarters.some((starter) => stripped.startsWith(starter))) {
      continue;
    }
    throw new SegmentationError(`History line ${idx + 1} has no turn marker`, { line: idx + 1 });
  }

  if (current) {
    turns.push(closeTurn(current, turns.length));
  }
  return turns;
}

/**
 * Split a raw prompt into prefix, ordered history turns and suffix.
 * Either the whole prompt is understood or a SegmentationError is thrown.
 */
export function segment(raw: string, rules: TemplateRules): HistorySegments {
  const layout = locateHistoryRegion(raw, rules);
  return {
    prefix: layout.prefix,
    suffix: layout.suffix,
    turns: parseHistoryTurns(layout.historyLines, rules),
  };
}
