/**
 * Human-readable time labels matching the host's history rendering.
 */

export type TimeMode = 'relative' | 'normal_no_YMD';

const RELATIVE_LABEL = /(秒前|分钟前|小时前|天前),\s/;
const CLOCK_LABEL = /\d{1,2}:\d{2}(?::\d{2})?,\s/;

/**
 * Guess which label style the host used when it rendered the prompt.
 */
export function inferTimeMode(prompt: string): TimeMode {
  if (RELATIVE_LABEL.test(prompt)) {
    return 'relative';
  }
  if (CLOCK_LABEL.test(prompt)) {
    return 'normal_no_YMD';
  }
  return 'relative';
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * @param timestamp unix seconds
 * @param now unix seconds, used by the relative mode
 */
export function formatTimestamp(timestamp: number, mode: TimeMode, now: number): string {
  if (mode === 'normal_no_YMD') {
    const date = new Date(timestamp * 1000);
    return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  }

  const elapsed = Math.max(0, Math.floor(now - timestamp));
  if (elapsed < 10) return '刚刚';
  if (elapsed < 60) return `${elapsed}秒前`;
  if (elapsed < 3600) return `${Math.floor(elapsed / 60)}分钟前`;
  if (elapsed < 86400) return `${Math.floor(elapsed / 3600)}小时前`;
  return `${Math.floor(elapsed / 86400)}天前`;
}
