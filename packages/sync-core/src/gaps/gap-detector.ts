import type { CoverageRange, GapRange, TimeWindow } from '@klinevault/schemas';

/**
 * Ranges of a window that the store does not cover yet
 *
 * Only the edges are compared: holes between the first and last stored
 * candle are never reported. Leading and trailing ranges include the stored
 * boundary candle itself; re-fetching it is harmless because merge dedupes.
 */
export function detectGaps(window: TimeWindow, coverage: CoverageRange | null): GapRange[] {
  if (!coverage) {
    return [{ kind: 'full', start: window.start, end: window.end }];
  }
  if (coverage.min <= window.start && coverage.max >= window.end) {
    return [];
  }

  const gaps: GapRange[] = [];
  if (window.start < coverage.min) {
    gaps.push({ kind: 'leading', start: window.start, end: coverage.min });
  }
  if (window.end > coverage.max) {
    gaps.push({ kind: 'trailing', start: coverage.max, end: window.end });
  }
  if (gaps.length === 0) {
    gaps.push({ kind: 'full', start: window.start, end: window.end });
  }
  return gaps;
}
