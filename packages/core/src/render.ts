import type { DisplayStyle, SuitCounts } from '@suit-tally/types';
import { SUITS, SUIT_GLYPHS, SUIT_NAMES } from './suits';

const UTC_PLUS_ONE_MS = 60 * 60 * 1000;

/** `HH:MM:SS` in a fixed UTC+1 offset, independent of the host zone. */
export function formatUtcPlusOne(date: Date): string {
  const shifted = new Date(date.getTime() + UTC_PLUS_ONE_MS);
  return [shifted.getUTCHours(), shifted.getUTCMinutes(), shifted.getUTCSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

function total(counts: SuitCounts): number {
  return SUITS.reduce((sum, suit) => sum + counts[suit], 0);
}

function share(count: number, of: number): number {
  return of === 0 ? 0 : Math.round((count * 100) / of);
}

export function renderCounts(counts: SuitCounts, style: DisplayStyle = 1): string {
  switch (style) {
    case 2:
      return SUITS.map((suit) => `${SUIT_GLYPHS[suit]} ${counts[suit]}`).join(' | ');
    case 3: {
      const sum = total(counts);
      const lines = SUITS.map(
        (suit) => `${SUIT_GLYPHS[suit]} ${SUIT_NAMES[suit]}: ${counts[suit]} (${share(counts[suit], sum)}%)`
      );
      return [...lines, `Total: ${sum}`].join('\n');
    }
    default:
      return SUITS.map((suit) => `${SUIT_GLYPHS[suit]} ${SUIT_NAMES[suit]}: ${counts[suit]}`).join('\n');
  }
}

/** Text of an automatic report, built from the counts taken at reset time. */
export function renderReport(counts: SuitCounts, at: Date): string {
  return [
    '📊 Automatic report',
    `🕐 Time: ${formatUtcPlusOne(at)} (UTC+1)`,
    '',
    ...SUITS.map((suit) => `${SUIT_GLYPHS[suit]} ${SUIT_NAMES[suit]}: ${counts[suit]}`),
    '',
    '🔄 Counters reset for the next cycle',
  ].join('\n');
}
