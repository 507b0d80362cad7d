import type { SequenceKey, Suit, SuitTally } from '@suit-tally/types';
import { SUITS } from './suits';

export const DEFAULT_CONFIRMATION_MARKERS: readonly string[] = ['✅', '🔰'];

const FIRST_GROUP = /\(([^()]*)\)/;
const SEQUENCE_MARKER = /#n(\d+)/;

// U+FE0F (emoji presentation) is optional: some clients send bare glyphs.
// Hearts accept both ❤ and ♥.
const SUIT_PATTERNS: Record<Suit, RegExp> = {
  clubs: /\u2663\uFE0F?/g,
  diamonds: /\u2666\uFE0F?/g,
  spades: /\u2660\uFE0F?/g,
  hearts: /[\u2764\u2665]\uFE0F?/g,
};

export function hasConfirmation(
  text: string,
  markers: readonly string[] = DEFAULT_CONFIRMATION_MARKERS
): boolean {
  return markers.some((marker) => text.includes(marker));
}

/**
 * Dedup key of the first `#n<digits>` marker, or null when there is none.
 *
 * @example
 * findSequence('Win #n042 (♥️)') // '42'
 */
export function findSequence(text: string): SequenceKey | null {
  const match = SEQUENCE_MARKER.exec(text);
  if (!match) return null;
  return match[1].replace(/^0+(?=\d)/, '');
}

/**
 * Count suit glyphs inside the first parenthesized group.
 *
 * @example
 * extractSuits('Win #n42 (♥️♥️♦️)') // { diamonds: 1, hearts: 2 }
 * extractSuits('no cards (abc)')    // null
 */
export function extractSuits(text: string): SuitTally | null {
  const match = FIRST_GROUP.exec(text);
  if (!match) return null;

  const content = match[1];
  const tally: SuitTally = {};
  let found = false;

  for (const suit of SUITS) {
    const count = content.match(SUIT_PATTERNS[suit])?.length ?? 0;
    if (count > 0) {
      tally[suit] = count;
      found = true;
    }
  }

  return found ? tally : null;
}
