import type { Suit, SuitCounts } from '@suit-tally/types';

/** Display and iteration order. */
export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'spades', 'hearts'];

export const SUIT_GLYPHS: Readonly<Record<Suit, string>> = {
  clubs: '♣️',
  diamonds: '♦️',
  spades: '♠️',
  hearts: '❤️',
};

export const SUIT_NAMES: Readonly<Record<Suit, string>> = {
  clubs: 'Clubs',
  diamonds: 'Diamonds',
  spades: 'Spades',
  hearts: 'Hearts',
};

export function emptyCounts(): SuitCounts {
  return { clubs: 0, diamonds: 0, spades: 0, hearts: 0 };
}
