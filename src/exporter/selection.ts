/**
 * Deck selection: "all" or zero-based indices into the deck list ("0,2,5").
 */

import { SelectionError } from '../utils/error-handler.js';
import type { DeckSelection } from './types.js';

const INDEX_PATTERN = /^[+-]?\d+$/;

export function parseSelection(input?: string): DeckSelection {
  const selection = input?.trim().toLowerCase() ?? '';
  if (selection === '' || selection === 'all') {
    return { kind: 'all' };
  }

  const indices = selection.split(',').map((part) => {
    const value = part.trim();
    if (!INDEX_PATTERN.test(value)) {
      throw new SelectionError(input ?? '');
    }
    return Number.parseInt(value, 10);
  });

  return { kind: 'indices', indices };
}

/**
 * Out-of-range indices are dropped; order and repeats are kept as given.
 */
export function applySelection(decks: string[], selection: DeckSelection): string[] {
  if (selection.kind === 'all') {
    return [...decks];
  }
  return selection.indices
    .filter((index) => index >= 0 && index < decks.length)
    .map((index) => decks[index]);
}
