/**
 * CLI command implementations, kept apart from the commander wiring.
 * Each returns the process exit code.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { SelectionError } from '../utils/error-handler.js';
import { ExportOrchestrator } from './orchestrator.js';
import { parseSelection } from './selection.js';
import type { DeckSelection, ExportContext } from './types.js';

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * export <destinationDir> [selection]
 */
export async function exportCommand(
  destination: string,
  selectionInput: string | undefined,
  context: ExportContext
): Promise<number> {
  const { logger } = context;
  const destinationDir = resolve(destination);

  if (!isDirectory(destinationDir)) {
    logger.error(`❌ Destination folder does not exist: ${destinationDir}`);
    return 1;
  }

  let selection: DeckSelection;
  try {
    selection = parseSelection(selectionInput);
  } catch (error) {
    if (error instanceof SelectionError) {
      logger.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  const result = await new ExportOrchestrator(context).run(destinationDir, selection);
  return result.status === 'failed' || result.status === 'cancelled' ? 1 : 0;
}

/**
 * list — prints the indices `export` accepts as a selection.
 */
export async function listCommand(context: ExportContext): Promise<number> {
  const { client, logger } = context;
  const decks = await client.listDecks();

  if (!decks.success) {
    logger.error(`❌ Could not list decks: ${decks.error.message}`);
    return 1;
  }
  if (decks.data.length === 0) {
    logger.info('No decks found.');
    return 0;
  }

  decks.data.forEach((deckName, index) => {
    logger.info(`${String(index).padStart(3)}: ${deckName}`);
  });
  return 0;
}
