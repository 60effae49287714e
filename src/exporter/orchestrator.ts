/**
 * Deck Export Orchestrator
 * Called from the CLI and from the MCP export-decks tool.
 *
 * Usage:
 * 1. Build an ExportContext (AnkiConnect client + logger, optionally an AbortSignal)
 * 2. new ExportOrchestrator(context).run(destinationDir, selection)
 * 3. Read per-deck counts and the run status from the returned ExportRunResult
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import { getErrorMessage } from '../utils/error-handler.js';
import { runDeckExport } from './deck-exporter.js';
import { applySelection } from './selection.js';
import type { DeckExportResult, DeckSelection, ExportContext, ExportRunResult } from './types.js';

export const DECKS_DIRNAME = 'decks';
export const MEDIA_DIRNAME = 'media';

export class ExportOrchestrator {
  constructor(private readonly context: ExportContext) {}

  /**
   * Exports the selected decks one after another. A failing deck counts as 0
   * and does not stop the others; only a failed deck enumeration (or an
   * unusable destination) fails the whole run.
   */
  async run(destinationDir: string, selection: DeckSelection = { kind: 'all' }): Promise<ExportRunResult> {
    const { client, logger, signal } = this.context;
    const outputDir = join(destinationDir, DECKS_DIRNAME);
    const mediaDir = join(destinationDir, MEDIA_DIRNAME);

    try {
      await mkdir(outputDir, { recursive: true });
      await mkdir(mediaDir, { recursive: true });
    } catch (error) {
      const message = `Could not prepare ${destinationDir}: ${getErrorMessage(error)}`;
      logger.error(`❌ ${message}`);
      return { status: 'failed', decks: [], totalCards: 0, error: message };
    }

    logger.info(`Exporting to ${destinationDir}`);

    const deckNames = await client.listDecks();
    if (!deckNames.success) {
      const message = `Could not list decks: ${deckNames.error.message}`;
      logger.error(`❌ ${message}`);
      return { status: 'failed', decks: [], totalCards: 0, error: message };
    }

    if (deckNames.data.length === 0) {
      logger.info('No decks found.');
      return { status: 'no-decks', decks: [], totalCards: 0 };
    }

    const targetDecks = applySelection(deckNames.data, selection);
    if (targetDecks.length === 0) {
      logger.info('No decks selected.');
      return { status: 'empty-selection', decks: [], totalCards: 0 };
    }

    logger.info(`Exporting ${targetDecks.length} deck(s)...`);

    const decks: DeckExportResult[] = [];
    let totalCards = 0;
    let cancelled = false;

    for (const deckName of targetDecks) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }
      const outcome = await runDeckExport(deckName, outputDir, mediaDir, this.context);
      decks.push({ deckName, cardCount: outcome.cardCount });
      totalCards += outcome.cardCount;
      if (outcome.cancelled) {
        cancelled = true;
        break;
      }
    }

    if (cancelled) {
      logger.warn(`⚠️  Cancelled: ${totalCards} cards exported before stopping`);
      return { status: 'cancelled', decks, totalCards };
    }

    logger.success(`✅ Done: ${totalCards} cards exported`);
    return { status: 'completed', decks, totalCards };
  }
}
