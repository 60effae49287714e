/**
 * Deck Exporter
 * One deck → decks/<category>/<leaf>.csv, its images → media/<leaf>/
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { getErrorMessage } from '../utils/error-handler.js';
import { toCsv } from './csv-writer.js';
import { decodeHtmlEntities } from './html-entities.js';
import { processImagesInHtml } from './image-processor.js';
import { MediaFetcher } from './media-fetcher.js';
import { toPathToken } from './sanitizer.js';
import type { DeckPaths, ExportContext, NoteInfo } from './types.js';

export const DECK_SEPARATOR = '::';
export const UNCATEGORIZED = 'uncategorized';

/**
 * "Math::Algebra::Linear" → math/algebra_linear.csv, media in linear/
 * "Vocabulary"            → uncategorized/vocabulary.csv, media in vocabulary/
 */
export function resolveDeckPaths(deckName: string): DeckPaths {
  const parts = deckName.split(DECK_SEPARATOR);
  const mediaSubfolder = toPathToken(parts[parts.length - 1]);

  if (parts.length === 1) {
    return {
      category: UNCATEGORIZED,
      fileName: `${toPathToken(deckName)}.csv`,
      mediaSubfolder,
    };
  }

  return {
    category: toPathToken(parts[0]),
    fileName: `${parts.slice(1).map(toPathToken).join('_')}.csv`,
    mediaSubfolder,
  };
}

/**
 * Search string scoping findNotes to a deck. Which sub-decks it matches is
 * up to Anki's search semantics.
 */
export function deckQuery(deckName: string): string {
  return `"deck:${deckName.replace(/"/g, '\\"')}"`;
}

/**
 * Field values in the note type's field order.
 */
export function orderedFieldValues(note: NoteInfo): string[] {
  return Object.values(note.fields)
    .map((field, position) => ({ field, position }))
    .sort((a, b) => (a.field.order ?? a.position) - (b.field.order ?? b.position) || a.position - b.position)
    .map(({ field }) => field.value);
}

async function buildNoteRow(
  note: NoteInfo,
  paths: DeckPaths,
  mediaDir: string,
  fetcher: MediaFetcher
): Promise<string[]> {
  const row: string[] = [];

  for (const rawValue of orderedFieldValues(note)) {
    const value = decodeHtmlEntities(rawValue);
    row.push(await processImagesInHtml(value, paths.mediaSubfolder, mediaDir, fetcher));
  }

  row.push(note.tags.join(' '));
  return row;
}

export interface DeckRunOutcome {
  cardCount: number;
  /** the signal stopped the deck before its CSV was written */
  cancelled: boolean;
}

/**
 * Exports one deck and returns the number of rows written.
 * Failures are reported through the logger and count as 0; nothing is thrown.
 */
export async function exportDeck(
  deckName: string,
  outputDir: string,
  mediaDir: string,
  context: ExportContext
): Promise<number> {
  const { cardCount } = await runDeckExport(deckName, outputDir, mediaDir, context);
  return cardCount;
}

/**
 * exportDeck, also telling apart a deck abandoned on cancellation.
 */
export async function runDeckExport(
  deckName: string,
  outputDir: string,
  mediaDir: string,
  context: ExportContext
): Promise<DeckRunOutcome> {
  const { client, logger, signal } = context;
  const failed: DeckRunOutcome = { cardCount: 0, cancelled: false };
  logger.info(`📦 ${deckName}`);

  const paths = resolveDeckPaths(deckName);

  const noteIds = await client.findNoteIds(deckQuery(deckName));
  if (!noteIds.success) {
    logger.error(`  ❌ findNotes failed: ${noteIds.error.message}`);
    return failed;
  }
  if (noteIds.data.length === 0) {
    logger.warn('  ⚠️  No notes found');
    return failed;
  }

  const notes = await client.getNoteDetails(noteIds.data);
  if (!notes.success) {
    logger.error(`  ❌ notesInfo failed: ${notes.error.message}`);
    return failed;
  }
  if (notes.data.length < noteIds.data.length) {
    logger.warn(`  ⚠️  ${noteIds.data.length - notes.data.length} note(s) could not be read and were skipped`);
  }

  const fetcher = new MediaFetcher(client, logger);
  const rows: string[][] = [];

  for (const note of notes.data) {
    if (signal?.aborted) {
      logger.warn('  ⚠️  Cancelled, nothing written for this deck');
      return { cardCount: 0, cancelled: true };
    }

    try {
      rows.push(await buildNoteRow(note, paths, mediaDir, fetcher));
    } catch (error) {
      logger.warn(`  ⚠️  Skipped note ${note.noteId ?? '(unknown id)'}: ${getErrorMessage(error)}`);
    }
  }

  const csvPath = join(outputDir, paths.category, paths.fileName);
  try {
    await mkdir(dirname(csvPath), { recursive: true });
    await writeFile(csvPath, toCsv(rows), 'utf-8');
  } catch (error) {
    logger.error(`  ❌ Could not write ${csvPath}: ${getErrorMessage(error)}`);
    return failed;
  }

  logger.success(`  ✅ ${rows.length} cards`);
  return { cardCount: rows.length, cancelled: false };
}
