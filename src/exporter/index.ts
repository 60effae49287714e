/**
 * Deck Exporter - Main Entry Point
 * Anki decks → CSV + media through AnkiConnect
 */

export { ExportOrchestrator, DECKS_DIRNAME, MEDIA_DIRNAME } from './orchestrator.js';
export {
  exportDeck,
  runDeckExport,
  resolveDeckPaths,
  deckQuery,
  orderedFieldValues,
  DECK_SEPARATOR,
  UNCATEGORIZED,
} from './deck-exporter.js';
export type { DeckRunOutcome } from './deck-exporter.js';
export {
  extractImages,
  replaceImagesWithPaths,
  processImagesInHtml,
  exportedMediaPath,
  IMAGE_EXTENSIONS,
} from './image-processor.js';
export { MediaFetcher, resolveMediaPath } from './media-fetcher.js';
export { sanitize, toPathToken, EMPTY_TOKEN } from './sanitizer.js';
export { decodeHtmlEntities } from './html-entities.js';
export { toCsv, toCsvRow, CSV_DELIMITER } from './csv-writer.js';
export { parseSelection, applySelection } from './selection.js';
export type {
  CollaboratorResult,
  DeckExportResult,
  DeckPaths,
  DeckSelection,
  ExportContext,
  ExportRunResult,
  ExportRunStatus,
  HostCollaborator,
  NoteField,
  NoteId,
  NoteInfo,
} from './types.js';
