import type { AnkiConnectError } from '../utils/error-handler.js';
import type { ExportLogger } from '../utils/logger.js';

/**
 * Outcome of one call to the host application.
 * Transport faults and error payloads never escape as exceptions.
 */
export type CollaboratorResult<T> =
  | { success: true; data: T }
  | { success: false; error: AnkiConnectError };

export type NoteId = number;

export interface NoteField {
  value: string;
  order?: number;
}

export interface NoteInfo {
  noteId?: NoteId;
  tags: string[];
  fields: Record<string, NoteField>;
}

/**
 * The flashcard application's local control API, as the exporter consumes it.
 */
export interface HostCollaborator {
  listDecks(): Promise<CollaboratorResult<string[]>>;
  findNoteIds(query: string): Promise<CollaboratorResult<NoteId[]>>;
  getNoteDetails(ids: NoteId[]): Promise<CollaboratorResult<NoteInfo[]>>;
  /** `data` is null when the host has no file by that name */
  getMediaBytes(filename: string): Promise<CollaboratorResult<Buffer | null>>;
}

export type DeckSelection = { kind: 'all' } | { kind: 'indices'; indices: number[] };

export interface DeckPaths {
  category: string;
  fileName: string;
  mediaSubfolder: string;
}

export interface ExportContext {
  client: HostCollaborator;
  logger: ExportLogger;
  signal?: AbortSignal;
}

export interface DeckExportResult {
  deckName: string;
  cardCount: number;
}

export type ExportRunStatus = 'completed' | 'no-decks' | 'empty-selection' | 'cancelled' | 'failed';

export interface ExportRunResult {
  status: ExportRunStatus;
  decks: DeckExportResult[];
  totalCards: number;
  error?: string;
}
