/**
 * AnkiConnect API client
 * Every action is a single JSON POST: { action, version, params, key? } → { result, error }
 */

import { z } from "zod";
import { loadEnvironment, type Environment } from "../config/environment.js";
import { AnkiConnectError, getErrorMessage } from "./error-handler.js";
import type {
  CollaboratorResult,
  HostCollaborator,
  NoteId,
  NoteInfo,
} from "../exporter/types.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AnkiConnectOptions {
  url: string;
  version: number;
  key?: string;
  fetch?: FetchLike;
}

const envelopeSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable().optional(),
});

const noteInfoSchema = z.object({
  noteId: z.number().optional(),
  tags: z.array(z.string()).default([]),
  fields: z.record(
    z.object({
      value: z.string(),
      order: z.number().optional(),
    })
  ),
});

function failure(action: string, message: string): { success: false; error: AnkiConnectError } {
  return { success: false, error: new AnkiConnectError(message, action) };
}

/**
 * Sends one AnkiConnect action and validates its result against `resultSchema`.
 */
export async function ankiConnectRequest<T>(
  action: string,
  params: Record<string, unknown>,
  resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: AnkiConnectOptions
): Promise<CollaboratorResult<T>> {
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const payload: Record<string, unknown> = {
    action,
    version: options.version,
    params,
  };
  if (options.key) {
    payload.key = options.key;
  }

  let response: Response;
  try {
    response = await fetchImpl(options.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });
  } catch (error) {
    return failure(action, `AnkiConnect unreachable at ${options.url}: ${getErrorMessage(error)}`);
  }

  if (!response.ok) {
    return failure(action, `AnkiConnect responded with HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    return failure(action, `AnkiConnect returned a non-JSON body: ${getErrorMessage(error)}`);
  }

  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    return failure(action, "AnkiConnect response is missing the result/error envelope");
  }

  if (envelope.data.error != null) {
    return failure(action, envelope.data.error);
  }

  const result = resultSchema.safeParse(envelope.data.result);
  if (!result.success) {
    return failure(action, `Unexpected "${action}" result: ${result.error.issues[0]?.message ?? "invalid"}`);
  }

  return { success: true, data: result.data };
}

export class AnkiConnectClient implements HostCollaborator {
  constructor(private readonly options: AnkiConnectOptions) {}

  static fromEnvironment(
    environment: Environment = loadEnvironment(),
    overrides: Partial<AnkiConnectOptions> = {}
  ): AnkiConnectClient {
    return new AnkiConnectClient({
      url: environment.ANKI_CONNECT_URL,
      version: environment.ANKI_CONNECT_VERSION,
      key: environment.ANKI_CONNECT_KEY,
      ...overrides,
    });
  }

  get url(): string {
    return this.options.url;
  }

  listDecks(): Promise<CollaboratorResult<string[]>> {
    return ankiConnectRequest("deckNames", {}, z.array(z.string()), this.options);
  }

  findNoteIds(query: string): Promise<CollaboratorResult<NoteId[]>> {
    return ankiConnectRequest("findNotes", { query }, z.array(z.number()), this.options);
  }

  /**
   * Batched notesInfo lookup. Entries that do not look like a note
   * (AnkiConnect answers `{}` for ids it does not know) are left out.
   */
  async getNoteDetails(ids: NoteId[]): Promise<CollaboratorResult<NoteInfo[]>> {
    const response = await ankiConnectRequest("notesInfo", { notes: ids }, z.array(z.unknown()), this.options);
    if (!response.success) {
      return response;
    }

    const notes: NoteInfo[] = [];
    for (const entry of response.data) {
      const parsed = noteInfoSchema.safeParse(entry);
      if (parsed.success) {
        notes.push(parsed.data);
      }
    }
    return { success: true, data: notes };
  }

  async getMediaBytes(filename: string): Promise<CollaboratorResult<Buffer | null>> {
    const response = await ankiConnectRequest(
      "retrieveMediaFile",
      { filename },
      z.union([z.string(), z.literal(false), z.null()]),
      this.options
    );
    if (!response.success) {
      return response;
    }

    // retrieveMediaFile answers false for unknown files, base64 otherwise
    if (!response.data) {
      return { success: true, data: null };
    }
    return { success: true, data: Buffer.from(response.data, "base64") };
  }
}
