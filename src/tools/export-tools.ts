import { z } from "zod";
import { existsSync, statSync } from "fs";
import { resolve } from "path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ExportOrchestrator, parseSelection, type HostCollaborator } from "../exporter/index.js";
import {
  SelectionError,
  createSuccessResponse,
  createErrorResponse,
  handleApiError,
} from "../utils/error-handler.js";
import { createConsoleLogger, type LogEntry } from "../utils/logger.js";

export interface ExportDecksArgs {
  destinationDir: string;
  selection?: string;
}

export async function listDecksTool(client: HostCollaborator): Promise<CallToolResult> {
  try {
    const decks = await client.listDecks();
    if (!decks.success) {
      return handleApiError(decks.error, "Deck listing");
    }

    return createSuccessResponse({
      decks: decks.data.map((name, index) => ({ index, name })),
    });
  } catch (error) {
    return handleApiError(error, "Deck listing");
  }
}

export async function exportDecksTool(
  client: HostCollaborator,
  { destinationDir, selection }: ExportDecksArgs
): Promise<CallToolResult> {
  try {
    const destination = resolve(destinationDir);
    if (!existsSync(destination) || !statSync(destination).isDirectory()) {
      return createErrorResponse(`Destination folder does not exist: ${destination}`);
    }

    const deckSelection = parseSelection(selection);

    // stdout carries the protocol, progress goes to stderr and back to the caller
    const log: LogEntry[] = [];
    const logger = createConsoleLogger({
      stream: "stderr",
      onLog: (entry) => log.push(entry),
    });

    const result = await new ExportOrchestrator({ client, logger }).run(destination, deckSelection);
    if (result.status === "failed") {
      return createErrorResponse(result.error ?? "Export failed");
    }

    return createSuccessResponse({
      ...result,
      destination,
      log: log.map((entry) => entry.message),
    });
  } catch (error) {
    if (error instanceof SelectionError) {
      return createErrorResponse(error.message);
    }
    return handleApiError(error, "Deck export");
  }
}

export function registerExportTools(server: McpServer, client: HostCollaborator) {
  // 1. Deck list
  server.tool(
    "list-decks",
    "List the Anki decks with the indices accepted by export-decks",
    async () => listDecksTool(client)
  );

  // 2. Export
  server.tool(
    "export-decks",
    "Export Anki decks to CSV files (decks/<category>/<leaf>.csv) with their images (media/<leaf>/)",
    {
      destinationDir: z.string().describe("Existing folder that receives decks/ and media/"),
      selection: z
        .string()
        .optional()
        .describe('"all" (default) or comma-separated deck indices from list-decks, e.g. "0,2,5"'),
    },
    async ({ destinationDir, selection }) => exportDecksTool(client, { destinationDir, selection })
  );
}
