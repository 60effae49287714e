#!/usr/bin/env node
/**
 * MCP server entry point (stdio)
 * Exposes list-decks and export-decks on top of AnkiConnect.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { registerExportTools } from "./tools/export-tools.js";
import { AnkiConnectClient } from "./utils/api-client.js";

async function main() {
  const client = AnkiConnectClient.fromEnvironment();

  const server = new McpServer({
    name: "anki-deck-export",
    version: "1.0.0",
  });

  registerExportTools(server, client);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`anki-deck-export MCP server running on stdio (AnkiConnect: ${client.url})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
