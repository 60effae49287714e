import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { exportDecksTool, listDecksTool } from "./export-tools.js";
import { FakeAnkiConnect } from "../test/fake-anki-connect.js";
import { createTempDir, removeTempDir } from "../test/temp-dir.js";

function textOf(result: CallToolResult): string {
  const [item] = result.content;
  if (!item || item.type !== "text") {
    throw new Error("expected a text result");
  }
  return item.text;
}

const decks = {
  Default: [{ fields: { Front: "Q", Back: "A" }, tags: ["test"] }],
};

describe("export tools", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    // progress lines go to stderr
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it("list-decks returns decks with their indices", async () => {
    const result = await listDecksTool(new FakeAnkiConnect({ decks: { Default: [], "Math::Algebra": [] } }));

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(textOf(result))).toEqual({
      decks: [
        { index: 0, name: "Default" },
        { index: 1, name: "Math::Algebra" },
      ],
    });
  });

  it("list-decks reports an unreachable AnkiConnect", async () => {
    const result = await listDecksTool(new FakeAnkiConnect({ decks, unreachable: true }));

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      'Deck listing failed: AnkiConnect "deckNames" returned an error: AnkiConnect unreachable at http://127.0.0.1:8765: connect ECONNREFUSED'
    );
  });

  it("export-decks runs the export and returns the log", async () => {
    const result = await exportDecksTool(new FakeAnkiConnect({ decks }), { destinationDir: dir });
    const payload = JSON.parse(textOf(result));

    expect(result.isError).toBeUndefined();
    expect(payload.status).toBe("completed");
    expect(payload.totalCards).toBe(1);
    expect(payload.decks).toEqual([{ deckName: "Default", cardCount: 1 }]);
    expect(payload.log.at(-1)).toBe("✅ Done: 1 cards exported");
  });

  it("export-decks rejects a missing destination", async () => {
    const missing = join(dir, "missing");
    const result = await exportDecksTool(new FakeAnkiConnect({ decks }), { destinationDir: missing });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(`Destination folder does not exist: ${missing}`);
  });

  it("export-decks rejects a malformed selection", async () => {
    const result = await exportDecksTool(new FakeAnkiConnect({ decks }), { destinationDir: dir, selection: "first" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Invalid deck selection: "first" (expected "all" or indices such as "0,2,5")');
  });

  it("export-decks reports a failed run", async () => {
    const result = await exportDecksTool(new FakeAnkiConnect({ decks, unreachable: true }), { destinationDir: dir });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      "Could not list decks: AnkiConnect unreachable at http://127.0.0.1:8765: connect ECONNREFUSED"
    );
  });
});
