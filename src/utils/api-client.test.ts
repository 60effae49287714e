import { describe, it, expect, vi } from "vitest";
import { AnkiConnectClient, type FetchLike } from "./api-client.js";

const ENDPOINT = "http://127.0.0.1:8765";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function clientReturning(body: unknown, options: { key?: string } = {}) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(body));
  const client = new AnkiConnectClient({ url: ENDPOINT, version: 6, fetch: fetchMock, ...options });
  return { client, fetchMock };
}

function sentPayload(fetchMock: ReturnType<typeof clientReturning>["fetchMock"]): unknown {
  const [, init] = fetchMock.mock.calls[0];
  return JSON.parse(String(init.body));
}

describe("AnkiConnectClient", () => {
  it("posts the action with protocol version 6", async () => {
    const { client, fetchMock } = clientReturning({ result: ["Default", "Math::Algebra"], error: null });

    expect(await client.listDecks()).toEqual({ success: true, data: ["Default", "Math::Algebra"] });
    expect(fetchMock).toHaveBeenCalledWith(ENDPOINT, expect.objectContaining({ method: "POST" }));
    expect(sentPayload(fetchMock)).toEqual({ action: "deckNames", version: 6, params: {} });
  });

  it("sends the API key when configured", async () => {
    const { client, fetchMock } = clientReturning({ result: [1, 2], error: null }, { key: "test-secret" });

    expect(await client.findNoteIds('"deck:Math"')).toEqual({ success: true, data: [1, 2] });
    expect(sentPayload(fetchMock)).toEqual({
      action: "findNotes",
      version: 6,
      params: { query: '"deck:Math"' },
      key: "test-secret",
    });
  });

  it("turns an error payload into a failure", async () => {
    const { client } = clientReturning({ result: null, error: "collection is not available" });

    const response = await client.listDecks();

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error.message).toBe("collection is not available");
      expect(response.error.action).toBe("deckNames");
    }
  });

  it("turns a refused connection into a failure", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const client = new AnkiConnectClient({ url: ENDPOINT, version: 6, fetch: fetchMock });

    const response = await client.listDecks();

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error.message).toBe(`AnkiConnect unreachable at ${ENDPOINT}: fetch failed`);
    }
  });

  it("turns HTTP errors, non-JSON bodies and unexpected results into failures", async () => {
    const responses: Array<() => Response> = [
      () => new Response("boom", { status: 500 }),
      () => new Response("not json", { status: 200 }),
      () => jsonResponse({ result: 42, error: null }),
    ];
    const messages: string[] = [];

    for (const makeResponse of responses) {
      const fetch: FetchLike = async () => makeResponse();
      const response = await new AnkiConnectClient({ url: ENDPOINT, version: 6, fetch }).listDecks();
      messages.push(response.success ? "ok" : response.error.message);
    }

    expect(messages[0]).toBe("AnkiConnect responded with HTTP 500");
    expect(messages[1].startsWith("AnkiConnect returned a non-JSON body:")).toBe(true);
    expect(messages[2].startsWith('Unexpected "deckNames" result:')).toBe(true);
  });

  it("keeps well-formed notes and drops entries Anki could not resolve", async () => {
    const { client, fetchMock } = clientReturning({
      result: [
        {
          noteId: 1,
          modelName: "Basic",
          tags: ["chapter1"],
          fields: { Front: { value: "Q", order: 0 }, Back: { value: "A", order: 1 } },
          cards: [11],
        },
        {},
      ],
      error: null,
    });

    expect(await client.getNoteDetails([1, 2])).toEqual({
      success: true,
      data: [
        {
          noteId: 1,
          tags: ["chapter1"],
          fields: { Front: { value: "Q", order: 0 }, Back: { value: "A", order: 1 } },
        },
      ],
    });
    expect(sentPayload(fetchMock)).toEqual({ action: "notesInfo", version: 6, params: { notes: [1, 2] } });
  });

  it("decodes media from base64 and maps false to not found", async () => {
    const found = clientReturning({ result: Buffer.from("png-bytes").toString("base64"), error: null });
    const missing = clientReturning({ result: false, error: null });

    const foundResponse = await found.client.getMediaBytes("cell.png");
    expect(foundResponse.success && foundResponse.data?.toString()).toBe("png-bytes");
    expect(await missing.client.getMediaBytes("gone.png")).toEqual({ success: true, data: null });
    expect(sentPayload(missing.fetchMock)).toEqual({
      action: "retrieveMediaFile",
      version: 6,
      params: { filename: "gone.png" },
    });
  });
});

describe("AnkiConnectClient.fromEnvironment", () => {
  it("reads the endpoint from the environment and lets options override it", () => {
    const environment = { ANKI_CONNECT_URL: "http://localhost:9999", ANKI_CONNECT_VERSION: 6 };

    expect(AnkiConnectClient.fromEnvironment(environment).url).toBe("http://localhost:9999");
    expect(AnkiConnectClient.fromEnvironment(environment, { url: ENDPOINT }).url).toBe(ENDPOINT);
  });
});
