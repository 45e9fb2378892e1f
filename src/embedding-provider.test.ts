import { describe, it, expect, vi } from "vitest";
import { OpenAIEmbeddingProvider, type OpenAIEmbeddingsClient } from "./embedding-provider.js";

/** Fake client: the vector for a text is [length, batch position]. Responses come back reversed. */
function createMockEmbeddingsClient() {
  const create = vi.fn(async (params: { model: string; input: string[] }) => ({
    data: params.input.map((text, index) => ({ embedding: [text.length, index], index })).reverse(),
  }));
  const client: OpenAIEmbeddingsClient = { embeddings: { create } };
  return { client, create };
}

describe("OpenAIEmbeddingProvider", () => {
  it("returns vectors in input order regardless of response order", async () => {
    const { client } = createMockEmbeddingsClient();
    const provider = new OpenAIEmbeddingProvider(client, { model: "text-embedding-3-small" });

    const vectors = await provider.embed(["a", "bbb", "cc"]);

    expect(vectors).toEqual([
      [1, 0],
      [3, 1],
      [2, 2],
    ]);
  });

  it("splits input into batches of the configured size", async () => {
    const { client, create } = createMockEmbeddingsClient();
    const provider = new OpenAIEmbeddingProvider(client, { model: "text-embedding-3-small", batchSize: 2 });

    const vectors = await provider.embed(["a", "b", "c", "d", "e"]);

    expect(create).toHaveBeenCalledTimes(3);
    expect(create.mock.calls.map(([params]) => params.input)).toEqual([["a", "b"], ["c", "d"], ["e"]]);
    expect(vectors).toHaveLength(5);
  });

  it("uses the default model unless one is passed", async () => {
    const { client, create } = createMockEmbeddingsClient();
    const provider = new OpenAIEmbeddingProvider(client, { model: "text-embedding-3-small" });

    await provider.embedOne("hola");
    await provider.embedOne("hola", "text-embedding-3-large");

    expect(create.mock.calls[0][0].model).toBe("text-embedding-3-small");
    expect(create.mock.calls[1][0].model).toBe("text-embedding-3-large");
  });

  it("makes no call for empty input", async () => {
    const { client, create } = createMockEmbeddingsClient();
    const provider = new OpenAIEmbeddingProvider(client, { model: "text-embedding-3-small" });

    await expect(provider.embed([])).resolves.toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const client: OpenAIEmbeddingsClient = {
      embeddings: { create: async () => ({ data: [{ embedding: [1], index: 0 }] }) },
    };
    const provider = new OpenAIEmbeddingProvider(client, { model: "text-embedding-3-small" });

    await expect(provider.embed(["a", "b"])).rejects.toThrow("Embedding API returned 1 vectors for 2 inputs");
  });

  it("propagates API errors", async () => {
    const client: OpenAIEmbeddingsClient = {
      embeddings: {
        create: async () => {
          throw new Error("rate limited");
        },
      },
    };
    const provider = new OpenAIEmbeddingProvider(client, { model: "text-embedding-3-small" });

    await expect(provider.embedOne("hola")).rejects.toThrow("rate limited");
  });
});
