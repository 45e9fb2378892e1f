import { describe, it, expect, vi } from "vitest";
import { EmbeddingSimilarityReranker, rerankText } from "./reranker.js";
import type { EmbeddingProvider } from "./embedding-provider.js";
import type { RetrievedDocument } from "./types.js";

/** Embeds known texts to fixed 2-d vectors. */
function createLookupEmbeddings(table: Record<string, number[]>) {
  const embed = vi.fn(async (texts: string[], _model?: string) => texts.map((t) => table[t] ?? [0, 0]));
  const provider: EmbeddingProvider = {
    defaultModel: "text-embedding-3-small",
    embed,
    embedOne: async (text) => table[text] ?? [0, 0],
  };
  return { provider, embed };
}

describe("rerankText", () => {
  it("joins chapter description and article text", () => {
    const doc: RetrievedDocument = {
      id: 1,
      score: 0.8,
      payload: { capitulo_descripcion: "De las vacaciones", articulo: "Todo trabajador tiene derecho..." },
    };
    expect(rerankText(doc)).toBe("De las vacaciones: Todo trabajador tiene derecho...");
  });

  it("uses empty strings for missing fields", () => {
    expect(rerankText({ id: 1, score: 0.1, payload: {} })).toBe(": ");
  });
});

describe("EmbeddingSimilarityReranker", () => {
  it("scores candidates by cosine similarity to the query in one batch", async () => {
    const { provider, embed } = createLookupEmbeddings({
      q: [1, 0],
      same: [2, 0],
      orthogonal: [0, 3],
      opposite: [-1, 0],
    });
    const reranker = new EmbeddingSimilarityReranker(provider);

    const scores = await reranker.score("q", ["same", "orthogonal", "opposite"]);

    expect(scores).toEqual([1, 0, -1]);
    expect(embed).toHaveBeenCalledTimes(1);
    expect(embed).toHaveBeenCalledWith(["q", "same", "orthogonal", "opposite"], "text-embedding-3-small");
  });

  it("returns no scores and makes no call for no candidates", async () => {
    const { provider, embed } = createLookupEmbeddings({});
    const reranker = new EmbeddingSimilarityReranker(provider, "text-embedding-3-large");

    await expect(reranker.score("q", [])).resolves.toEqual([]);
    expect(embed).not.toHaveBeenCalled();
    expect(reranker.modelName).toBe("text-embedding-3-large");
  });
});
