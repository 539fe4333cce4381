import type { SearchHit } from "../database/vector.database.types";
import { StoreError } from "../errors/store.errors";
import type {
  RetrievalDeps,
  RetrievalResult,
  RetrievalService,
} from "./retrieval.service.types";

export function createRetrievalService(deps: RetrievalDeps): RetrievalService {
  async function searchHits(query: string, topK: number) {
    const startedAt = Date.now();
    deps.logger?.debug({ subsystem: "retrieval", query, topK }, "retrieval.search: start");
    const vector = await deps.embedding.embed(query);
    const hits = await deps.database.search(vector, topK);
    deps.logger?.debug(
      {
        subsystem: "retrieval",
        query,
        topK,
        elapsedMs: Date.now() - startedAt,
        hits: hits.map((hit) => ({
          chunkId: hit.chunk.chunkId,
          title: hit.document.title,
          distance: hit.distance,
        })),
      },
      "retrieval.search: done",
    );
    return hits;
  }

  return {
    async search(query, opts) {
      const hits = await searchHits(query, opts?.topK ?? deps.defaults.topK);
      return hits.map(toResult);
    },

    async ask(query, opts) {
      if (!deps.answer) {
        throw new StoreError("AnswerFailed", "answer generation is not configured");
      }
      const hits = await searchHits(query, opts?.topK ?? deps.defaults.topK);
      const answer = await deps.answer.generateAnswer(query, hits);
      return { answer, sources: hits.map(toResult) };
    },
  };
}

function toResult(hit: SearchHit): RetrievalResult {
  return {
    chunkId: hit.chunk.chunkId,
    documentId: hit.document.documentId,
    title: hit.document.title,
    sourcePath: hit.document.sourcePath,
    chunkText: hit.chunk.text,
    ordinal: hit.chunk.ordinal,
    position: hit.position,
    distance: hit.distance,
  };
}
