import type { AnswerService } from "../answer/answer.service.types";
import type { VectorDatabase } from "../database/vector.database.types";
import type { EmbeddingProvider } from "../embedding/embedding.types";
import type { LoggerService } from "../logger/logger.service.types";

export type RetrievalResult = {
  chunkId: string;
  documentId: string;
  title: string;
  sourcePath: string | null;
  chunkText: string;
  ordinal: number;
  position: number;
  distance: number;
};

export type RetrievalAnswer = {
  answer: string;
  sources: RetrievalResult[];
};

export type RetrievalDeps = {
  embedding: Pick<EmbeddingProvider, "embed">;
  database: Pick<VectorDatabase, "search">;
  answer?: AnswerService;
  defaults: {
    topK: number;
  };
  logger?: LoggerService;
};

export type RetrievalService = {
  search: (query: string, opts?: { topK?: number }) => Promise<RetrievalResult[]>;
  ask: (query: string, opts?: { topK?: number }) => Promise<RetrievalAnswer>;
};
