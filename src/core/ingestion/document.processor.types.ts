import type { ChunkingService } from "../chunker/chunker.service.types";
import type { VectorDatabase } from "../database/vector.database.types";
import type { EmbeddingProvider } from "../embedding/embedding.types";
import type { LoggerService } from "../logger/logger.service.types";
import type { Parser } from "../parser/parser.types";

export type IngestTextInput = {
  title: string;
  text: string;
  sourcePath?: string | null;
};

export type IngestResult = {
  documentId: string;
  skipped: boolean;
  chunkCount: number;
};

export type DocumentProcessor = {
  ingestText: (input: IngestTextInput) => Promise<IngestResult>;
  ingestFile: (path: string) => Promise<IngestResult>;
  reingestText: (documentId: string, text: string) => Promise<IngestResult>;
};

export type DocumentProcessorDeps = {
  database: Pick<VectorDatabase, "addDocument" | "updateDocument" | "hasDocument">;
  embedding: Pick<EmbeddingProvider, "embed">;
  chunking: ChunkingService;
  resolveParser?: (path: string) => Parser;
  makeDocumentId?: (text: string) => string;
  logger?: LoggerService;
};
