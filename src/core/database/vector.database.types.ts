import type { VectorMetric } from "../config/config.types";
import type { ChunkRow, DocumentRow } from "../metadata/metadata.repository.types";

export type NewChunk = {
  text: string;
  tokenEstimate?: number | null;
};

export type NewDocument = {
  title: string;
  chunks: ReadonlyArray<string | NewChunk>;
  vectors: ReadonlyArray<readonly number[]>;
  documentId?: string;
  sourcePath?: string | null;
};

export type DocumentReplacement = {
  chunks: ReadonlyArray<string | NewChunk>;
  vectors: ReadonlyArray<readonly number[]>;
};

export type SearchHit = {
  position: number;
  distance: number;
  chunk: ChunkRow;
  document: DocumentRow;
};

export type DocumentWithChunks = DocumentRow & { chunks: ChunkRow[] };

export type DocumentSummary = DocumentRow & { chunkIds: string[] };

export type VectorDatabaseStats = {
  documents: number;
  chunks: number;
  indexSize: number;
  livePositions: number;
  retiredPositions: number;
  dimension: number;
  metric: VectorMetric;
  metadataPath: string;
  indexPath: string;
};

/**
 * Keeps the metadata store and the append-only vector index consistent.
 * Mutations are exclusive; reads share.
 */
export type VectorDatabase = {
  readonly dimension: number;
  open: () => Promise<void>;
  addDocument: (input: NewDocument) => Promise<string>;
  updateDocument: (documentId: string, replacement: DocumentReplacement) => Promise<void>;
  deleteDocument: (documentId: string) => Promise<void>;
  search: (vector: readonly number[], k: number) => Promise<SearchHit[]>;
  getDocument: (documentId: string) => Promise<DocumentWithChunks>;
  listDocuments: () => Promise<DocumentSummary[]>;
  hasDocument: (documentId: string) => Promise<boolean>;
  stats: () => Promise<VectorDatabaseStats>;
  clear: () => Promise<void>;
  close: () => Promise<void>;
};
