export { createAppContainer, type AppContainer } from "./app/app.container";
export { createAnswerService, buildMessages } from "./core/answer/answer.service";
export type { AnswerService } from "./core/answer/answer.service.types";
export { chunkText, createChunkingService, normalizeText } from "./core/chunker/chunker.service";
export type { ChunkSpan, ChunkingConfig, ChunkingService } from "./core/chunker/chunker.service.types";
export {
  applyEnvOverrides,
  createConfigService,
  getDefaultConfig,
  migrateConfig,
  validateConfig,
} from "./core/config/config.service";
export type { AppConfig, ConfigService, VectorMetric } from "./core/config/config.types";
export { createVectorDatabase, createVectorDatabaseFromConfig } from "./core/database/vector.database";
export type {
  DocumentSummary,
  DocumentWithChunks,
  NewDocument,
  SearchHit,
  VectorDatabase,
  VectorDatabaseStats,
} from "./core/database/vector.database.types";
export { makeEmbeddingProvider } from "./core/embedding/embedding.service";
export type { EmbeddingProvider } from "./core/embedding/embedding.types";
export { StoreError, isStoreError, type StoreErrorKind } from "./core/errors/store.errors";
export { createDocumentProcessor } from "./core/ingestion/document.processor";
export type { DocumentProcessor, IngestResult } from "./core/ingestion/document.processor.types";
export { createLoggerService } from "./core/logger/logger.service";
export { createMetadataRepository } from "./core/metadata/metadata.repository";
export { resolveParser, resolveParserForPath } from "./core/parser/parser.registry";
export { markdownToPlainText } from "./core/parser/parsers/markdown.parser";
export { createRetrievalService } from "./core/retrieval/retrieval.service";
export type { RetrievalResult, RetrievalService } from "./core/retrieval/retrieval.service.types";
export { createFlatVectorIndex } from "./core/vector/vector.index";
