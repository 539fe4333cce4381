import "reflect-metadata";
import { config as loadEnv } from "dotenv";
import { container as rootContainer, instanceCachingFactory, type DependencyContainer } from "tsyringe";
import { createAnswerService } from "../core/answer/answer.service";
import type { AnswerService } from "../core/answer/answer.service.types";
import { createChunkingService } from "../core/chunker/chunker.service";
import type { ChunkingService } from "../core/chunker/chunker.service.types";
import { createConfigService } from "../core/config/config.service";
import type { ConfigService } from "../core/config/config.types";
import { createVectorDatabaseFromConfig } from "../core/database/vector.database";
import type { VectorDatabase } from "../core/database/vector.database.types";
import { makeEmbeddingProvider } from "../core/embedding/embedding.service";
import type { EmbeddingProvider } from "../core/embedding/embedding.types";
import { createDocumentProcessor } from "../core/ingestion/document.processor";
import type { DocumentProcessor } from "../core/ingestion/document.processor.types";
import { createLoggerService } from "../core/logger/logger.service";
import type { LoggerService } from "../core/logger/logger.service.types";
import { createRetrievalService } from "../core/retrieval/retrieval.service";
import type { RetrievalService } from "../core/retrieval/retrieval.service.types";

export type AppContainer = {
  configService: ConfigService;
  logger: LoggerService;
  database: VectorDatabase;
  documentProcessor: DocumentProcessor;
  retrievalService: RetrievalService;
  open: () => Promise<void>;
  close: () => Promise<void>;
};

type AppContainerDeps = {
  configService?: ConfigService;
  logger?: LoggerService;
  embedding?: EmbeddingProvider;
  fetchImpl?: typeof fetch;
};

const TOKENS = {
  ConfigService: Symbol("ConfigService"),
  Logger: Symbol("Logger"),
  EmbeddingProvider: Symbol("EmbeddingProvider"),
  ChunkingService: Symbol("ChunkingService"),
  VectorDatabase: Symbol("VectorDatabase"),
  DocumentProcessor: Symbol("DocumentProcessor"),
  AnswerService: Symbol("AnswerService"),
  RetrievalService: Symbol("RetrievalService"),
  AppContainer: Symbol("AppContainer"),
} as const;

/**
 * Wires one store per container. Nothing is opened here; call `open()` on the
 * result before ingesting or searching.
 */
export function createAppContainer(deps?: AppContainerDeps): AppContainer {
  if (!deps?.configService) {
    loadEnv();
  }
  const di = rootContainer.createChildContainer();
  registerDependencies(di, deps);
  return di.resolve<AppContainer>(TOKENS.AppContainer);
}

function registerDependencies(di: DependencyContainer, deps?: AppContainerDeps) {
  di.registerInstance<ConfigService>(TOKENS.ConfigService, deps?.configService ?? createConfigService());
  di.registerInstance<LoggerService>(TOKENS.Logger, deps?.logger ?? createLoggerService());
  di.register(TOKENS.EmbeddingProvider, {
    useFactory: instanceCachingFactory((c) => {
      if (deps?.embedding) {
        return deps.embedding;
      }
      const cfg = c.resolve<ConfigService>(TOKENS.ConfigService).getConfig();
      return makeEmbeddingProvider(cfg.embedding, {
        fetchImpl: deps?.fetchImpl,
        logger: c.resolve<LoggerService>(TOKENS.Logger),
      });
    }),
  });
  di.register(TOKENS.ChunkingService, {
    useFactory: instanceCachingFactory((c) =>
      createChunkingService(c.resolve<ConfigService>(TOKENS.ConfigService).getConfig().chunking),
    ),
  });
  di.register(TOKENS.VectorDatabase, {
    useFactory: instanceCachingFactory((c) =>
      createVectorDatabaseFromConfig({
        config: c.resolve<ConfigService>(TOKENS.ConfigService).getConfig(),
        logger: c.resolve<LoggerService>(TOKENS.Logger),
      }),
    ),
  });
  di.register(TOKENS.DocumentProcessor, {
    useFactory: instanceCachingFactory((c) =>
      createDocumentProcessor({
        database: c.resolve<VectorDatabase>(TOKENS.VectorDatabase),
        embedding: c.resolve<EmbeddingProvider>(TOKENS.EmbeddingProvider),
        chunking: c.resolve<ChunkingService>(TOKENS.ChunkingService),
        logger: c.resolve<LoggerService>(TOKENS.Logger),
      }),
    ),
  });
  di.register(TOKENS.AnswerService, {
    useFactory: instanceCachingFactory((c) => {
      const configService = c.resolve<ConfigService>(TOKENS.ConfigService);
      return createAnswerService({
        config: { getChatConfig: () => configService.getConfig().chat },
        fetchImpl: deps?.fetchImpl,
        logger: c.resolve<LoggerService>(TOKENS.Logger),
      });
    }),
  });
  di.register(TOKENS.RetrievalService, {
    useFactory: instanceCachingFactory((c) =>
      createRetrievalService({
        embedding: c.resolve<EmbeddingProvider>(TOKENS.EmbeddingProvider),
        database: c.resolve<VectorDatabase>(TOKENS.VectorDatabase),
        answer: c.resolve<AnswerService>(TOKENS.AnswerService),
        defaults: { topK: c.resolve<ConfigService>(TOKENS.ConfigService).getConfig().retrieval.topK },
        logger: c.resolve<LoggerService>(TOKENS.Logger),
      }),
    ),
  });
  di.register(TOKENS.AppContainer, {
    useFactory: instanceCachingFactory((c) => {
      const database = c.resolve<VectorDatabase>(TOKENS.VectorDatabase);
      return {
        configService: c.resolve<ConfigService>(TOKENS.ConfigService),
        logger: c.resolve<LoggerService>(TOKENS.Logger),
        database,
        documentProcessor: c.resolve<DocumentProcessor>(TOKENS.DocumentProcessor),
        retrievalService: c.resolve<RetrievalService>(TOKENS.RetrievalService),
        open: () => database.open(),
        close: () => database.close(),
      } satisfies AppContainer;
    }),
  });
}
