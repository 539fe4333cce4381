import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { AppConfig } from "../config/config.types";
import { hashText } from "../chunker/chunker.service";
import {
  describeError,
  dimensionMismatch,
  duplicateKey,
  inconsistentStoreState,
  ingestionFailed,
  notFound,
} from "../errors/store.errors";
import { createLoggerService } from "../logger/logger.service";
import type { LoggerService } from "../logger/logger.service.types";
import { createMetadataRepository } from "../metadata/metadata.repository";
import type {
  ChunkRow,
  DocumentRow,
  MetadataRepository,
} from "../metadata/metadata.repository.types";
import { createFlatVectorIndex, isFloat32Component } from "../vector/vector.index";
import type { VectorIndex } from "../vector/vector.index.types";
import { createReadWriteGate } from "./rw.gate";
import type {
  DocumentSummary,
  NewChunk,
  SearchHit,
  VectorDatabase,
} from "./vector.database.types";

type VectorDatabaseDeps = {
  metadata: MetadataRepository;
  index: VectorIndex;
  logger?: LoggerService;
  overfetchFactor?: number;
  now?: () => number;
  makeDocumentId?: () => string;
};

type StagedWrite = {
  document: DocumentRow;
  chunks: NewChunk[];
  vectors: ReadonlyArray<readonly number[]>;
  // runs first inside the transaction; returns positions it retired
  stage: (nowMs: number) => number[];
};

export function createVectorDatabase(deps: VectorDatabaseDeps): VectorDatabase {
  const { metadata, index } = deps;
  const logger = deps.logger ?? createLoggerService({ name: "embedstore" });
  const overfetchFactor = Math.max(1, deps.overfetchFactor ?? 4);
  const now = deps.now ?? (() => Date.now());
  const makeDocumentId = deps.makeDocumentId ?? (() => randomUUID());
  const gate = createReadWriteGate();
  // index position -> live chunk id; absent positions are retired
  const liveness = new Map<number, string>();
  let opened = false;
  let closed = false;

  function assertOpen() {
    if (!opened || closed) {
      throw new Error("vector database is not open");
    }
  }

  function checkVectors(vectors: ReadonlyArray<readonly number[]>, where: string) {
    for (const vector of vectors) {
      if (vector.length !== index.dimension) {
        throw dimensionMismatch(index.dimension, vector.length, where);
      }
      if (!vector.every(isFloat32Component)) {
        throw dimensionMismatch(index.dimension, vector.length, `${where} (component outside float32 range)`);
      }
    }
  }

  function checkShape(
    documentId: string,
    chunks: ReadonlyArray<string | NewChunk>,
    vectors: ReadonlyArray<readonly number[]>,
    where: string,
  ) {
    if (chunks.length !== vectors.length) {
      throw ingestionFailed(
        `${chunks.length} chunks but ${vectors.length} vectors`,
        undefined,
        { documentId, chunks: chunks.length, vectors: vectors.length },
      );
    }
    checkVectors(vectors, where);
  }

  function abandon(positions: number[], nowMs: number) {
    if (positions.length === 0) {
      return;
    }
    logger.warn(
      { subsystem: "database", positions },
      "database.ingest: appended positions retired after failure",
    );
    try {
      // the file must cover every slot row before the rows are written
      index.persist();
      metadata.retireSlots(positions, nowMs);
    } catch (error) {
      logger.warn(
        { subsystem: "database", positions, error: describeError(error) },
        "database.ingest: could not record retired positions",
      );
    }
  }

  function commit(write: StagedWrite) {
    const { document, chunks, vectors } = write;
    const nowMs = now();
    const appended: number[] = [];
    const bound = new Map<number, string>();
    let retired: number[] = [];
    try {
      metadata.transaction(() => {
        retired = write.stage(nowMs);
        chunks.forEach((chunk, ordinal) => {
          const vector = vectors[ordinal]!;
          const position = index.append(vector);
          appended.push(position);
          const chunkId = `${document.documentId}#${ordinal}@${position}`;
          metadata.insertChunk({
            chunkId,
            documentId: document.documentId,
            ordinal,
            text: chunk.text,
            indexPosition: position,
            chunkHash: hashText(chunk.text),
            tokenEstimate: chunk.tokenEstimate ?? null,
            createdAtMs: nowMs,
          });
          metadata.bindSlot(position, chunkId, nowMs);
          bound.set(position, chunkId);
        });
        index.persist();
      });
    } catch (error) {
      abandon(appended, nowMs);
      logger.error(
        {
          subsystem: "database",
          documentId: document.documentId,
          error: describeError(error),
        },
        "database.ingest: failed",
      );
      throw ingestionFailed(`document ${document.documentId} was not stored`, error, {
        documentId: document.documentId,
        title: document.title,
      });
    }
    for (const position of retired) {
      liveness.delete(position);
    }
    for (const [position, chunkId] of bound) {
      liveness.set(position, chunkId);
    }
  }

  function openStores() {
    const loaded = index.load();
    if (!loaded && !metadata.isEmpty()) {
      throw inconsistentStoreState("metadata exists but the index file is missing", {
        indexPath: index.path,
        metadataPath: metadata.dbPath,
      });
    }
    const size = index.size();
    const slots = metadata.listSlots();
    const chunks = metadata.listChunks();
    const chunksById = new Map(chunks.map((chunk) => [chunk.chunkId, chunk]));
    const live = new Map<number, string>();

    for (const slot of slots) {
      if (slot.position >= size) {
        throw inconsistentStoreState("slot references a position beyond the index", {
          position: slot.position,
          indexSize: size,
        });
      }
      if (slot.state !== "live") {
        continue;
      }
      const chunk = slot.chunkId === null ? undefined : chunksById.get(slot.chunkId);
      if (!chunk || chunk.indexPosition !== slot.position) {
        throw inconsistentStoreState("live slot points at a missing chunk", {
          position: slot.position,
          chunkId: slot.chunkId,
        });
      }
      live.set(slot.position, chunk.chunkId);
    }

    for (const chunk of chunks) {
      if (chunk.indexPosition >= size) {
        throw inconsistentStoreState("chunk references a position beyond the index", {
          chunkId: chunk.chunkId,
          position: chunk.indexPosition,
          indexSize: size,
        });
      }
      if (live.get(chunk.indexPosition) !== chunk.chunkId) {
        throw inconsistentStoreState("chunk is not bound live to its position", {
          chunkId: chunk.chunkId,
          position: chunk.indexPosition,
        });
      }
    }

    const unslotted = size - slots.length;
    if (unslotted > 0) {
      logger.warn(
        { subsystem: "database", unslotted, indexSize: size },
        "database.open: vectors without a slot are treated as retired",
      );
    }

    liveness.clear();
    for (const [position, chunkId] of live) {
      liveness.set(position, chunkId);
    }
    opened = true;
    return { indexSize: size, live: live.size };
  }

  function documentRow(documentId: string) {
    const document = metadata.getDocument(documentId);
    if (!document) {
      throw notFound("document", documentId);
    }
    return document;
  }

  return {
    dimension: index.dimension,

    open() {
      return gate.write(() => {
        logger.debug({ subsystem: "database" }, "database.open: start");
        const result = openStores();
        logger.info({ subsystem: "database", ...result }, "database.open: done");
      });
    },

    addDocument(input) {
      return gate.write(() => {
        assertOpen();
        const documentId = input.documentId ?? makeDocumentId();
        logger.debug(
          { subsystem: "database", documentId, chunks: input.chunks.length },
          "database.addDocument: start",
        );
        checkShape(documentId, input.chunks, input.vectors, "addDocument");
        if (metadata.getDocument(documentId)) {
          throw duplicateKey("document", documentId);
        }
        const nowMs = now();
        const document: DocumentRow = {
          documentId,
          title: input.title,
          sourcePath: input.sourcePath ?? null,
          createdAtMs: nowMs,
          updatedAtMs: nowMs,
        };
        commit({
          document,
          chunks: input.chunks.map(toNewChunk),
          vectors: input.vectors,
          stage() {
            metadata.insertDocument(document);
            return [];
          },
        });
        logger.debug({ subsystem: "database", documentId }, "database.addDocument: done");
        return documentId;
      });
    },

    updateDocument(documentId, replacement) {
      return gate.write(() => {
        assertOpen();
        logger.debug({ subsystem: "database", documentId }, "database.updateDocument: start");
        const document = documentRow(documentId);
        checkShape(documentId, replacement.chunks, replacement.vectors, "updateDocument");
        const previous = metadata
          .listChunksByDocumentId(documentId)
          .map((chunk) => chunk.indexPosition);
        commit({
          document,
          chunks: replacement.chunks.map(toNewChunk),
          vectors: replacement.vectors,
          stage(nowMs) {
            metadata.retireSlots(previous, nowMs);
            metadata.deleteChunksByDocumentId(documentId);
            metadata.touchDocument(documentId, nowMs);
            return previous;
          },
        });
        logger.debug(
          { subsystem: "database", documentId, retired: previous.length },
          "database.updateDocument: done",
        );
      });
    },

    deleteDocument(documentId) {
      return gate.write(() => {
        assertOpen();
        logger.debug({ subsystem: "database", documentId }, "database.deleteDocument: start");
        documentRow(documentId);
        const positions = metadata
          .listChunksByDocumentId(documentId)
          .map((chunk) => chunk.indexPosition);
        const nowMs = now();
        metadata.transaction(() => {
          metadata.retireSlots(positions, nowMs);
          metadata.deleteDocument(documentId);
        });
        for (const position of positions) {
          liveness.delete(position);
        }
        logger.debug(
          { subsystem: "database", documentId, retired: positions.length },
          "database.deleteDocument: done",
        );
      });
    },

    search(vector, k) {
      return gate.read(() => {
        assertOpen();
        if (!Number.isSafeInteger(k) || k < 0) {
          throw new RangeError(`search k must be a non-negative integer, got ${k}`);
        }
        checkVectors([vector], "search");
        const size = index.size();
        if (k <= 0 || size === 0) {
          return [];
        }
        let fetch = Math.min(size, k * overfetchFactor);
        const documents = new Map<string, DocumentRow | null>();
        for (;;) {
          const hits: SearchHit[] = [];
          for (const candidate of index.search(vector, fetch)) {
            const chunkId = liveness.get(candidate.position);
            const chunk = chunkId === undefined ? null : metadata.getChunk(chunkId);
            if (!chunk) {
              continue;
            }
            let document = documents.get(chunk.documentId);
            if (document === undefined) {
              document = metadata.getDocument(chunk.documentId);
              documents.set(chunk.documentId, document);
            }
            if (!document) {
              continue;
            }
            hits.push({ position: candidate.position, distance: candidate.distance, chunk, document });
            if (hits.length === k) {
              break;
            }
          }
          if (hits.length === k || fetch >= size) {
            logger.debug(
              { subsystem: "database", k, fetched: fetch, resultCount: hits.length },
              "database.search: done",
            );
            return hits;
          }
          fetch = Math.min(size, fetch * 2);
        }
      });
    },

    getDocument(documentId) {
      return gate.read(() => {
        assertOpen();
        const document = documentRow(documentId);
        return { ...document, chunks: metadata.listChunksByDocumentId(documentId) };
      });
    },

    listDocuments() {
      return gate.read(() => {
        assertOpen();
        const byDocument = new Map<string, ChunkRow[]>();
        for (const chunk of metadata.listChunks()) {
          const owned = byDocument.get(chunk.documentId) ?? [];
          owned.push(chunk);
          byDocument.set(chunk.documentId, owned);
        }
        return metadata.listDocuments().map(
          (document): DocumentSummary => ({
            ...document,
            chunkIds: (byDocument.get(document.documentId) ?? [])
              .sort((a, b) => a.ordinal - b.ordinal)
              .map((chunk) => chunk.chunkId),
          }),
        );
      });
    },

    hasDocument(documentId) {
      return gate.read(() => {
        assertOpen();
        return metadata.getDocument(documentId) !== null;
      });
    },

    stats() {
      return gate.read(() => {
        assertOpen();
        const counts = metadata.counts();
        const indexSize = index.size();
        return {
          documents: counts.documents,
          chunks: counts.chunks,
          indexSize,
          livePositions: liveness.size,
          retiredPositions: indexSize - liveness.size,
          dimension: index.dimension,
          metric: index.metric,
          metadataPath: metadata.dbPath,
          indexPath: index.path,
        };
      });
    },

    clear() {
      return gate.write(() => {
        assertOpen();
        logger.debug({ subsystem: "database" }, "database.clear: start");
        try {
          metadata.transaction(() => {
            metadata.clearAll();
            index.reset();
            index.persist();
          });
        } catch (error) {
          logger.error(
            { subsystem: "database", error: describeError(error) },
            "database.clear: failed",
          );
          index.load();
          throw error;
        }
        liveness.clear();
        logger.info({ subsystem: "database" }, "database.clear: done");
      });
    },

    close() {
      return gate.write(() => {
        if (closed) {
          return;
        }
        metadata.close();
        closed = true;
        opened = false;
        logger.debug({ subsystem: "database" }, "database.close: done");
      });
    },
  };
}

/** Builds both stores under `storage.dataDir`; call `open()` before use. */
export function createVectorDatabaseFromConfig(opts: {
  config: AppConfig;
  logger?: LoggerService;
}): VectorDatabase {
  const { config } = opts;
  const logger = opts.logger ?? createLoggerService({ name: "embedstore" });
  const metadata = createMetadataRepository({
    dbPath: join(config.storage.dataDir, config.storage.metadataFile),
  });
  const index = createFlatVectorIndex({
    indexPath: join(config.storage.dataDir, config.storage.indexFile),
    dimension: config.embedding.dimension,
    metric: config.vector.metric,
    logger,
  });
  return createVectorDatabase({
    metadata,
    index,
    logger,
    overfetchFactor: config.vector.overfetchFactor,
  });
}

function toNewChunk(chunk: string | NewChunk): NewChunk {
  return typeof chunk === "string" ? { text: chunk } : chunk;
}
