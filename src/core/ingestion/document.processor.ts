import { basename } from "node:path";
import { hashText } from "../chunker/chunker.service";
import type { ChunkSpan } from "../chunker/chunker.service.types";
import { describeError, isStoreError, notFound, StoreError } from "../errors/store.errors";
import { createLoggerService } from "../logger/logger.service";
import { resolveParserForPath } from "../parser/parser.registry";
import type { DocumentProcessor, DocumentProcessorDeps } from "./document.processor.types";

const DOCUMENT_ID_HEX_CHARS = 32;

export function createDocumentProcessor(deps: DocumentProcessorDeps): DocumentProcessor {
  const logger = deps.logger ?? createLoggerService({ name: "embedstore" });
  const resolveParser = deps.resolveParser ?? resolveParserForPath;
  const makeDocumentId = deps.makeDocumentId ?? defaultMakeDocumentId;

  async function embedSpans(documentId: string, spans: ChunkSpan[]) {
    const vectors: number[][] = [];
    for (const span of spans) {
      try {
        vectors.push(await deps.embedding.embed(span.text));
      } catch (error) {
        logger.error(
          { subsystem: "ingestion", documentId, ordinal: span.ordinal, error: describeError(error) },
          "ingestion.embed: failed",
        );
        if (isStoreError(error, "EmbeddingFailed")) {
          throw error;
        }
        throw new StoreError("EmbeddingFailed", `embedding failed for chunk ${span.ordinal}: ${describeError(error)}`, {
          cause: error,
          context: { documentId, ordinal: span.ordinal },
        });
      }
    }
    return vectors;
  }

  const processor: DocumentProcessor = {
    async ingestText(input) {
      const documentId = makeDocumentId(input.text);
      if (await deps.database.hasDocument(documentId)) {
        logger.info({ subsystem: "ingestion", documentId }, "ingestion.ingestText: already stored");
        return { documentId, skipped: true, chunkCount: 0 };
      }

      const spans = deps.chunking.chunk(input.text);
      logger.debug(
        { subsystem: "ingestion", documentId, title: input.title, chunks: spans.length },
        "ingestion.ingestText: start",
      );
      const vectors = await embedSpans(documentId, spans);
      try {
        await deps.database.addDocument({
          documentId,
          title: input.title,
          sourcePath: input.sourcePath ?? null,
          chunks: spans.map((span) => ({ text: span.text, tokenEstimate: span.tokenEstimate })),
          vectors,
        });
      } catch (error) {
        if (isStoreError(error, "DuplicateKey")) {
          return { documentId, skipped: true, chunkCount: 0 };
        }
        throw error;
      }
      logger.info(
        { subsystem: "ingestion", documentId, chunks: spans.length },
        "ingestion.ingestText: done",
      );
      return { documentId, skipped: false, chunkCount: spans.length };
    },

    async ingestFile(path) {
      const parser = resolveParser(path);
      logger.debug({ subsystem: "ingestion", path, parser: parser.id }, "ingestion.ingestFile: start");
      const text = await parser.extract(path);
      return processor.ingestText({ title: basename(path), text, sourcePath: path });
    },

    async reingestText(documentId, text) {
      if (!(await deps.database.hasDocument(documentId))) {
        throw notFound("document", documentId);
      }
      const spans = deps.chunking.chunk(text);
      logger.debug(
        { subsystem: "ingestion", documentId, chunks: spans.length },
        "ingestion.reingestText: start",
      );
      const vectors = await embedSpans(documentId, spans);
      await deps.database.updateDocument(documentId, {
        chunks: spans.map((span) => ({ text: span.text, tokenEstimate: span.tokenEstimate })),
        vectors,
      });
      logger.info(
        { subsystem: "ingestion", documentId, chunks: spans.length },
        "ingestion.reingestText: done",
      );
      return { documentId, skipped: false, chunkCount: spans.length };
    },
  };
  return processor;
}

function defaultMakeDocumentId(text: string) {
  return hashText(text).slice(0, DOCUMENT_ID_HEX_CHARS);
}
