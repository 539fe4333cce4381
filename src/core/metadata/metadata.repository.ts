import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { duplicateKey, notFound } from "../errors/store.errors";
import type {
  ChunkRow,
  DocumentRow,
  IndexSlotRow,
  MetadataCounts,
  MetadataRepository,
} from "./metadata.repository.types";

const SCHEMA_VERSION = 1;

const DOCUMENT_COLUMNS = `
  document_id AS documentId,
  title,
  source_path AS sourcePath,
  created_at_ms AS createdAtMs,
  updated_at_ms AS updatedAtMs`;

const CHUNK_COLUMNS = `
  chunk_id AS chunkId,
  document_id AS documentId,
  ordinal,
  text,
  index_position AS indexPosition,
  chunk_hash AS chunkHash,
  token_estimate AS tokenEstimate,
  created_at_ms AS createdAtMs`;

export function createMetadataRepository(opts: { dbPath: string }): MetadataRepository {
  const dbPath = resolve(opts.dbPath);
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  migrate(db);

  const statements = {
    schemaVersion: db.prepare<[], { value: string }>(
      "SELECT value FROM meta WHERE key = 'schema_version'",
    ),
    insertDocument: db.prepare<[string, string, string | null, number, number]>(
      `INSERT INTO documents (document_id, title, source_path, created_at_ms, updated_at_ms)
        VALUES (?, ?, ?, ?, ?)`,
    ),
    getDocument: db.prepare<[string], DocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE document_id = ?`,
    ),
    listDocuments: db.prepare<[], DocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents ORDER BY created_at_ms ASC, document_id ASC`,
    ),
    touchDocument: db.prepare<[number, string]>(
      "UPDATE documents SET updated_at_ms = ? WHERE document_id = ?",
    ),
    deleteDocument: db.prepare<[string]>("DELETE FROM documents WHERE document_id = ?"),
    insertChunk: db.prepare<[string, string, number, string, number, string, number | null, number]>(
      `INSERT INTO chunks (
        chunk_id, document_id, ordinal, text, index_position, chunk_hash, token_estimate, created_at_ms
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    ),
    getChunk: db.prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE chunk_id = ?`),
    getChunkByPosition: db.prepare<[number], ChunkRow>(
      `SELECT ${CHUNK_COLUMNS} FROM chunks WHERE index_position = ?`,
    ),
    listChunksByDocument: db.prepare<[string], ChunkRow>(
      `SELECT ${CHUNK_COLUMNS} FROM chunks WHERE document_id = ? ORDER BY ordinal ASC`,
    ),
    listChunks: db.prepare<[], ChunkRow>(
      `SELECT ${CHUNK_COLUMNS} FROM chunks ORDER BY index_position ASC`,
    ),
    deleteChunksByDocument: db.prepare<[string]>("DELETE FROM chunks WHERE document_id = ?"),
    bindSlot: db.prepare<[number, string, number]>(
      "INSERT INTO index_slots (position, chunk_id, state, updated_at_ms) VALUES (?, ?, 'live', ?)",
    ),
    retireSlot: db.prepare<[number, number]>(
      `INSERT INTO index_slots (position, chunk_id, state, updated_at_ms) VALUES (?, NULL, 'retired', ?)
        ON CONFLICT(position) DO UPDATE SET
          chunk_id = NULL,
          state = 'retired',
          updated_at_ms = excluded.updated_at_ms`,
    ),
    listSlots: db.prepare<[], IndexSlotRow>(
      `SELECT position, chunk_id AS chunkId, state, updated_at_ms AS updatedAtMs
        FROM index_slots ORDER BY position ASC`,
    ),
    counts: db.prepare<[], MetadataCounts>(
      `SELECT
        (SELECT COUNT(*) FROM documents) AS documents,
        (SELECT COUNT(*) FROM chunks) AS chunks,
        (SELECT COUNT(*) FROM index_slots WHERE state = 'live') AS liveSlots,
        (SELECT COUNT(*) FROM index_slots WHERE state = 'retired') AS retiredSlots`,
    ),
  };

  const clearAll = db.transaction(() => {
    db.exec("DELETE FROM chunks");
    db.exec("DELETE FROM documents");
    db.exec("DELETE FROM index_slots");
  });

  const retireSlots = db.transaction((positions: number[], nowMs: number) => {
    for (const position of positions) {
      statements.retireSlot.run(position, nowMs);
    }
  });

  const repository: MetadataRepository = {
    dbPath,

    close() {
      db.close();
    },

    getSchemaVersion() {
      return Number(statements.schemaVersion.get()?.value ?? 0);
    },

    transaction(fn) {
      return db.transaction(fn)();
    },

    insertDocument(row: DocumentRow) {
      try {
        statements.insertDocument.run(
          row.documentId,
          row.title,
          row.sourcePath,
          row.createdAtMs,
          row.updatedAtMs,
        );
      } catch (error) {
        throw mapConstraintError(error, "document", row.documentId);
      }
    },

    getDocument(documentId: string) {
      return statements.getDocument.get(documentId) ?? null;
    },

    listDocuments() {
      return statements.listDocuments.all();
    },

    touchDocument(documentId: string, updatedAtMs: number) {
      const result = statements.touchDocument.run(updatedAtMs, documentId);
      if (result.changes === 0) {
        throw notFound("document", documentId);
      }
    },

    deleteDocument(documentId: string) {
      const result = statements.deleteDocument.run(documentId);
      if (result.changes === 0) {
        throw notFound("document", documentId);
      }
    },

    insertChunk(row: ChunkRow) {
      try {
        statements.insertChunk.run(
          row.chunkId,
          row.documentId,
          row.ordinal,
          row.text,
          row.indexPosition,
          row.chunkHash,
          row.tokenEstimate,
          row.createdAtMs,
        );
      } catch (error) {
        if (isSqliteError(error, "SQLITE_CONSTRAINT_FOREIGNKEY")) {
          throw notFound("document", row.documentId);
        }
        throw mapConstraintError(error, "chunk", row.chunkId);
      }
    },

    getChunk(chunkId: string) {
      return statements.getChunk.get(chunkId) ?? null;
    },

    getChunkByIndexPosition(position: number) {
      return statements.getChunkByPosition.get(position) ?? null;
    },

    listChunksByDocumentId(documentId: string) {
      return statements.listChunksByDocument.all(documentId);
    },

    listChunks() {
      return statements.listChunks.all();
    },

    deleteChunksByDocumentId(documentId: string) {
      return statements.deleteChunksByDocument.run(documentId).changes;
    },

    bindSlot(position: number, chunkId: string, nowMs: number) {
      try {
        statements.bindSlot.run(position, chunkId, nowMs);
      } catch (error) {
        throw mapConstraintError(error, "index slot", String(position));
      }
    },

    retireSlots(positions: number[], nowMs: number) {
      if (positions.length === 0) {
        return;
      }
      retireSlots(positions, nowMs);
    },

    listSlots() {
      return statements.listSlots.all();
    },

    counts() {
      return (
        statements.counts.get() ?? { documents: 0, chunks: 0, liveSlots: 0, retiredSlots: 0 }
      );
    },

    isEmpty() {
      const counts = repository.counts();
      return counts.documents === 0 && counts.chunks === 0 && counts.liveSlots + counts.retiredSlots === 0;
    },

    clearAll() {
      clearAll();
    },
  };
  return repository;
}

function isSqliteError(error: unknown, ...codes: string[]): boolean {
  return error instanceof Database.SqliteError && codes.includes(error.code);
}

function mapConstraintError(error: unknown, entity: string, key: string) {
  if (isSqliteError(error, "SQLITE_CONSTRAINT_PRIMARYKEY", "SQLITE_CONSTRAINT_UNIQUE")) {
    return duplicateKey(entity, key, error);
  }
  return error;
}

function migrate(db: Database.Database) {
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(
    `CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )`,
  );

  db.exec(
    `CREATE TABLE IF NOT EXISTS documents (
      document_id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      source_path TEXT,
      created_at_ms INTEGER NOT NULL,
      updated_at_ms INTEGER NOT NULL
    )`,
  );

  db.exec(
    `CREATE TABLE IF NOT EXISTS chunks (
      chunk_id TEXT PRIMARY KEY,
      document_id TEXT NOT NULL,
      ordinal INTEGER NOT NULL,
      text TEXT NOT NULL,
      index_position INTEGER NOT NULL UNIQUE,
      chunk_hash TEXT NOT NULL,
      token_estimate INTEGER,
      created_at_ms INTEGER NOT NULL,
      FOREIGN KEY(document_id) REFERENCES documents(document_id) ON DELETE CASCADE,
      UNIQUE(document_id, ordinal)
    )`,
  );
  db.exec("CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id)");

  db.exec(
    `CREATE TABLE IF NOT EXISTS index_slots (
      position INTEGER PRIMARY KEY,
      chunk_id TEXT,
      state TEXT NOT NULL CHECK (state IN ('live', 'retired')),
      updated_at_ms INTEGER NOT NULL
    )`,
  );

  db.prepare(
    `INSERT INTO meta(key, value) VALUES ('schema_version', ?)
      ON CONFLICT(key) DO UPDATE SET value=excluded.value`,
  ).run(String(SCHEMA_VERSION));
}
