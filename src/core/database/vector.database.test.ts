import { describe, expect, test } from "vitest";
import { createHash } from "node:crypto";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { chunkText } from "../chunker/chunker.service";
import { isStoreError } from "../errors/store.errors";
import { createSilentLogger } from "../logger/logger.service";
import { createMetadataRepository } from "../metadata/metadata.repository";
import type { MetadataRepository } from "../metadata/metadata.repository.types";
import { createFlatVectorIndex } from "../vector/vector.index";
import { createVectorDatabase } from "./vector.database";

const logger = createSilentLogger();

function makeStores(dir: string, dimension = 3) {
  const metadata = createMetadataRepository({ dbPath: join(dir, "metadata.db") });
  const index = createFlatVectorIndex({
    indexPath: join(dir, "vectors.index"),
    dimension,
    logger,
  });
  return { metadata, index };
}

function makeDatabase(
  dir: string,
  opts?: {
    dimension?: number;
    overfetchFactor?: number;
    wrap?: (metadata: MetadataRepository) => MetadataRepository;
  },
) {
  const { metadata, index } = makeStores(dir, opts?.dimension);
  let clock = 1_000;
  return createVectorDatabase({
    metadata: opts?.wrap ? opts.wrap(metadata) : metadata,
    index,
    logger,
    overfetchFactor: opts?.overfetchFactor,
    now: () => clock++,
  });
}

async function captureAsync(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

function stubEmbedding(text: string, dimension: number) {
  const digest = createHash("sha256").update(text).digest();
  const value = digest.readUInt32BE(0) / 2 ** 32;
  return Array.from({ length: dimension }, () => value % 1.0);
}

describe("vector database", () => {
  test("adds a document and reads it back", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    const documentId = await db.addDocument({
      documentId: "doc-1",
      title: "notes.txt",
      sourcePath: "/tmp/notes.txt",
      chunks: ["alpha", { text: "beta", tokenEstimate: 1 }],
      vectors: [
        [1, 0, 0],
        [0, 1, 0],
      ],
    });

    expect(documentId).toBe("doc-1");
    const document = await db.getDocument("doc-1");
    expect(document.title).toBe("notes.txt");
    expect(document.sourcePath).toBe("/tmp/notes.txt");
    expect(document.chunks.map((chunk) => [chunk.chunkId, chunk.text, chunk.tokenEstimate])).toEqual([
      ["doc-1#0@0", "alpha", null],
      ["doc-1#1@1", "beta", 1],
    ]);
    expect(await db.listDocuments()).toEqual([
      {
        documentId: "doc-1",
        title: "notes.txt",
        sourcePath: "/tmp/notes.txt",
        createdAtMs: document.createdAtMs,
        updatedAtMs: document.updatedAtMs,
        chunkIds: ["doc-1#0@0", "doc-1#1@1"],
      },
    ]);
    expect(await db.hasDocument("doc-1")).toBe(true);
    expect(await db.hasDocument("doc-2")).toBe(false);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("generates a document id when none is given", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    const first = await db.addDocument({ title: "a", chunks: [], vectors: [] });
    const second = await db.addDocument({ title: "b", chunks: [], vectors: [] });
    expect(first).not.toBe(second);
    expect((await db.getDocument(first)).chunks).toEqual([]);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("the exact text of a chunk finds that chunk first at distance zero", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const dimension = 8;
    const db = makeDatabase(dir, { dimension });
    await db.open();
    const text = Array.from({ length: 700 }, (_, i) => String.fromCharCode(97 + (i % 26))).join("");
    const chunks = chunkText(text, 300, 50);
    expect(chunks.map((chunk) => chunk.length)).toEqual([300, 300, 200]);
    expect(chunks[0]!.slice(250)).toBe(chunks[1]!.slice(0, 50));
    expect(chunks[1]!.slice(250)).toBe(chunks[2]!.slice(0, 50));

    const documentId = await db.addDocument({
      title: "alphabet.txt",
      chunks,
      vectors: chunks.map((chunk) => stubEmbedding(chunk, dimension)),
    });
    const hits = await db.search(stubEmbedding(chunks[1]!, dimension), 1);
    expect(hits).toHaveLength(1);
    expect(hits[0]!.chunk.ordinal).toBe(1);
    expect(hits[0]!.chunk.text).toBe(chunks[1]);
    expect(hits[0]!.distance).toBe(0);
    expect(hits[0]!.document.documentId).toBe(documentId);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("deleted documents are never returned", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({
      documentId: "gone",
      title: "gone.txt",
      chunks: ["one", "two"],
      vectors: [
        [1, 0, 0],
        [0, 1, 0],
      ],
    });
    await db.deleteDocument("gone");

    expect(await db.search([1, 0, 0], 5)).toEqual([]);
    expect(isStoreError(await captureAsync(db.getDocument("gone")), "NotFound")).toBe(true);
    expect(await db.stats()).toMatchObject({
      documents: 0,
      chunks: 0,
      indexSize: 2,
      livePositions: 0,
      retiredPositions: 2,
    });
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("a second delete fails with NotFound and later operations still work", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({ documentId: "d", title: "d", chunks: ["x"], vectors: [[1, 1, 1]] });
    await db.deleteDocument("d");
    expect(isStoreError(await captureAsync(db.deleteDocument("d")), "NotFound")).toBe(true);

    await db.addDocument({ documentId: "e", title: "e", chunks: ["y"], vectors: [[1, 1, 1]] });
    const hits = await db.search([1, 1, 1], 3);
    expect(hits.map((hit) => [hit.position, hit.chunk.chunkId])).toEqual([[1, "e#0@1"]]);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("search after deleting one of two documents only sees the survivor", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({
      documentId: "A",
      title: "A",
      chunks: ["a0", "a1", "a2"],
      vectors: [
        [1, 0, 0],
        [1, 1, 0],
        [0, 1, 0],
      ],
    });
    await db.addDocument({
      documentId: "B",
      title: "B",
      chunks: ["b0", "b1"],
      vectors: [
        [5, 5, 5],
        [6, 6, 6],
      ],
    });
    await db.deleteDocument("A");

    const hits = await db.search([1, 0, 0], 10);
    expect(hits.map((hit) => [hit.document.documentId, hit.chunk.text, hit.distance])).toEqual([
      ["B", "b0", 66],
      ["B", "b1", 97],
    ]);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("stores astral chunk text exactly as it was embedded", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const dimension = 4;
    const db = makeDatabase(dir, { dimension });
    await db.open();
    const chunks = chunkText("\u{1F600}a\u{1F600}b\u{1F600}", 2, 0);
    await db.addDocument({
      documentId: "emoji",
      title: "emoji.txt",
      chunks,
      vectors: chunks.map((chunk) => stubEmbedding(chunk, dimension)),
    });

    const stored = await db.getDocument("emoji");
    expect(stored.chunks.map((chunk) => chunk.text)).toEqual(["\u{1F600}a", "\u{1F600}b", "\u{1F600}"]);
    expect(stored.chunks.map((chunk) => chunk.chunkHash)).toEqual(
      chunks.map((chunk) => createHash("sha256").update(chunk).digest("hex")),
    );
    const hits = await db.search(stubEmbedding(stored.chunks[1]!.text, dimension), 1);
    expect(hits[0]!.distance).toBe(0);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("search rejects a k that is not a non-negative integer", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({
      documentId: "d",
      title: "d",
      chunks: ["d0", "d1", "d2", "d3"],
      vectors: [
        [0, 0, 0],
        [1, 0, 0],
        [2, 0, 0],
        [3, 0, 0],
      ],
    });

    for (const k of [Number.NaN, 1.5, -1, Number.POSITIVE_INFINITY]) {
      const error = await captureAsync(db.search([0, 0, 0], k));
      expect(error).toBeInstanceOf(RangeError);
    }
    expect((await db.search([0, 0, 0], 1)).map((hit) => hit.position)).toEqual([0]);
    await db.addDocument({ documentId: "e", title: "e", chunks: ["e0"], vectors: [[4, 0, 0]] });
    expect((await db.stats()).indexSize).toBe(5);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("search widens past retired neighbours until k live hits are found", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir, { overfetchFactor: 1 });
    await db.open();
    await db.addDocument({
      documentId: "near",
      title: "near",
      chunks: ["n0", "n1", "n2", "n3"],
      vectors: [
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ],
    });
    await db.addDocument({
      documentId: "far",
      title: "far",
      chunks: ["f0", "f1"],
      vectors: [
        [2, 0, 0],
        [3, 0, 0],
      ],
    });
    await db.deleteDocument("near");

    const hits = await db.search([0, 0, 0], 2);
    expect(hits.map((hit) => [hit.position, hit.distance])).toEqual([
      [4, 4],
      [5, 9],
    ]);
    expect(await db.search([0, 0, 0], 0)).toEqual([]);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("reopening preserves documents and rankings", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const first = makeDatabase(dir);
    await first.open();
    for (let i = 0; i < 5; i += 1) {
      await first.addDocument({
        documentId: `doc-${i}`,
        title: `doc-${i}.txt`,
        chunks: [`text ${i}a`, `text ${i}b`],
        vectors: [
          [i, 0, 1],
          [0, i, 1],
        ],
      });
    }
    await first.deleteDocument("doc-2");
    const documentsBefore = await first.listDocuments();
    const rankingBefore = await first.search([2, 1, 1], 4);
    await first.close();

    const second = makeDatabase(dir);
    await second.open();
    expect(await second.listDocuments()).toEqual(documentsBefore);
    expect(await second.search([2, 1, 1], 4)).toEqual(rankingBefore);
    expect((await second.stats()).retiredPositions).toBe(2);
    await second.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("a metadata failure mid-ingestion leaves nothing searchable", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    let inserts = 0;
    const db = makeDatabase(dir, {
      wrap: (metadata) => ({
        ...metadata,
        insertChunk(row) {
          inserts += 1;
          if (inserts === 2) {
            throw new Error("disk full");
          }
          metadata.insertChunk(row);
        },
      }),
    });
    await db.open();

    const error = await captureAsync(
      db.addDocument({
        documentId: "broken",
        title: "broken.txt",
        chunks: ["c0", "c1", "c2"],
        vectors: [
          [1, 0, 0],
          [0, 1, 0],
          [0, 0, 1],
        ],
      }),
    );
    expect(isStoreError(error, "IngestionFailed")).toBe(true);
    expect(error instanceof Error && error.cause instanceof Error ? error.cause.message : null).toBe(
      "disk full",
    );
    expect(await db.listDocuments()).toEqual([]);
    for (const query of [
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, 1],
    ]) {
      expect(await db.search(query, 3)).toEqual([]);
    }
    expect(await db.stats()).toMatchObject({ indexSize: 2, livePositions: 0, retiredPositions: 2 });
    await db.close();

    const reopened = makeDatabase(dir);
    await reopened.open();
    expect(await reopened.search([1, 0, 0], 3)).toEqual([]);
    await reopened.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("rejects wrong-length vectors before appending anything", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    const addError = await captureAsync(
      db.addDocument({
        title: "bad",
        chunks: ["ok", "short"],
        vectors: [[1, 0, 0], [1, 0]],
      }),
    );
    expect(isStoreError(addError, "DimensionMismatch")).toBe(true);
    expect(isStoreError(await captureAsync(db.search([1, 0], 1)), "DimensionMismatch")).toBe(true);
    expect(isStoreError(await captureAsync(db.search([1e300, 0, 0], 1)), "DimensionMismatch")).toBe(true);
    expect(
      isStoreError(
        await captureAsync(db.addDocument({ title: "bad", chunks: ["a", "b"], vectors: [[1, 0, 0]] })),
        "IngestionFailed",
      ),
    ).toBe(true);
    expect((await db.stats()).indexSize).toBe(0);
    expect(await db.listDocuments()).toEqual([]);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("rejects a colliding document id", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({ documentId: "same", title: "one", chunks: ["x"], vectors: [[1, 0, 0]] });
    const error = await captureAsync(
      db.addDocument({ documentId: "same", title: "two", chunks: ["y"], vectors: [[0, 1, 0]] }),
    );
    expect(isStoreError(error, "DuplicateKey")).toBe(true);
    expect((await db.stats()).indexSize).toBe(1);
    expect((await db.getDocument("same")).title).toBe("one");
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("update replaces chunks and retires the old positions", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({
      documentId: "doc",
      title: "doc.txt",
      chunks: ["old 0", "old 1"],
      vectors: [
        [1, 0, 0],
        [0, 1, 0],
      ],
    });
    const before = await db.getDocument("doc");
    await db.updateDocument("doc", { chunks: ["new 0"], vectors: [[0, 0, 1]] });

    const after = await db.getDocument("doc");
    expect(after.title).toBe("doc.txt");
    expect(after.createdAtMs).toBe(before.createdAtMs);
    expect(after.updatedAtMs).toBeGreaterThan(before.updatedAtMs);
    expect(after.chunks.map((chunk) => [chunk.chunkId, chunk.indexPosition])).toEqual([["doc#0@2", 2]]);
    const hits = await db.search([1, 0, 0], 3);
    expect(hits.map((hit) => hit.chunk.text)).toEqual(["new 0"]);
    expect(await db.stats()).toMatchObject({ indexSize: 3, livePositions: 1, retiredPositions: 2 });
    expect(
      isStoreError(await captureAsync(db.updateDocument("missing", { chunks: [], vectors: [] })), "NotFound"),
    ).toBe(true);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("a failed update keeps the previous chunks live", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    let failInserts = false;
    const db = makeDatabase(dir, {
      wrap: (metadata) => ({
        ...metadata,
        insertChunk(row) {
          if (failInserts) {
            throw new Error("write refused");
          }
          metadata.insertChunk(row);
        },
      }),
    });
    await db.open();
    await db.addDocument({ documentId: "doc", title: "doc", chunks: ["keep"], vectors: [[1, 0, 0]] });
    failInserts = true;

    const error = await captureAsync(db.updateDocument("doc", { chunks: ["lost"], vectors: [[1, 0, 0]] }));
    expect(isStoreError(error, "IngestionFailed")).toBe(true);
    const hits = await db.search([1, 0, 0], 5);
    expect(hits.map((hit) => [hit.position, hit.chunk.text])).toEqual([[0, "keep"]]);
    expect((await db.getDocument("doc")).chunks.map((chunk) => chunk.text)).toEqual(["keep"]);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("clear empties both stores", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const db = makeDatabase(dir);
    await db.open();
    await db.addDocument({ documentId: "doc", title: "doc", chunks: ["x"], vectors: [[1, 0, 0]] });
    await db.clear();
    expect(await db.stats()).toMatchObject({ documents: 0, chunks: 0, indexSize: 0, livePositions: 0 });
    await db.addDocument({ documentId: "next", title: "next", chunks: ["y"], vectors: [[1, 0, 0]] });
    expect((await db.getDocument("next")).chunks[0]!.indexPosition).toBe(0);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });
});

describe("vector database consistency check", () => {
  test("fails when metadata exists but the index file is missing", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const { metadata } = makeStores(dir);
    metadata.insertDocument({ documentId: "d", title: "d", sourcePath: null, createdAtMs: 1, updatedAtMs: 1 });
    metadata.close();

    const db = makeDatabase(dir);
    expect(isStoreError(await captureAsync(db.open()), "InconsistentStoreState")).toBe(true);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("fails when a slot points past the end of the index", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const { metadata, index } = makeStores(dir);
    index.persist();
    metadata.bindSlot(5, "ghost", 1);
    metadata.close();

    const db = makeDatabase(dir);
    expect(isStoreError(await captureAsync(db.open()), "InconsistentStoreState")).toBe(true);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("fails when a chunk is not bound live to its position", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const { metadata, index } = makeStores(dir);
    index.append([1, 0, 0]);
    index.persist();
    metadata.insertDocument({ documentId: "d", title: "d", sourcePath: null, createdAtMs: 1, updatedAtMs: 1 });
    metadata.insertChunk({
      chunkId: "d#0@0",
      documentId: "d",
      ordinal: 0,
      text: "x",
      indexPosition: 0,
      chunkHash: "h",
      tokenEstimate: null,
      createdAtMs: 1,
    });
    metadata.close();

    const db = makeDatabase(dir);
    expect(isStoreError(await captureAsync(db.open()), "InconsistentStoreState")).toBe(true);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("fails when a live slot points at a missing chunk", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const { metadata, index } = makeStores(dir);
    index.append([1, 0, 0]);
    index.persist();
    metadata.bindSlot(0, "nobody", 1);
    metadata.close();

    const db = makeDatabase(dir);
    expect(isStoreError(await captureAsync(db.open()), "InconsistentStoreState")).toBe(true);
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("fails when the index was written with another dimension", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const first = makeDatabase(dir, { dimension: 3 });
    await first.open();
    await first.addDocument({ title: "d", chunks: ["x"], vectors: [[1, 0, 0]] });
    await first.close();

    const second = makeDatabase(dir, { dimension: 4 });
    expect(isStoreError(await captureAsync(second.open()), "InconsistentStoreState")).toBe(true);
    await second.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("treats trailing vectors without a slot as retired", async () => {
    const dir = mkdtempSync(join(tmpdir(), "embedstore-database-"));
    const { metadata, index } = makeStores(dir);
    index.append([1, 0, 0]);
    index.persist();
    metadata.close();

    const db = makeDatabase(dir);
    await db.open();
    expect(await db.search([1, 0, 0], 1)).toEqual([]);
    expect(await db.stats()).toMatchObject({ indexSize: 1, livePositions: 0, retiredPositions: 1 });
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });
});
