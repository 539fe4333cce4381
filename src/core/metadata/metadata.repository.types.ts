export type DocumentRow = {
  documentId: string;
  title: string;
  sourcePath: string | null;
  createdAtMs: number;
  updatedAtMs: number;
};

export type ChunkRow = {
  chunkId: string;
  documentId: string;
  ordinal: number;
  text: string;
  indexPosition: number;
  chunkHash: string;
  tokenEstimate: number | null;
  createdAtMs: number;
};

export type SlotState = "live" | "retired";

/** One entry of the liveness map: which chunk, if any, owns an index position. */
export type IndexSlotRow = {
  position: number;
  chunkId: string | null;
  state: SlotState;
  updatedAtMs: number;
};

export type MetadataCounts = {
  documents: number;
  chunks: number;
  liveSlots: number;
  retiredSlots: number;
};

export type MetadataRepository = {
  readonly dbPath: string;
  close: () => void;
  getSchemaVersion: () => number;
  transaction: <T>(fn: () => T) => T;

  insertDocument: (row: DocumentRow) => void;
  getDocument: (documentId: string) => DocumentRow | null;
  listDocuments: () => DocumentRow[];
  touchDocument: (documentId: string, updatedAtMs: number) => void;
  deleteDocument: (documentId: string) => void;

  insertChunk: (row: ChunkRow) => void;
  getChunk: (chunkId: string) => ChunkRow | null;
  getChunkByIndexPosition: (position: number) => ChunkRow | null;
  listChunksByDocumentId: (documentId: string) => ChunkRow[];
  listChunks: () => ChunkRow[];
  deleteChunksByDocumentId: (documentId: string) => number;

  bindSlot: (position: number, chunkId: string, nowMs: number) => void;
  retireSlots: (positions: number[], nowMs: number) => void;
  listSlots: () => IndexSlotRow[];

  counts: () => MetadataCounts;
  isEmpty: () => boolean;
  clearAll: () => void;
};
