export type ChunkingConfig = {
  sizeChars: number;
  overlapChars: number;
  charsPerToken: number;
};

export type ChunkSpan = {
  ordinal: number;
  text: string;
  startOffset: number;
  endOffset: number;
  tokenEstimate: number;
  chunkHash: string;
};

export type ChunkingService = {
  readonly config: ChunkingConfig;
  chunk: (text: string) => ChunkSpan[];
};
