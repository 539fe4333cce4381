import { createHash } from "node:crypto";
import { invalidConfig } from "../errors/store.errors";
import { validateChunking } from "../config/config.service";
import type { ChunkSpan, ChunkingConfig, ChunkingService } from "./chunker.service.types";

/** Validates once, so a bad size/overlap pair never reaches an ingestion. */
export function createChunkingService(config: ChunkingConfig): ChunkingService {
  assertChunkingConfig(config);
  const frozen = Object.freeze({ ...config });

  return {
    config: frozen,
    chunk(text: string) {
      return splitIntoSpans(normalizeText(text), frozen);
    },
  };
}

/**
 * Overlapping fixed-size windows over `text`. Sizes and offsets count code
 * points, so a window never splits a surrogate pair. Each window starts
 * `size - overlap` characters after the previous one and the last window
 * stops at the end of the text, so it may be shorter than `size`.
 */
export function chunkText(text: string, size: number, overlap: number): string[] {
  const config = { sizeChars: size, overlapChars: overlap, charsPerToken: 4 };
  assertChunkingConfig(config);
  return splitIntoSpans(normalizeText(text), config).map((span) => span.text);
}

export function normalizeText(text: string) {
  return text.replace(/\r\n?/g, "\n");
}

function assertChunkingConfig(config: ChunkingConfig) {
  const errors = validateChunking(config);
  if (errors.length > 0) {
    throw invalidConfig(errors);
  }
}

function splitIntoSpans(text: string, config: ChunkingConfig): ChunkSpan[] {
  const points = Array.from(text);
  const spans: ChunkSpan[] = [];
  let cursor = 0;
  while (cursor < points.length) {
    const end = Math.min(points.length, cursor + config.sizeChars);
    const chunk = points.slice(cursor, end).join("");
    spans.push({
      ordinal: spans.length,
      text: chunk,
      startOffset: cursor,
      endOffset: end,
      tokenEstimate: Math.max(1, Math.ceil((end - cursor) / config.charsPerToken)),
      chunkHash: hashText(chunk),
    });
    if (end >= points.length) {
      break;
    }
    cursor = end - config.overlapChars;
  }
  return spans;
}

export function hashText(text: string) {
  return createHash("sha256").update(text).digest("hex");
}
