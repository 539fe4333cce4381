import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { VectorMetric } from "../config/config.types";
import { dimensionMismatch, inconsistentStoreState } from "../errors/store.errors";
import { createLoggerService } from "../logger/logger.service";
import type { LoggerService } from "../logger/logger.service.types";
import type { VectorHit, VectorIndex, VectorIndexHeader } from "./vector.index.types";

type VectorIndexOptions = {
  indexPath: string;
  dimension: number;
  metric?: VectorMetric;
  logger?: LoggerService;
};

const MAGIC = "EMBX";
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;
const INITIAL_CAPACITY = 64;

const METRIC_CODES: Record<VectorMetric, number> = { l2: 0, ip: 1 };
const FLOAT32_MAX = 3.4028234663852886e38;

/** True when `value` is stored in a Float32Array without becoming infinite. */
export function isFloat32Component(value: number) {
  return Number.isFinite(value) && Math.abs(value) <= FLOAT32_MAX;
}

/**
 * Exact nearest-neighbour index kept in memory as one growable Float32Array
 * and written as a flat file: header, then `size * dimension` little-endian
 * float32 values.
 */
export function createFlatVectorIndex(opts: VectorIndexOptions): VectorIndex {
  const logger = opts.logger ?? createLoggerService({ name: "embedstore" });
  const indexPath = resolve(opts.indexPath);
  const dimension = opts.dimension;
  const metric = opts.metric ?? "l2";
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw inconsistentStoreState(`vector dimension must be a positive integer, got ${dimension}`);
  }

  let data = new Float32Array(INITIAL_CAPACITY * dimension);
  let count = 0;

  function ensureCapacity(rows: number) {
    if (rows * dimension <= data.length) {
      return;
    }
    let capacity = Math.max(INITIAL_CAPACITY, data.length / dimension);
    while (capacity < rows) {
      capacity *= 2;
    }
    const grown = new Float32Array(capacity * dimension);
    grown.set(data.subarray(0, count * dimension));
    data = grown;
  }

  function checkVector(vector: readonly number[], where: string) {
    if (vector.length !== dimension) {
      throw dimensionMismatch(dimension, vector.length, where);
    }
    if (!vector.every(isFloat32Component)) {
      throw dimensionMismatch(dimension, vector.length, `${where} (component outside float32 range)`);
    }
  }

  const distance =
    metric === "ip"
      ? (query: Float32Array, offset: number) => {
          let dot = 0;
          for (let i = 0; i < dimension; i += 1) {
            dot += query[i]! * data[offset + i]!;
          }
          return -dot;
        }
      : (query: Float32Array, offset: number) => {
          let sum = 0;
          for (let i = 0; i < dimension; i += 1) {
            const diff = query[i]! - data[offset + i]!;
            sum += diff * diff;
          }
          return sum;
        };

  return {
    path: indexPath,
    dimension,
    metric,

    append(vector) {
      checkVector(vector, "vector.append");
      ensureCapacity(count + 1);
      data.set(vector, count * dimension);
      const position = count;
      count += 1;
      logger.debug({ subsystem: "vector", position }, "vector.append: done");
      return position;
    },

    search(query, k) {
      checkVector(query, "vector.search");
      if (k <= 0 || count === 0) {
        return [];
      }
      // compare at stored precision so an identical vector scores exactly 0
      const q = Float32Array.from(query);
      const hits: VectorHit[] = [];
      for (let position = 0; position < count; position += 1) {
        hits.push({ position, distance: distance(q, position * dimension) });
      }
      hits.sort((a, b) => a.distance - b.distance || a.position - b.position);
      const result = hits.slice(0, k);
      logger.debug(
        { subsystem: "vector", k, size: count, resultCount: result.length },
        "vector.search: done",
      );
      return result;
    },

    vectorAt(position) {
      if (!Number.isInteger(position) || position < 0 || position >= count) {
        throw new RangeError(`vector position out of range: ${position}`);
      }
      return Array.from(data.subarray(position * dimension, (position + 1) * dimension));
    },

    size() {
      return count;
    },

    exists() {
      return existsSync(indexPath);
    },

    load() {
      if (!existsSync(indexPath)) {
        logger.debug({ subsystem: "vector", indexPath }, "vector.load: no index file");
        return false;
      }
      const buffer = readFileSync(indexPath);
      const header = readHeader(buffer, indexPath);
      if (header.dimension !== dimension || header.metric !== metric) {
        throw inconsistentStoreState("index file was written with a different dimension or metric", {
          indexPath,
          fileDimension: header.dimension,
          fileMetric: header.metric,
          dimension,
          metric,
        });
      }
      const body = buffer.byteLength - HEADER_BYTES;
      const rowBytes = dimension * FLOAT_BYTES;
      if (body % rowBytes !== 0) {
        throw inconsistentStoreState("index file is truncated", { indexPath, bytes: buffer.byteLength });
      }
      const rows = body / rowBytes;
      count = 0;
      ensureCapacity(rows);
      for (let i = 0; i < rows * dimension; i += 1) {
        data[i] = buffer.readFloatLE(HEADER_BYTES + i * FLOAT_BYTES);
      }
      count = rows;
      logger.debug({ subsystem: "vector", indexPath, size: count }, "vector.load: done");
      return true;
    },

    persist() {
      mkdirSync(dirname(indexPath), { recursive: true });
      const buffer = Buffer.alloc(HEADER_BYTES + count * dimension * FLOAT_BYTES);
      writeHeader(buffer, { version: FORMAT_VERSION, dimension, metric });
      for (let i = 0; i < count * dimension; i += 1) {
        buffer.writeFloatLE(data[i]!, HEADER_BYTES + i * FLOAT_BYTES);
      }
      const tmpPath = `${indexPath}.tmp`;
      writeFileSync(tmpPath, buffer);
      renameSync(tmpPath, indexPath);
      logger.debug({ subsystem: "vector", indexPath, size: count }, "vector.persist: done");
    },

    reset() {
      data = new Float32Array(INITIAL_CAPACITY * dimension);
      count = 0;
      logger.debug({ subsystem: "vector", indexPath }, "vector.reset: done");
    },
  };
}

function writeHeader(buffer: Buffer, header: VectorIndexHeader) {
  buffer.write(MAGIC, 0, "ascii");
  buffer.writeUInt32LE(header.version, 4);
  buffer.writeUInt32LE(header.dimension, 8);
  buffer.writeUInt32LE(METRIC_CODES[header.metric], 12);
}

export function readHeader(buffer: Buffer, indexPath: string): VectorIndexHeader {
  if (buffer.byteLength < HEADER_BYTES || buffer.toString("ascii", 0, 4) !== MAGIC) {
    throw inconsistentStoreState("index file has no valid header", { indexPath });
  }
  const version = buffer.readUInt32LE(4);
  if (version !== FORMAT_VERSION) {
    throw inconsistentStoreState(`unsupported index file version ${version}`, { indexPath });
  }
  const metricCode = buffer.readUInt32LE(12);
  const metric = metricCode === METRIC_CODES.ip ? "ip" : metricCode === METRIC_CODES.l2 ? "l2" : null;
  if (!metric) {
    throw inconsistentStoreState(`unknown metric code ${metricCode}`, { indexPath });
  }
  return { version, dimension: buffer.readUInt32LE(8), metric };
}
