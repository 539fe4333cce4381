import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { EventEmitter } from "node:events";
import { dirname, join } from "node:path";
import { invalidConfig } from "../errors/store.errors";
import type {
  AppConfig,
  ConfigChangeEvent,
  ConfigService,
  EmbeddingProviderId,
  VectorMetric,
} from "./config.types";
import { createDefaultConfig } from "./default-config";

export function getDefaultConfig(): AppConfig {
  return createDefaultConfig();
}

export function validateConfig(cfg: AppConfig): {
  ok: boolean;
  errors: string[];
} {
  const errors = [
    ...validateChunking(cfg.chunking),
    ...validateEmbedding(cfg.embedding),
    ...validateStorage(cfg.storage),
  ];
  return { ok: errors.length === 0, errors };
}

export function assertValidConfig(cfg: AppConfig): AppConfig {
  const validation = validateConfig(cfg);
  if (!validation.ok) {
    throw invalidConfig(validation.errors);
  }
  return cfg;
}

export function validateChunking(chunking: AppConfig["chunking"]): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(chunking.sizeChars) || chunking.sizeChars <= 0) {
    errors.push("chunking.sizeChars must be a positive integer");
  }
  if (!Number.isInteger(chunking.overlapChars) || chunking.overlapChars < 0) {
    errors.push("chunking.overlapChars must be a non-negative integer");
  } else if (chunking.overlapChars >= chunking.sizeChars) {
    errors.push("chunking.overlapChars must be smaller than chunking.sizeChars");
  }
  if (!(chunking.charsPerToken > 0)) {
    errors.push("chunking.charsPerToken must be > 0");
  }
  return errors;
}

function validateEmbedding(embedding: AppConfig["embedding"]): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(embedding.dimension) || embedding.dimension <= 0) {
    errors.push("embedding.dimension must be a positive integer");
  }
  if (embedding.provider === "openai" && !embedding.openai.apiKey) {
    errors.push("embedding.openai.apiKey is required");
  }
  if (embedding.provider === "ollama" && !embedding.ollama.endpoint) {
    errors.push("embedding.ollama.endpoint is required");
  }
  return errors;
}

function validateStorage(storage: AppConfig["storage"]): string[] {
  const errors: string[] = [];
  if (!storage.dataDir) {
    errors.push("storage.dataDir is required");
  }
  if (!storage.metadataFile || !storage.indexFile) {
    errors.push("storage.metadataFile and storage.indexFile are required");
  }
  if (storage.metadataFile === storage.indexFile) {
    errors.push("storage.metadataFile and storage.indexFile must differ");
  }
  return errors;
}

export function migrateConfig(input: unknown): AppConfig {
  return migrateConfigWithDefaults(input, getDefaultConfig());
}

function migrateConfigWithDefaults(input: unknown, defaults: AppConfig): AppConfig {
  const next = toRecord(input);
  if (next.version !== 1) {
    return defaults;
  }
  const storage = toRecord(next.storage);
  const chunking = toRecord(next.chunking);
  const vector = toRecord(next.vector);
  const embedding = toRecord(next.embedding);
  const ollama = toRecord(embedding.ollama);
  const openai = toRecord(embedding.openai);
  const retrieval = toRecord(next.retrieval);
  const chat = toRecord(next.chat);

  return {
    version: 1,
    storage: {
      dataDir: readString(storage.dataDir, defaults.storage.dataDir),
      metadataFile: readString(storage.metadataFile, defaults.storage.metadataFile),
      indexFile: readString(storage.indexFile, defaults.storage.indexFile),
    },
    // chunking values are kept as written so validateConfig can reject them
    chunking: {
      sizeChars: readNumber(chunking.sizeChars, defaults.chunking.sizeChars),
      overlapChars: readNumber(chunking.overlapChars, defaults.chunking.overlapChars),
      charsPerToken: readNumber(chunking.charsPerToken, defaults.chunking.charsPerToken),
    },
    vector: {
      metric: isMetric(vector.metric) ? vector.metric : defaults.vector.metric,
      overfetchFactor: normalizePositiveInt(vector.overfetchFactor, defaults.vector.overfetchFactor),
    },
    embedding: {
      provider: isEmbeddingProvider(embedding.provider)
        ? embedding.provider
        : defaults.embedding.provider,
      dimension: readNumber(embedding.dimension, defaults.embedding.dimension),
      inputPrefix: readString(embedding.inputPrefix, defaults.embedding.inputPrefix, true),
      ollama: {
        endpoint: readString(ollama.endpoint, defaults.embedding.ollama.endpoint),
        model: readString(ollama.model, defaults.embedding.ollama.model),
      },
      openai: {
        endpoint: readString(openai.endpoint, defaults.embedding.openai.endpoint),
        apiKey: readString(openai.apiKey, defaults.embedding.openai.apiKey, true),
        model: readString(openai.model, defaults.embedding.openai.model),
      },
    },
    retrieval: {
      topK: normalizePositiveInt(retrieval.topK, defaults.retrieval.topK),
    },
    chat: {
      endpoint: readString(chat.endpoint, defaults.chat.endpoint),
      apiKey: readString(chat.apiKey, defaults.chat.apiKey, true),
      model: readString(chat.model, defaults.chat.model),
      temperature: readNumber(chat.temperature, defaults.chat.temperature),
      maxTokens: normalizePositiveInt(chat.maxTokens, defaults.chat.maxTokens),
      topP: readNumber(chat.topP, defaults.chat.topP),
      frequencyPenalty: readNumber(chat.frequencyPenalty, defaults.chat.frequencyPenalty),
      presencePenalty: readNumber(chat.presencePenalty, defaults.chat.presencePenalty),
      systemPrompt: readString(chat.systemPrompt, defaults.chat.systemPrompt),
    },
  };
}

/**
 * Environment values win over the file: `EMBEDSTORE_DATA_DIR` moves both
 * store files, `OPENAI_API_KEY` fills any empty OpenAI key.
 */
export function applyEnvOverrides(cfg: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const dataDir = env.EMBEDSTORE_DATA_DIR?.trim();
  const apiKey = env.OPENAI_API_KEY?.trim();
  return {
    ...cfg,
    storage: dataDir ? { ...cfg.storage, dataDir } : cfg.storage,
    embedding:
      apiKey && !cfg.embedding.openai.apiKey
        ? { ...cfg.embedding, openai: { ...cfg.embedding.openai, apiKey } }
        : cfg.embedding,
    chat: apiKey && !cfg.chat.apiKey ? { ...cfg.chat, apiKey } : cfg.chat,
  };
}

function toRecord(input: unknown): Record<string, unknown> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    return {};
  }
  return Object.fromEntries(Object.entries(input));
}

function readString(value: unknown, fallback: string, allowEmpty = false) {
  if (typeof value !== "string") {
    return fallback;
  }
  return allowEmpty || value.trim() ? value : fallback;
}

function readNumber(value: unknown, fallback: number) {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  return Number.isInteger(value) && Number(value) > 0 ? Number(value) : fallback;
}

function isMetric(value: unknown): value is VectorMetric {
  return value === "l2" || value === "ip";
}

function isEmbeddingProvider(value: unknown): value is EmbeddingProviderId {
  return value === "ollama" || value === "openai";
}

export function createConfigService(opts?: {
  configPath?: string;
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
}): ConfigService {
  const defaults = createDefaultConfig({ dataDir: opts?.dataDir });
  const configPath =
    opts?.configPath ?? (opts?.dataDir ? join(opts.dataDir, "config.json") : "config.json");
  const env = opts?.env ?? process.env;
  let cache: AppConfig | null = null;
  const emitter = new EventEmitter();
  const CONFIG_CHANGED_EVENT = "config_changed";

  function persist(config: AppConfig) {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", "utf8");
  }

  function readRaw(): string | null {
    try {
      return readFileSync(configPath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  function load(): AppConfig {
    const raw = readRaw();
    if (raw === null) {
      persist(defaults);
      return assertValidConfig(applyEnvOverrides(defaults, env));
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw invalidConfig([`${configPath} is not valid JSON`], error);
    }
    const parsed = migrateConfigWithDefaults(json, defaults);
    assertValidConfig(parsed);
    const normalized = JSON.stringify(parsed, null, 2) + "\n";
    if (raw !== normalized) {
      persist(parsed);
    }
    return assertValidConfig(applyEnvOverrides(parsed, env));
  }

  return {
    getConfig() {
      if (!cache) {
        cache = load();
      }
      return cache;
    },
    updateConfig(updater) {
      const current = this.getConfig();
      const next = assertValidConfig(updater(current));
      cache = next;
      persist(next);
      const event: ConfigChangeEvent = { prev: current, next };
      emitter.emit(CONFIG_CHANGED_EVENT, event);
      return next;
    },
    subscribe(listener) {
      emitter.on(CONFIG_CHANGED_EVENT, listener);
      return () => {
        emitter.off(CONFIG_CHANGED_EVENT, listener);
      };
    },
  };
}

function isMissingFileError(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
