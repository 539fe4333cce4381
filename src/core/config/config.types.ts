export type EmbeddingProviderId = "ollama" | "openai";
export type VectorMetric = "l2" | "ip";

export type OllamaEmbeddingConfig = {
  endpoint: string;
  model: string;
};

export type OpenAiEmbeddingConfig = {
  endpoint: string;
  apiKey: string;
  model: string;
};

export type ChatConfig = {
  endpoint: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  topP: number;
  frequencyPenalty: number;
  presencePenalty: number;
  systemPrompt: string;
};

export interface AppConfig {
  version: 1;
  storage: {
    dataDir: string;
    metadataFile: string;
    indexFile: string;
  };
  chunking: {
    sizeChars: number;
    overlapChars: number;
    charsPerToken: number;
  };
  vector: {
    metric: VectorMetric;
    overfetchFactor: number;
  };
  embedding: {
    provider: EmbeddingProviderId;
    dimension: number;
    inputPrefix: string;
    ollama: OllamaEmbeddingConfig;
    openai: OpenAiEmbeddingConfig;
  };
  retrieval: {
    topK: number;
  };
  chat: ChatConfig;
}

export type ConfigChangeEvent = {
  prev: AppConfig;
  next: AppConfig;
};

export type ConfigService = {
  getConfig: () => AppConfig;
  updateConfig: (updater: (source: AppConfig) => AppConfig) => AppConfig;
  subscribe: (listener: (event: ConfigChangeEvent) => void) => () => void;
};
