import type { AppConfig, EmbeddingProviderId } from "../config/config.types";

export type EmbeddingConfig = AppConfig["embedding"];

export type EmbeddingProvider = {
  readonly id: EmbeddingProviderId;
  readonly model: string;
  embed: (text: string) => Promise<number[]>;
};

export function getEmbeddingProviderModel(cfg: EmbeddingConfig): string {
  return cfg.provider === "openai" ? cfg.openai.model : cfg.ollama.model;
}
