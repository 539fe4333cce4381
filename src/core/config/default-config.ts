import type { AppConfig } from "./config.types";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a knowledgeable assistant. Answer strictly from the provided document excerpts and keep answers concise. " +
  "Name the title of the source document the information comes from. " +
  "If the excerpts do not answer the question, say so and suggest checking another document or source.";

export function createDefaultConfig(opts?: { dataDir?: string }): AppConfig {
  return {
    version: 1,
    storage: {
      dataDir: opts?.dataDir ?? "database",
      metadataFile: "metadata.db",
      indexFile: "vectors.index",
    },
    chunking: { sizeChars: 300, overlapChars: 50, charsPerToken: 4 },
    vector: { metric: "l2", overfetchFactor: 4 },
    embedding: {
      provider: "ollama",
      dimension: 1024,
      inputPrefix: "Represent this sentence for searching relevant passages: ",
      ollama: {
        endpoint: "http://localhost:11434",
        model: "mxbai-embed-large",
      },
      openai: {
        endpoint: "https://api.openai.com/v1/embeddings",
        apiKey: "",
        model: "text-embedding-3-small",
      },
    },
    retrieval: { topK: 3 },
    chat: {
      endpoint: "https://api.openai.com/v1/chat/completions",
      apiKey: "",
      model: "gpt-4o",
      temperature: 0.7,
      maxTokens: 300,
      topP: 0.9,
      frequencyPenalty: 0.2,
      presencePenalty: 0.2,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
    },
  };
}
