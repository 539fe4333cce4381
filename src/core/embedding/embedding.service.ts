import { z } from "zod";
import { describeError, StoreError } from "../errors/store.errors";
import { createLoggerService } from "../logger/logger.service";
import type { LoggerService } from "../logger/logger.service.types";
import {
  getEmbeddingProviderModel,
  type EmbeddingConfig,
  type EmbeddingProvider,
} from "./embedding.types";

type EmbeddingDeps = {
  fetchImpl?: typeof fetch;
  logger?: LoggerService;
};

type EmbeddingRequest = {
  url: string;
  headers: Record<string, string>;
  body: Record<string, string>;
};

/**
 * HTTP embedding client. `ollama` talks to `/api/embeddings`, `openai` to any
 * OpenAI-compatible `/v1/embeddings` endpoint. Every failure surfaces as
 * `EmbeddingFailed`; nothing is retried.
 */
export function makeEmbeddingProvider(cfg: EmbeddingConfig, deps?: EmbeddingDeps): EmbeddingProvider {
  const fetchImpl = deps?.fetchImpl ?? fetch;
  const logger = deps?.logger ?? createLoggerService({ name: "embedstore" });
  const model = getEmbeddingProviderModel(cfg);

  return {
    id: cfg.provider,
    model,
    async embed(text: string) {
      const input = `${cfg.inputPrefix}${text}`;
      const request = buildRequest(cfg, input);
      logger.debug(
        { subsystem: "embedding", provider: cfg.provider, model, chars: input.length },
        "embedding.embed: start",
      );

      let response: Response;
      try {
        response = await fetchImpl(request.url, {
          method: "POST",
          headers: request.headers,
          body: JSON.stringify(request.body),
        });
      } catch (error) {
        throw embeddingFailed(cfg, `request failed: ${describeError(error)}`, error);
      }
      if (!response.ok) {
        throw embeddingFailed(cfg, `request failed with status ${response.status}`);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw embeddingFailed(cfg, "response is not JSON", error);
      }
      const vector = readVector(cfg.provider, payload);
      if (!vector) {
        throw embeddingFailed(cfg, "response missing vector");
      }
      logger.debug(
        { subsystem: "embedding", provider: cfg.provider, dimension: vector.length },
        "embedding.embed: done",
      );
      return vector;
    },
  };
}

function buildRequest(cfg: EmbeddingConfig, input: string): EmbeddingRequest {
  if (cfg.provider === "openai") {
    if (!cfg.openai.apiKey) {
      throw embeddingFailed(cfg, "openai embedding requires apiKey");
    }
    return {
      url: cfg.openai.endpoint,
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${cfg.openai.apiKey}`,
      },
      body: { model: cfg.openai.model, input },
    };
  }
  return {
    url: `${cfg.ollama.endpoint.replace(/\/+$/, "")}/api/embeddings`,
    headers: { "content-type": "application/json" },
    body: { model: cfg.ollama.model, prompt: input },
  };
}

const vectorSchema = z.array(z.number().finite()).min(1);

const openAiResponseSchema = z.object({
  data: z.array(z.object({ embedding: vectorSchema })).min(1),
});

const ollamaResponseSchema = z.object({ embedding: vectorSchema });

function readVector(provider: EmbeddingConfig["provider"], payload: unknown): number[] | null {
  if (provider === "openai") {
    const parsed = openAiResponseSchema.safeParse(payload);
    return parsed.success ? (parsed.data.data[0]?.embedding ?? null) : null;
  }
  const parsed = ollamaResponseSchema.safeParse(payload);
  return parsed.success ? parsed.data.embedding : null;
}

function embeddingFailed(cfg: EmbeddingConfig, detail: string, cause?: unknown) {
  return new StoreError("EmbeddingFailed", `embedding failed (${cfg.provider}): ${detail}`, {
    cause,
    context: { provider: cfg.provider, model: getEmbeddingProviderModel(cfg) },
  });
}
