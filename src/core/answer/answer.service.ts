import { z } from "zod";
import { describeError, StoreError } from "../errors/store.errors";
import type { SearchHit } from "../database/vector.database.types";
import { createLoggerService } from "../logger/logger.service";
import type {
  AnswerService,
  AnswerServiceDeps,
  ChatCompletionMessage,
} from "./answer.service.types";

export function createAnswerService(deps: AnswerServiceDeps): AnswerService {
  const fetchImpl = deps.fetchImpl ?? fetch;
  const logger = deps.logger ?? createLoggerService({ name: "embedstore" });

  return {
    async generateAnswer(query: string, hits: SearchHit[]) {
      const cfg = deps.config.getChatConfig();
      const apiKey = cfg.apiKey.trim();
      if (!apiKey) {
        throw answerFailed("chat apiKey is missing");
      }
      const messages = buildMessages(cfg.systemPrompt, query, hits);
      logger.debug(
        { subsystem: "answer", model: cfg.model, hits: hits.length },
        "answer.generate: start",
      );

      let response: Response;
      try {
        response = await fetchImpl(cfg.endpoint, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({
            model: cfg.model,
            messages,
            temperature: cfg.temperature,
            max_tokens: cfg.maxTokens,
            top_p: cfg.topP,
            frequency_penalty: cfg.frequencyPenalty,
            presence_penalty: cfg.presencePenalty,
            stream: false,
          }),
        });
      } catch (error) {
        throw answerFailed(`chat request failed: ${describeError(error)}`, error);
      }
      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw answerFailed(`chat request failed (${response.status}): ${detail}`);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw answerFailed("chat response is not JSON", error);
      }
      const content = readAnswer(payload);
      if (content === null) {
        throw answerFailed("chat response has no message content");
      }
      logger.debug({ subsystem: "answer", chars: content.length }, "answer.generate: done");
      return content.trim();
    },
  };
}

export function buildMessages(
  systemPrompt: string,
  query: string,
  hits: SearchHit[],
): ChatCompletionMessage[] {
  const context =
    hits.length === 0
      ? "(no matching documents)"
      : hits
          .map((hit, i) => `[${i + 1}] ${hit.document.title}\n${hit.chunk.text}`)
          .join("\n\n");
  return [
    { role: "system", content: systemPrompt },
    { role: "user", content: `Documents:\n\n${context}\n\nQuestion: ${query}` },
  ];
}

const chatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
});

function readAnswer(payload: unknown): string | null {
  const parsed = chatCompletionSchema.safeParse(payload);
  return parsed.success ? (parsed.data.choices[0]?.message.content ?? null) : null;
}

function answerFailed(detail: string, cause?: unknown) {
  return new StoreError("AnswerFailed", `answer generation failed: ${detail}`, { cause });
}
