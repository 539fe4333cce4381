import type { ChatConfig } from "../config/config.types";
import type { SearchHit } from "../database/vector.database.types";
import type { LoggerService } from "../logger/logger.service.types";

export type AnswerServiceDeps = {
  config: {
    getChatConfig: () => ChatConfig;
  };
  fetchImpl?: typeof fetch;
  logger?: LoggerService;
};

export type ChatCompletionMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type AnswerService = {
  generateAnswer: (query: string, hits: SearchHit[]) => Promise<string>;
};
