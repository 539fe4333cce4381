import type { Logger } from "pino";

export type LoggerService = Pick<Logger, "debug" | "info" | "warn" | "error">;
