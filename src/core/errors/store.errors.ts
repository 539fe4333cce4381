export type StoreErrorKind =
  | "DimensionMismatch"
  | "NotFound"
  | "DuplicateKey"
  | "IngestionFailed"
  | "EmbeddingFailed"
  | "ExtractionFailed"
  | "UnsupportedFileType"
  | "InvalidConfig"
  | "InconsistentStoreState"
  | "AnswerFailed";

export type StoreErrorContext = Record<string, string | number | boolean | null | string[]>;

/**
 * Every failure the store reports. Callers branch on `kind`.
 */
export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly context: StoreErrorContext;

  constructor(
    kind: StoreErrorKind,
    message: string,
    opts?: { cause?: unknown; context?: StoreErrorContext },
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "StoreError";
    this.kind = kind;
    this.context = opts?.context ?? {};
  }
}

export function isStoreError(error: unknown, kind?: StoreErrorKind): error is StoreError {
  if (!(error instanceof StoreError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function dimensionMismatch(expected: number, actual: number, where: string) {
  return new StoreError(
    "DimensionMismatch",
    `${where}: expected vector of dimension ${expected}, got ${actual}`,
    { context: { expected, actual, where } },
  );
}

export function notFound(entity: "document" | "chunk", id: string) {
  return new StoreError("NotFound", `${entity} not found: ${id}`, { context: { entity, id } });
}

export function duplicateKey(entity: string, key: string, cause?: unknown) {
  return new StoreError("DuplicateKey", `${entity} already exists: ${key}`, {
    cause,
    context: { entity, key },
  });
}

export function invalidConfig(errors: string[], cause?: unknown) {
  return new StoreError("InvalidConfig", `invalid configuration: ${errors.join("; ")}`, {
    cause,
    context: { errors },
  });
}

export function inconsistentStoreState(detail: string, context?: StoreErrorContext) {
  return new StoreError("InconsistentStoreState", `store is inconsistent: ${detail}`, { context });
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function ingestionFailed(detail: string, cause: unknown, context?: StoreErrorContext) {
  return new StoreError("IngestionFailed", `ingestion failed: ${detail}`, { cause, context });
}
