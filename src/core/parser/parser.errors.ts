import { describeError, StoreError } from "../errors/store.errors";

export function extractionFailed(path: string, cause: unknown) {
  return new StoreError("ExtractionFailed", `could not extract text from ${path}: ${describeError(cause)}`, {
    cause,
    context: { path },
  });
}

export function unsupportedFileType(path: string, ext: string) {
  return new StoreError("UnsupportedFileType", `unsupported file type "${ext}": ${path}`, {
    context: { path, ext },
  });
}
