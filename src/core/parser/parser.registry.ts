import { extname } from "node:path";
import type { Parser, ParserMeta } from "./parser.types";
import { unsupportedFileType } from "./parser.errors";
import { markdownParser } from "./parsers/markdown.parser";
import { pdfParser } from "./parsers/pdf.parser";
import { textParser } from "./parsers/text.parser";

const unsupportedParser: Parser = {
  id: "unsupported",
  async extract(path) {
    throw unsupportedFileType(path, extname(path) || "(none)");
  },
};

export function resolveParser(meta: ParserMeta): Parser {
  const ext = meta.ext?.toLowerCase();
  if (ext === ".md" || ext === ".markdown" || meta.mime === "text/markdown") {
    return markdownParser;
  }

  if (ext === ".txt" || meta.mime === "text/plain") {
    return textParser;
  }

  if (ext === ".pdf" || meta.mime === "application/pdf") {
    return pdfParser;
  }

  return unsupportedParser;
}

export function resolveParserForPath(path: string): Parser {
  return resolveParser({ ext: extname(path) });
}
