import { readFile } from "node:fs/promises";
import { PDFParse } from "pdf-parse";
import type { Parser } from "../parser.types";
import { extractionFailed } from "../parser.errors";

export const pdfParser: Parser = {
  id: "pdf",
  async extract(path) {
    try {
      const data = await readFile(path);
      const parser = new PDFParse({ data });
      try {
        const result = await parser.getText();
        return result.text || "";
      } finally {
        await parser.destroy();
      }
    } catch (error) {
      throw extractionFailed(path, error);
    }
  },
};
