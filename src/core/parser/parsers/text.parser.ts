import type { Parser } from "../parser.types";
import { readFile } from "node:fs/promises";
import { extractionFailed } from "../parser.errors";

const BOM = "\uFEFF";

export const textParser: Parser = {
  id: "text",
  async extract(path) {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      throw extractionFailed(path, error);
    }
    return text.startsWith(BOM) ? text.slice(BOM.length) : text;
  },
};
