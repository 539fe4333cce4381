import { marked, type Token } from "marked";
import type { Parser } from "../parser.types";
import { textParser } from "./text.parser";

const HTML_TAG = /<[^>]*>/g;

export const markdownParser: Parser = {
  id: "markdown",
  async extract(path) {
    return markdownToPlainText(await textParser.extract(path));
  },
};

/**
 * Rendered text of a Markdown document: one line per block, markup, link
 * targets, images and HTML tags dropped.
 */
export function markdownToPlainText(markdown: string) {
  const lines = blockLines(marked.lexer(markdown, { gfm: true }));
  return lines.filter((line) => line.length > 0).join("\n");
}

function blockLines(tokens: readonly Token[]): string[] {
  const lines: string[] = [];
  for (const token of tokens) {
    switch (token.type) {
      case "heading":
      case "paragraph":
        lines.push(inlineText(token.tokens));
        break;
      case "text":
        lines.push(token.tokens ? inlineText(token.tokens) : token.text);
        break;
      case "code":
        lines.push(token.text);
        break;
      case "blockquote":
        lines.push(...blockLines(token.tokens));
        break;
      case "list":
        for (const item of token.items) {
          lines.push(...blockLines(item.tokens));
        }
        break;
      case "table":
        lines.push(token.header.map((cell) => inlineText(cell.tokens)).join(" "));
        for (const row of token.rows) {
          lines.push(row.map((cell) => inlineText(cell.tokens)).join(" "));
        }
        break;
      case "html":
        lines.push(token.text.replace(HTML_TAG, "").trim());
        break;
      default:
        break;
    }
  }
  return lines;
}

function inlineText(tokens: readonly Token[]): string {
  let out = "";
  for (const token of tokens) {
    switch (token.type) {
      case "text":
        out += token.tokens ? inlineText(token.tokens) : token.text;
        break;
      case "codespan":
      case "escape":
        out += token.text;
        break;
      case "strong":
      case "em":
      case "del":
      case "link":
        out += inlineText(token.tokens);
        break;
      case "br":
        out += "\n";
        break;
      default:
        break;
    }
  }
  return out;
}
