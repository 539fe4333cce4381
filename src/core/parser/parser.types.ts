export type ParserId = "markdown" | "text" | "pdf" | "unsupported";

export type Parser = {
  id: ParserId;
  extract: (path: string) => Promise<string>;
};

export type ParserMeta = {
  ext?: string;
  mime?: string;
};
