import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage } from "./logger";
import type { Article } from "./types";

export class ArticleSourceError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "ArticleSourceError";
  }
}

const text = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const articleSchema = z.object({
  title: text,
  content: text,
  url: text,
  timestamp: z
    .union([z.array(z.string()), z.string()])
    .nullish()
    .transform((v) => (v == null ? [] : typeof v === "string" ? [v] : v)),
});

const batchSchema = z.array(articleSchema);

export function parseArticles(raw: unknown): Article[] {
  return batchSchema.parse(raw).map((a) =>
    Object.freeze({
      title: a.title,
      content: a.content,
      url: a.url,
      timestamp: Object.freeze([...a.timestamp]),
    })
  );
}

export async function loadArticles(path: string): Promise<Article[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ArticleSourceError(`Cannot read articles from ${path}: ${errorMessage(error)}`, path);
  }

  const result = z.array(z.unknown()).safeParse(raw);
  if (!result.success) {
    throw new ArticleSourceError(`Expected a JSON array of articles in ${path}`, path);
  }

  try {
    return parseArticles(raw);
  } catch (error) {
    throw new ArticleSourceError(`Invalid article record in ${path}: ${errorMessage(error)}`, path);
  }
}
