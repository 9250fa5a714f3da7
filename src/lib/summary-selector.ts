import { generateDealSummary } from "./llm-summarizer";
import { simpleSummary } from "./summarizer";
import type { TextGenerator } from "./text-generator";
import type { Article, PipelineConfig } from "./types";

const TOKEN_TRIM = /^[\s,.&()/-]+|[\s,.&()/-]+$/g;
const MIN_TITLE_TOKEN_LENGTH = 4;

export function titleTokens(title: string): string[] {
  return title
    .split(/\s+/)
    .map((t) => t.replace(TOKEN_TRIM, ""))
    .filter((t) => t.length >= MIN_TITLE_TOKEN_LENGTH);
}

/**
 * Topic-drift guard for generated summaries: a single significant title word
 * appearing in the summary is enough.
 */
export function summaryMatchesTitle(summary: string, title: string): boolean {
  if (!summary || !title) return false;

  const summaryLower = summary.toLowerCase();
  return titleTokens(title).some((t) => summaryLower.includes(t.toLowerCase()));
}

export async function selectContext(
  generator: TextGenerator,
  article: Pick<Article, "title" | "content">,
  prettyDate: string,
  config: PipelineConfig,
  signal?: AbortSignal
): Promise<string> {
  const { title, content } = article;

  if (content) {
    const generated = await generateDealSummary(generator, content, prettyDate, config, signal);
    if (generated && summaryMatchesTitle(generated, title)) return generated;
  }

  return simpleSummary(content, config.summaryMaxChars);
}
