import { logger } from "./logger";
import type { TextGenerator } from "./text-generator";
import { truncateForModel } from "./text-utils";
import type { PipelineConfig } from "./types";

export const SUMMARY_PROMPT_TEMPLATE = `You are an M&A and corporate development analyst writing for a professional deals newsletter.

Write ONE concise news-style summary of the press release below.

CONTEXT (not for display):
- The announcement date is: {{date}}
- The date is shown separately in the newsletter layout.

STRUCTURE:
- Exactly 2 or 3 sentences in total.
- Do NOT begin with a date such as "{{date}}," or "Nov 3, 2025".
- Start the first sentence with the buyer or lead company name where possible,
  e.g. "Altimetrik completed the acquisition of SLK Software, creating ...".
- First sentence: classify the transaction (acquisition, strategic investment, merger,
  buyback, joint venture, ...) and name the key parties and the sector.
- Remaining sentence(s): scale (employees, countries, customers, segments) and
  strategic rationale (new markets, capabilities, verticals, efficiency, liquidity).

NUMBERS:
- Mention a financial amount (e.g. "USD 240 million") ONLY if that value is stated in the text.
- Never invent or approximate a number and never write placeholders like "$X million".

STYLE:
- Analytical and concise; no hype or marketing adjectives.
- Do not mention "/PRNewswire/", datelines, cities, or "according to the press release".
- Plain prose only: no bullet points, headings or markup.

Press release:
"""{{content}}"""`;

export function buildSummaryPrompt(content: string, date: string): string {
  const shownDate = date || "unknown";
  return SUMMARY_PROMPT_TEMPLATE.replaceAll("{{date}}", () => shownDate).replace(
    "{{content}}",
    () => content
  );
}

/**
 * Stylized 2-3 sentence summary from the model, or "" when the call fails.
 */
export async function generateDealSummary(
  generator: TextGenerator,
  content: string,
  prettyDate: string,
  config: PipelineConfig,
  signal?: AbortSignal
): Promise<string> {
  if (!content) return "";

  const prompt = buildSummaryPrompt(truncateForModel(content, config.maxCharsForAi), prettyDate);
  const result = await generator.generate(prompt, { timeoutMs: config.llmTimeoutMs, signal });
  if (!result.ok) {
    logger.warn("Summary generation failed, using fallback", {
      generator: generator.name,
      error: result.error,
    });
    return "";
  }
  return result.text.trim();
}
