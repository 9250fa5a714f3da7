import { logger } from "./logger";
import type { TextGenerator } from "./text-generator";
import { truncateForModel } from "./text-utils";
import { NA, type DealMetadataProposal, type PipelineConfig } from "./types";

export const METADATA_PROMPT_TEMPLATE = `You are an M&A analyst. Read the press release below and identify the key firms and their senior representatives.

Return ONLY a JSON object with exactly this shape:

{
  "investor_or_pe": "...",
  "buyer": "...",
  "seller": "...",
  "advisor_firm": "...",
  "buyer_lead_name": "...",
  "buyer_lead_role": "...",
  "investor_lead_name": "...",
  "investor_lead_role": "...",
  "seller_lead_name": "...",
  "seller_lead_role": "..."
}

Definitions:
- "investor_or_pe": private equity or VC firm(s); join several with " & ".
- "buyer": acquiring company; join several with " & ".
- "seller": target company; join several with " & ".
- "advisor_firm": investment bank or advisory firm(s); join several with " & ".
- "buyer_lead_name": main quoted executive of the buyer (CEO, Founder, Managing Director, ...).
- "investor_lead_name": main quoted executive of the investor (if any).
- "seller_lead_name": main quoted executive of the seller or target (if any).
- "*_lead_role": that person's role EXACTLY as written in the text ("CEO", "Partner",
  "Founder & CEO", "Managing Partner").

Rules:
- Never upgrade or relabel a role: if the text says "Partner", answer "Partner", not "CEO".
- Values are short names or titles only: no sentences, no labels like "CEO of", no company names mixed into roles.
- If a value is not clearly available, or you are unsure, use "NA".

Press release:
"""{{content}}"""`;

export function buildMetadataPrompt(content: string): string {
  return METADATA_PROMPT_TEMPLATE.replace("{{content}}", () => content);
}

export function cleanValue(value: unknown): string {
  if (typeof value !== "string") return NA;
  const trimmed = value.trim();
  return trimmed ? trimmed : NA;
}

// Maps the snake_case keys of the answer onto proposal fields
function toProposal(read: (key: string) => unknown): DealMetadataProposal {
  return {
    investorOrPe: cleanValue(read("investor_or_pe")),
    buyer: cleanValue(read("buyer")),
    seller: cleanValue(read("seller")),
    advisorFirm: cleanValue(read("advisor_firm")),
    buyerLeadName: cleanValue(read("buyer_lead_name")),
    buyerLeadRole: cleanValue(read("buyer_lead_role")),
    investorLeadName: cleanValue(read("investor_lead_name")),
    investorLeadRole: cleanValue(read("investor_lead_role")),
    sellerLeadName: cleanValue(read("seller_lead_name")),
    sellerLeadRole: cleanValue(read("seller_lead_role")),
  };
}

export function emptyProposal(): DealMetadataProposal {
  return toProposal(() => NA);
}

/**
 * Reads the JSON object out of a model answer. Takes everything from the first
 * "{" to the last "}", which also skips code fences and chatter around it.
 * Returns null when there is no parseable object.
 */
export function parseProposalResponse(text: string): DealMetadataProposal | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;

  const data = new Map<string, unknown>(Object.entries(parsed));
  return toProposal((key) => data.get(key));
}

/**
 * Asks the model for parties and executives. The answer is untrusted and must
 * go through validateProposal before use.
 */
export async function proposeDealMetadata(
  generator: TextGenerator,
  content: string,
  config: PipelineConfig,
  signal?: AbortSignal
): Promise<DealMetadataProposal> {
  if (!content) return emptyProposal();

  const prompt = buildMetadataPrompt(truncateForModel(content, config.maxCharsForAi));
  const result = await generator.generate(prompt, { timeoutMs: config.llmTimeoutMs, signal });
  if (!result.ok) {
    logger.warn("Metadata generation failed", { generator: generator.name, error: result.error });
    return emptyProposal();
  }

  const proposal = parseProposalResponse(result.text);
  if (!proposal) {
    logger.warn("Metadata response has no JSON object", {
      generator: generator.name,
      response: result.text.slice(0, 200),
    });
    return emptyProposal();
  }
  return proposal;
}
