import { describe, it, expect } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "@/lib/config";
import {
  buildMetadataPrompt,
  cleanValue,
  emptyProposal,
  parseProposalResponse,
  proposeDealMetadata,
} from "@/lib/llm-deal-metadata";
import { StubGenerator, failing, text } from "../utils/stub-generator";

const config = DEFAULT_PIPELINE_CONFIG;

describe("cleanValue", () => {
  it("trims strings and maps blanks and non-strings to NA", () => {
    expect(cleanValue("  Acme Corp ")).toBe("Acme Corp");
    expect(cleanValue("   ")).toBe("NA");
    expect(cleanValue("")).toBe("NA");
    expect(cleanValue(undefined)).toBe("NA");
    expect(cleanValue(42)).toBe("NA");
  });
});

describe("parseProposalResponse", () => {
  it("reads the object out of surrounding chatter and code fences", () => {
    const raw = [
      "Here is the JSON:",
      "```json",
      '{"buyer": "Acme Corp", "seller": "Foo Inc", "buyer_lead_name": "Jane Doe", "buyer_lead_role": "CEO"}',
      "```",
    ].join("\n");

    expect(parseProposalResponse(raw)).toEqual({
      investorOrPe: "NA",
      buyer: "Acme Corp",
      seller: "Foo Inc",
      advisorFirm: "NA",
      buyerLeadName: "Jane Doe",
      buyerLeadRole: "CEO",
      investorLeadName: "NA",
      investorLeadRole: "NA",
      sellerLeadName: "NA",
      sellerLeadRole: "NA",
    });
  });

  it("spans from the first opening to the last closing brace", () => {
    const raw = '{"advisor_firm": "Lazard"} trailing note with a brace }';
    expect(parseProposalResponse(raw)).toBeNull();
  });

  it("returns null for malformed JSON, arrays and missing objects", () => {
    expect(parseProposalResponse('{"buyer": "Acme",}')).toBeNull();
    expect(parseProposalResponse("no json at all")).toBeNull();
    expect(parseProposalResponse('["buyer"] }')).toBeNull();
  });

  it("keeps roles verbatim", () => {
    const proposal = parseProposalResponse('{"investor_lead_role": "Partner"}');
    expect(proposal?.investorLeadRole).toBe("Partner");
  });
});

describe("buildMetadataPrompt", () => {
  it("asks for every proposal key", () => {
    const prompt = buildMetadataPrompt("Body text.");
    for (const key of [
      "investor_or_pe",
      "buyer",
      "seller",
      "advisor_firm",
      "buyer_lead_name",
      "buyer_lead_role",
      "investor_lead_name",
      "investor_lead_role",
      "seller_lead_name",
      "seller_lead_role",
    ]) {
      expect(prompt).toContain(`"${key}": "..."`);
    }
    expect(prompt).toContain('"""Body text."""');
  });
});

describe("proposeDealMetadata", () => {
  const content = "Acme Corp acquired Foo Inc. Jane Doe, CEO of Acme, said the deal expands reach.";

  it("returns the parsed proposal", async () => {
    const generator = new StubGenerator({
      metadata: text('{"buyer": "Acme Corp", "buyer_lead_name": " Jane Doe "}'),
    });
    const proposal = await proposeDealMetadata(generator, content, config);
    expect(proposal.buyer).toBe("Acme Corp");
    expect(proposal.buyerLeadName).toBe("Jane Doe");
    expect(proposal.seller).toBe("NA");
  });

  it("falls back to an all-NA proposal on transport failure", async () => {
    const generator = new StubGenerator({ metadata: failing });
    expect(await proposeDealMetadata(generator, content, config)).toEqual(emptyProposal());
  });

  it("falls back to an all-NA proposal on unparseable output", async () => {
    const generator = new StubGenerator({ metadata: text("I could not find any parties.") });
    expect(await proposeDealMetadata(generator, content, config)).toEqual(emptyProposal());
  });

  it("skips the call for empty content", async () => {
    const generator = new StubGenerator({ metadata: text("{}") });
    expect(await proposeDealMetadata(generator, "", config)).toEqual(emptyProposal());
    expect(generator.calls).toHaveLength(0);
  });

  it("sends the capped content with the configured timeout", async () => {
    const generator = new StubGenerator({ metadata: text("{}") });
    await proposeDealMetadata(generator, content, { ...config, maxCharsForAi: 9, llmTimeoutMs: 60_000 });
    expect(generator.calls[0].prompt).toContain('"""Acme Corp"""');
    expect(generator.calls[0].options.timeoutMs).toBe(60_000);
  });
});
