import { describe, it, expect } from "vitest";
import { emptyProposal } from "@/lib/llm-deal-metadata";
import {
  normalizeContent,
  resolveDealAdvisor,
  toDealMetadata,
  validateOrg,
  validatePerson,
  validateProposal,
  validateRole,
} from "@/lib/metadata-validator";
import type { DealMetadataProposal } from "@/lib/types";

const content = normalizeContent(
  "Blackstone agreed to buy Vega Labs from Orion   Partners. Mary-Ann Lee,\nManaging Director at Blackstone, led the deal; Goldman Sachs advised."
);

describe("validateOrg", () => {
  it("keeps a name that occurs in the content", () => {
    expect(validateOrg("Blackstone", content)).toBe("Blackstone");
  });

  it("keeps a joined name when any part is attested", () => {
    expect(validateOrg("KKR & Blackstone", content)).toBe("KKR & Blackstone");
    expect(validateOrg("Carlyle, Goldman Sachs", content)).toBe("Carlyle, Goldman Sachs");
    expect(validateOrg("Apollo and Orion Partners", content)).toBe("Apollo and Orion Partners");
  });

  it("rejects names with no attested part", () => {
    expect(validateOrg("Morgan Stanley", content)).toBe("NA");
    expect(validateOrg("KKR / Carlyle", content)).toBe("NA");
  });

  it("matches whole parts only, not individual words", () => {
    expect(validateOrg("Vega Holdings", content)).toBe("NA");
  });

  it("passes NA through", () => {
    expect(validateOrg("NA", content)).toBe("NA");
  });
});

describe("validatePerson", () => {
  it("keeps a name when a token longer than two characters is attested", () => {
    expect(validatePerson("Mary-Ann Lee", content)).toBe("Mary-Ann Lee");
    expect(validatePerson("John Lee", content)).toBe("John Lee");
  });

  it("ignores tokens of two characters or fewer", () => {
    expect(validatePerson("Al Li", content)).toBe("NA");
  });

  it("rejects invented names", () => {
    expect(validatePerson("Robert Smith", content)).toBe("NA");
  });
});

describe("validateRole", () => {
  it("keeps a role when one of its tokens is attested", () => {
    expect(validateRole("Managing Director", content)).toBe("Managing Director");
    expect(validateRole("Founder & Managing Partner", content)).toBe("Founder & Managing Partner");
  });

  it("splits on slashes, commas and hyphens", () => {
    expect(validateRole("CFO/Director", content)).toBe("CFO/Director");
    expect(validateRole("Vice-President", content)).toBe("NA");
  });

  it("rejects a role that is not in the text", () => {
    expect(validateRole("CEO", content)).toBe("NA");
  });
});

describe("validateProposal", () => {
  const proposal: DealMetadataProposal = {
    ...emptyProposal(),
    investorOrPe: "Blackstone",
    buyer: "Blackstone",
    seller: "Vega Labs",
    advisorFirm: "Evercore",
    investorLeadName: "Mary-Ann Lee",
    investorLeadRole: "Managing Director",
    sellerLeadName: "Tom Hardy",
    sellerLeadRole: "CEO",
  };

  it("downgrades every unattested field to NA", () => {
    const validated = validateProposal(proposal, content);
    expect(validated).toEqual({
      investorOrPe: "Blackstone",
      buyer: "Blackstone",
      seller: "Vega Labs",
      advisorFirm: "NA",
      buyerLeadName: "NA",
      buyerLeadRole: "NA",
      investorLeadName: "Mary-Ann Lee",
      investorLeadRole: "Managing Director",
      sellerLeadName: "NA",
      sellerLeadRole: "NA",
    });
  });

  it("leaves only values with a token attested in the content", () => {
    const rawContent = "Zeta Corp bought Eta AG. Partner Ann Kim commented.";
    const validated = validateProposal(
      {
        ...emptyProposal(),
        buyer: "Zeta Corp",
        seller: "Theta GmbH",
        investorLeadName: "Ann Kim",
        investorLeadRole: "Partner",
        buyerLeadRole: "Chief Executive",
      },
      rawContent
    );
    const lower = rawContent.toLowerCase();
    for (const value of Object.values(validated)) {
      if (value === "NA") continue;
      const tokens = value.split(/[\s/&,-]+/).filter((t) => t.length > 2);
      expect(tokens.some((t) => lower.includes(t.toLowerCase()))).toBe(true);
    }
    expect(validated.seller).toBe("NA");
    expect(validated.buyerLeadRole).toBe("NA");
  });
});

describe("resolveDealAdvisor", () => {
  const none = { investorOrPe: "NA", advisorFirm: "NA", buyer: "NA", seller: "NA" };

  it("prefers the investor", () => {
    expect(resolveDealAdvisor({ ...none, investorOrPe: "KKR", advisorFirm: "Lazard" })).toBe("KKR");
  });

  it("falls through to the advisory firm when there is no investor", () => {
    expect(resolveDealAdvisor({ ...none, advisorFirm: "Goldman", buyer: "Acme" })).toBe("Goldman");
  });

  it("falls through to buyer, then seller", () => {
    expect(resolveDealAdvisor({ ...none, buyer: "Acme", seller: "Foo" })).toBe("Acme");
    expect(resolveDealAdvisor({ ...none, seller: "Foo" })).toBe("Foo");
  });

  it("is NA when nothing survived validation", () => {
    expect(resolveDealAdvisor(none)).toBe("NA");
  });
});

describe("toDealMetadata", () => {
  it("adds the resolved advisor to the validated fields", () => {
    const metadata = toDealMetadata({ ...emptyProposal(), buyer: "Acme", advisorFirm: "Goldman" });
    expect(metadata.dealAdvisor).toBe("Goldman");
    expect(metadata.buyer).toBe("Acme");
    expect(metadata.sellerLeadRole).toBe("NA");
  });
});
