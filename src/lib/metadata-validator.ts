// ---------------------------------------------------------------------------
// Attestation checks for model-proposed metadata
// ---------------------------------------------------------------------------
// The proposal is untrusted. A field survives only if part of it occurs
// verbatim (case-insensitive) in the release text; anything else becomes "NA".
// ---------------------------------------------------------------------------

import { logger } from "./logger";
import { collapseWhitespace } from "./text-utils";
import {
  NA,
  type DealMetadata,
  type DealMetadataProposal,
  type OrgField,
  type PersonField,
  type ProposalField,
  type RoleField,
} from "./types";

const ORG_FIELDS: readonly OrgField[] = ["investorOrPe", "advisorFirm", "buyer", "seller"];
const PERSON_FIELDS: readonly PersonField[] = ["buyerLeadName", "investorLeadName", "sellerLeadName"];
const ROLE_FIELDS: readonly RoleField[] = ["buyerLeadRole", "investorLeadRole", "sellerLeadRole"];

const ORG_SEPARATORS = /&|,|\/| and /;
const ROLE_SEPARATORS = /[\s/&,-]+/;
const MIN_TOKEN_LENGTH = 3;

export function normalizeContent(content: string): string {
  return collapseWhitespace(content).toLowerCase();
}

// "Blackstone & KKR" survives if either firm is mentioned
export function validateOrg(name: string, contentNorm: string): string {
  if (name === NA) return NA;
  const parts = name
    .split(ORG_SEPARATORS)
    .map((p) => p.trim())
    .filter(Boolean);
  return parts.some((p) => contentNorm.includes(p.toLowerCase())) ? name : NA;
}

export function validatePerson(name: string, contentNorm: string): string {
  if (name === NA) return NA;
  const tokens = name.split(/\s+/).filter((t) => t.length >= MIN_TOKEN_LENGTH);
  return tokens.some((t) => contentNorm.includes(t.toLowerCase())) ? name : NA;
}

export function validateRole(role: string, contentNorm: string): string {
  if (role === NA) return NA;
  const tokens = role.split(ROLE_SEPARATORS).filter((t) => t.length >= MIN_TOKEN_LENGTH);
  return tokens.some((t) => contentNorm.includes(t.toLowerCase())) ? role : NA;
}

export function validateProposal(
  proposal: DealMetadataProposal,
  content: string
): DealMetadataProposal {
  const contentNorm = normalizeContent(content);
  const validated: Record<ProposalField, string> = { ...proposal };

  for (const field of ORG_FIELDS) validated[field] = validateOrg(proposal[field], contentNorm);
  for (const field of PERSON_FIELDS) validated[field] = validatePerson(proposal[field], contentNorm);
  for (const field of ROLE_FIELDS) validated[field] = validateRole(proposal[field], contentNorm);

  const rejected = [...ORG_FIELDS, ...PERSON_FIELDS, ...ROLE_FIELDS].filter(
    (f) => proposal[f] !== NA && validated[f] === NA
  );
  if (rejected.length > 0) {
    logger.debug("Rejected unattested metadata", {
      fields: rejected.map((f) => `${f}=${proposal[f]}`),
    });
  }

  return validated;
}

/**
 * Single advisor label: investor, then advisory firm, then buyer, then seller.
 */
export function resolveDealAdvisor(
  fields: Pick<DealMetadataProposal, "investorOrPe" | "advisorFirm" | "buyer" | "seller">
): string {
  const candidates = [fields.investorOrPe, fields.advisorFirm, fields.buyer, fields.seller];
  return candidates.find((v) => v !== NA) ?? NA;
}

export function toDealMetadata(validated: DealMetadataProposal): DealMetadata {
  return {
    dealAdvisor: resolveDealAdvisor(validated),
    investorOrPe: validated.investorOrPe,
    buyer: validated.buyer,
    seller: validated.seller,
    buyerLeadName: validated.buyerLeadName,
    buyerLeadRole: validated.buyerLeadRole,
    investorLeadName: validated.investorLeadName,
    investorLeadRole: validated.investorLeadRole,
    sellerLeadName: validated.sellerLeadName,
    sellerLeadRole: validated.sellerLeadRole,
  };
}
