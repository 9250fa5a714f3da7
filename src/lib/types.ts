// Sentinel for "value unknown or unverified". Distinct from "".
export const NA = "NA";

// Raw press-release record as read from the batch source
export type Article = {
  readonly title: string;
  readonly content: string;
  readonly url: string;
  readonly timestamp: readonly string[];
};

export type OrgField = "investorOrPe" | "advisorFirm" | "buyer" | "seller";
export type PersonField = "buyerLeadName" | "investorLeadName" | "sellerLeadName";
export type RoleField = "buyerLeadRole" | "investorLeadRole" | "sellerLeadRole";
export type ProposalField = OrgField | PersonField | RoleField;

// Ten fields proposed by the model and, after validation, attested in the source
export type DealMetadataProposal = Readonly<Record<ProposalField, string>>;

export type DealMetadata = {
  readonly dealAdvisor: string;
  readonly investorOrPe: string;
  readonly buyer: string;
  readonly seller: string;
  readonly buyerLeadName: string;
  readonly buyerLeadRole: string;
  readonly investorLeadName: string;
  readonly investorLeadRole: string;
  readonly sellerLeadName: string;
  readonly sellerLeadRole: string;
};

export type EnrichedDeal = Article &
  DealMetadata & {
    readonly prettyDate: string;
    readonly context: string;
    readonly dealValue: string;
  };

// Pipeline constants passed explicitly into every enrichment call
export type PipelineConfig = {
  readonly model: string;
  readonly maxCharsForAi: number;
  readonly summaryMaxChars: number;
  readonly llmTimeoutMs: number;
  readonly concurrency: number;
};

export type EnrichmentFailure = {
  index: number;
  url: string;
  reason: "aborted" | "error";
  errorMessage?: string;
};

export type BatchResult = {
  deals: EnrichedDeal[];
  failures: EnrichmentFailure[];
  durationMs: number;
};

// Issue identifier handed to the renderer
export type IssueInfo = {
  issueDate: string;
  issueNumber: string;
};

export type DeliveryStats = {
  success: number;
  failed: number;
  total: number;
};
