import * as cheerio from "cheerio";
import { NA, type EnrichedDeal, type IssueInfo } from "./types";

// ---------------------------------------------------------------------------
// Deal block
// ---------------------------------------------------------------------------

const DEAL_BLOCK_TEMPLATE = `<div class="deal-block">
  <div class="deal-title-main">
    <a target="_blank" style="color: #000; text-decoration: none;"></a>
  </div>
  <div class="deal-meta-row">
    <div class="deal-meta-left"></div>
    <div class="deal-meta-center"><span class="deal-meta-label">Deal Advisor:</span> <span class="deal-meta-value deal-advisor"></span></div>
    <div class="deal-meta-right"><span class="deal-meta-label">Deal Value:</span> <span class="deal-meta-value deal-value"></span></div>
  </div>
  <div class="deal-body"></div>
</div>`;

function leadLabel(org: string, name: string, role: string): string {
  let label = `${org} – ${name}`;
  if (role !== NA) label += ` (${role})`;
  return label;
}

/**
 * Footer labels naming who led each side, e.g. "Acme Corp – Jane Doe (CEO)".
 * An investor without a named lead still gets "Investor – {firm}".
 */
export function leadershipLabels(deal: EnrichedDeal): string[] {
  const labels: string[] = [];

  if (deal.buyer !== NA && deal.buyerLeadName !== NA) {
    labels.push(leadLabel(deal.buyer, deal.buyerLeadName, deal.buyerLeadRole));
  }

  if (deal.investorOrPe !== NA) {
    labels.push(
      deal.investorLeadName !== NA
        ? leadLabel(deal.investorOrPe, deal.investorLeadName, deal.investorLeadRole)
        : `Investor – ${deal.investorOrPe}`
    );
  }

  if (deal.seller !== NA && deal.sellerLeadName !== NA) {
    labels.push(leadLabel(deal.seller, deal.sellerLeadName, deal.sellerLeadRole));
  }

  return labels;
}

export function buildDealBlock(deal: EnrichedDeal): string {
  const $ = cheerio.load(DEAL_BLOCK_TEMPLATE, null, false);

  $(".deal-title-main a")
    .attr("href", deal.url || "#")
    .text(deal.title || "Untitled deal");
  $(".deal-meta-left").text(deal.prettyDate);
  $(".deal-advisor").text(deal.dealAdvisor);
  $(".deal-value").text(deal.dealValue);
  $(".deal-body").text(deal.context);

  const labels = leadershipLabels(deal);
  if (labels.length > 0) {
    const row = $('<div class="deal-footer-row"></div>');
    for (const label of labels) {
      row.append($('<div class="deal-footer-item"></div>').text(label));
    }
    $(".deal-block").append(row);
  }

  return $.html();
}

// ---------------------------------------------------------------------------
// Issue document and plain context projection
// ---------------------------------------------------------------------------

export function buildNewsletterHtml(
  deals: readonly EnrichedDeal[],
  template: string,
  issue: IssueInfo
): string {
  const blocks = deals.map(buildDealBlock).join("\n");
  return template
    .replaceAll("{{ISSUE_DATE}}", () => issue.issueDate)
    .replaceAll("{{ISSUE_NUMBER}}", () => issue.issueNumber)
    .replaceAll("{{DEAL_BLOCKS}}", () => blocks);
}

export function buildContextEntry(deal: Pick<EnrichedDeal, "url" | "context">): string {
  return `${deal.url}\n\n${deal.context}\n\n`;
}

export function buildContextsText(deals: readonly EnrichedDeal[]): string {
  return deals
    .filter((d) => d.url)
    .map(buildContextEntry)
    .join("");
}
