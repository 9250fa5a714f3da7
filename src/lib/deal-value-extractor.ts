// ---------------------------------------------------------------------------
// Deal value from the release text (no model involved)
// ---------------------------------------------------------------------------
// First match wins: the leftmost currency amount in the text is taken as the
// deal value. There is no attempt to find the largest or most prominent one.
// ---------------------------------------------------------------------------

import { collapseWhitespace } from "./text-utils";
import { NA } from "./types";

const CURRENCY_MARKER = String.raw`USD|US\$|C\$|\$|EUR|€|GBP|£|CAD|INR|Rs\.?`;
const NUMBER = String.raw`[0-9][0-9,]*(?:\.\d+)?`;
// The suffix must end the word so "$5 more" does not read as "$5 m"
const MAGNITUDE = String.raw`(?:(?:million|billion|bn|mn|m|b)(?![a-z]))?`;

// Letter markers must start a word so "customers 5,000" is not read as "Rs 5,000"
const DEAL_VALUE_PATTERN = new RegExp(
  String.raw`(?<![a-z])(${CURRENCY_MARKER})\s*${NUMBER}\s*${MAGNITUDE}`,
  "i"
);

// "$" and "US$" both mean US dollars; other markers are kept as written
function normalizeCurrency(marker: string): string {
  return marker === "$" || marker.toUpperCase() === "US$" ? "USD " : marker;
}

export function extractDealValue(content: string): string {
  if (!content) return NA;

  const match = collapseWhitespace(content).match(DEAL_VALUE_PATTERN);
  if (!match) return NA;

  const [matched, marker] = match;
  return collapseWhitespace(normalizeCurrency(marker) + matched.slice(marker.length));
}
