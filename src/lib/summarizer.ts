// ---------------------------------------------------------------------------
// Deterministic summary straight from the release text (no model involved)
// ---------------------------------------------------------------------------

import { collapseWhitespace } from "./text-utils";

// "/PRNewswire/", "(PRNewswire)", "(BUSINESS WIRE)", "/GLOBE NEWSWIRE/"
const WIRE_MARKER = /[/(](?:PRNewswire|BUSINESS WIRE|GLOBE NEWSWIRE)(?:-[A-Z]+)?[/)]?/i;
const ELLIPSIS = "...";

// Sentence boundary: terminal punctuation followed by whitespace
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

/**
 * Drops the dateline and wire attribution ("NEW YORK, Nov. 3, 2025 /PRNewswire/ --")
 * so only the release body remains.
 */
export function stripWireBoilerplate(content: string): string {
  const text = collapseWhitespace(content);
  const marker = WIRE_MARKER.exec(text);
  if (!marker) return text;

  const dashIdx = text.indexOf("--", marker.index);
  if (dashIdx !== -1) return text.slice(dashIdx + 2).trim();
  return text.slice(marker.index + marker[0].length).trim();
}

export function simpleSummary(content: string, maxChars = 400): string {
  const core = stripWireBoilerplate(content);
  if (!core) return "";

  let summary = core.split(SENTENCE_BREAK).slice(0, 2).join(" ").trim();
  if (summary.length > maxChars) {
    let short = summary.slice(0, maxChars);
    const lastSpace = short.lastIndexOf(" ");
    if (lastSpace > 0) short = short.slice(0, lastSpace);
    summary = short + ELLIPSIS;
  }
  return summary;
}
