import { collapseWhitespace } from "./text-utils";
import type { Article } from "./types";

const MONTHS: Record<string, string> = {
  Jan: "Jan", January: "Jan",
  Feb: "Feb", February: "Feb",
  Mar: "Mar", March: "Mar",
  Apr: "Apr", April: "Apr",
  May: "May",
  Jun: "Jun", June: "Jun",
  Jul: "Jul", July: "Jul",
  Aug: "Aug", August: "Aug",
  Sep: "Sep", Sept: "Sep", September: "Sep",
  Oct: "Oct", October: "Oct",
  Nov: "Nov", November: "Nov",
  Dec: "Dec", December: "Dec",
};

// Longest first so "September" wins over "Sept" and "Sep"
const MONTH_ALTERNATION = Object.keys(MONTHS)
  .sort((a, b) => b.length - a.length)
  .join("|");

// "Nov. 26, 2025", "November 3,2025", "Sept. 9, 2024"
const DATE_PATTERN = new RegExp(
  String.raw`\b((?:${MONTH_ALTERNATION})\.?) +(\d{1,2}), *(\d{4})`
);

export function normalizeMonth(month: string): string {
  const key = month.replace(/\.$/, "");
  return Object.hasOwn(MONTHS, key) ? MONTHS[key] : month;
}

export function matchPrettyDate(text: string): string {
  const match = text.match(DATE_PATTERN);
  if (!match) return "";
  const [, month, day, year] = match;
  return `${normalizeMonth(month)} ${parseInt(day, 10)}, ${year}`;
}

export function dateFromTimestamps(timestamps: readonly string[]): string {
  if (timestamps.length === 0) return "";
  return matchPrettyDate(timestamps[0]);
}

export function dateFromContent(content: string): string {
  if (!content) return "";
  return matchPrettyDate(collapseWhitespace(content));
}

export function getPrettyDate(article: Pick<Article, "timestamp" | "content">): string {
  return dateFromTimestamps(article.timestamp) || dateFromContent(article.content);
}
