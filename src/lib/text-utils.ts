export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function truncateForModel(content: string, maxChars: number): string {
  return content.slice(0, maxChars);
}
