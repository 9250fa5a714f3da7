import { readFile } from "node:fs/promises";
import { logger } from "./logger";

/**
 * One address per line. Blank lines and "#" comments are ignored; lines that
 * do not look like an address are skipped with a warning.
 */
export function parseRecipients(text: string): string[] {
  const emails: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    if (line.includes("@") && line.includes(".")) {
      emails.push(line);
    } else {
      logger.warn("Skipping invalid email format", { line });
    }
  }
  return emails;
}

export async function loadRecipients(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.warn("Emails file not found", { path });
      return [];
    }
    throw error;
  }
  return parseRecipients(text);
}
