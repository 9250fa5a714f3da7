import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArticleSourceError, loadArticles, parseArticles } from "@/lib/article-source";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "deal-letter-articles-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function fixture(name: string, body: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, body, "utf-8");
  return path;
}

describe("parseArticles", () => {
  it("fills missing and null fields with empty values", () => {
    expect(parseArticles([{ title: "Only a title", content: null }])).toEqual([
      { title: "Only a title", content: "", url: "", timestamp: [] },
    ]);
  });

  it("accepts a single timestamp string", () => {
    const [article] = parseArticles([{ timestamp: "Nov. 3, 2025" }]);
    expect(article.timestamp).toEqual(["Nov. 3, 2025"]);
  });

  it("returns frozen records", () => {
    const [article] = parseArticles([{ title: "T", timestamp: ["a", "b"] }]);
    expect(Object.isFrozen(article)).toBe(true);
    expect(Object.isFrozen(article.timestamp)).toBe(true);
  });

  it("drops unknown keys", () => {
    const [article] = parseArticles([{ title: "T", source: "wire" }]);
    expect(Object.keys(article).sort()).toEqual(["content", "timestamp", "title", "url"]);
  });
});

describe("loadArticles", () => {
  it("reads a JSON array of articles", async () => {
    const path = await fixture(
      "ok.json",
      JSON.stringify([
        { title: "A", content: "Body A", url: "https://example.com/a", timestamp: ["Nov. 3, 2025"] },
        { title: "B", content: "Body B", url: "https://example.com/b" },
      ])
    );

    const articles = await loadArticles(path);
    expect(articles.map((a) => a.title)).toEqual(["A", "B"]);
    expect(articles[1].timestamp).toEqual([]);
  });

  it("rejects a missing file with the path attached", async () => {
    const path = join(dir, "missing.json");
    await expect(loadArticles(path)).rejects.toBeInstanceOf(ArticleSourceError);
    await expect(loadArticles(path)).rejects.toMatchObject({ path });
  });

  it("rejects malformed JSON", async () => {
    const path = await fixture("broken.json", "[{");
    await expect(loadArticles(path)).rejects.toBeInstanceOf(ArticleSourceError);
  });

  it("rejects a document that is not an array", async () => {
    const path = await fixture("object.json", '{"title": "A"}');
    await expect(loadArticles(path)).rejects.toThrow(`Expected a JSON array of articles in ${path}`);
  });

  it("rejects a record with a wrongly typed field", async () => {
    const path = await fixture("typed.json", '[{"title": 5}]');
    await expect(loadArticles(path)).rejects.toThrow(/^Invalid article record in /);
  });
});
