import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { enrichBatch } from "./article-enricher";
import { loadArticles } from "./article-source";
import type { AppConfig } from "./config";
import { logger } from "./logger";
import { createResendSink, sendToAll, type DeliveryReport, type DeliverySink } from "./newsletter-delivery";
import { buildContextsText, buildNewsletterHtml } from "./newsletter-renderer";
import { loadRecipients } from "./recipients";
import {
  createAnthropicGenerator,
  createOllamaGenerator,
  type TextGenerator,
} from "./text-generator";
import type { EnrichmentFailure } from "./types";

export type JobDeps = {
  generator: TextGenerator;
  delivery: DeliverySink | null;
};

export type JobResult = {
  status: "success" | "aborted";
  articlesFound: number;
  articlesProcessed: number;
  dealsEnriched: number;
  failures: EnrichmentFailure[];
  htmlPath: string;
  contextsPath: string;
  delivery: DeliveryReport | null;
  durationMs: number;
};

export function createGenerator(config: AppConfig): TextGenerator {
  const { llm, pipeline } = config;
  if (llm.provider === "ollama") {
    return createOllamaGenerator({ baseUrl: llm.ollamaBaseUrl, model: pipeline.model });
  }
  if (!llm.anthropicApiKey) {
    throw new Error("ANTHROPIC_API_KEY is not configured");
  }
  return createAnthropicGenerator({ apiKey: llm.anthropicApiKey, model: pipeline.model });
}

export function createDeliverySink(config: AppConfig): DeliverySink | null {
  const { email } = config;
  if (!email.enabled || !email.resendApiKey) return null;
  return createResendSink({
    apiKey: email.resendApiKey,
    senderEmail: email.senderEmail,
    senderName: email.senderName,
  });
}

/**
 * One newsletter issue end to end: load, enrich, render, write, deliver.
 * Delivery starts only after every article has been enriched.
 */
export async function runNewsletterJob(
  config: AppConfig,
  deps: JobDeps,
  signal?: AbortSignal
): Promise<JobResult> {
  const start = Date.now();
  const { job } = config;

  const allArticles = await loadArticles(job.articlesPath);
  const articles = job.testCount !== null ? allArticles.slice(0, job.testCount) : allArticles;
  if (job.testCount !== null) {
    logger.info(`Test mode: ${articles.length} of ${allArticles.length} articles`);
  } else {
    logger.info(`Found ${allArticles.length} articles`);
  }

  const batch = await enrichBatch(
    articles,
    { generator: deps.generator, config: config.pipeline },
    { signal }
  );

  const template = await readFile(job.templatePath, "utf-8");
  const html = buildNewsletterHtml(batch.deals, template, config.issue);
  const htmlPath = resolve(job.htmlOutputPath);
  await writeFile(htmlPath, html, "utf-8");
  logger.info("HTML written", { path: htmlPath });

  const contextsPath = resolve(job.contextOutputPath);
  await writeFile(contextsPath, buildContextsText(batch.deals), "utf-8");
  logger.info("Contexts written", { path: contextsPath });

  const aborted = signal?.aborted ?? false;
  let delivery: DeliveryReport | null = null;
  if (aborted) {
    logger.warn("Batch aborted, skipping delivery");
  } else if (deps.delivery) {
    const recipients = await loadRecipients(job.emailsPath);
    if (recipients.length > 0) {
      delivery = await sendToAll(deps.delivery, html, recipients, config.email.subject, {
        delayMs: config.email.delayMs,
      });
    } else {
      logger.warn("No emails found to send", { path: job.emailsPath });
    }
  } else {
    logger.info("Email sending is disabled; set SEND_EMAILS=true to enable");
  }

  return {
    status: aborted ? "aborted" : "success",
    articlesFound: allArticles.length,
    articlesProcessed: articles.length,
    dealsEnriched: batch.deals.length,
    failures: batch.failures,
    htmlPath,
    contextsPath,
    delivery,
    durationMs: Date.now() - start,
  };
}
