import pLimit from "p-limit";
import { getPrettyDate } from "./date-normalizer";
import { extractDealValue } from "./deal-value-extractor";
import { proposeDealMetadata } from "./llm-deal-metadata";
import { errorMessage, logger } from "./logger";
import { toDealMetadata, validateProposal } from "./metadata-validator";
import { selectContext } from "./summary-selector";
import type { TextGenerator } from "./text-generator";
import {
  NA,
  type Article,
  type BatchResult,
  type DealMetadata,
  type EnrichedDeal,
  type EnrichmentFailure,
  type PipelineConfig,
} from "./types";

export type EnrichDeps = {
  generator: TextGenerator;
  config: PipelineConfig;
};

export type BatchOptions = {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, deal: EnrichedDeal) => void;
};

const EMPTY_METADATA: DealMetadata = Object.freeze({
  dealAdvisor: NA,
  investorOrPe: NA,
  buyer: NA,
  seller: NA,
  buyerLeadName: NA,
  buyerLeadRole: NA,
  investorLeadName: NA,
  investorLeadRole: NA,
  sellerLeadName: NA,
  sellerLeadRole: NA,
});

function seconds(start: number): string {
  return `${((Date.now() - start) / 1000).toFixed(1)}s`;
}

async function timed<T>(label: string, url: string, work: () => Promise<T>): Promise<T> {
  const start = Date.now();
  const result = await work();
  logger.info(`${label} OK (${seconds(start)})`, { url });
  return result;
}

/**
 * Record with every extracted field at its sentinel; used when enrichment of
 * an article blows up unexpectedly.
 */
export function emptyEnrichment(article: Article): EnrichedDeal {
  return Object.freeze({
    ...article,
    ...EMPTY_METADATA,
    prettyDate: "",
    context: "",
    dealValue: NA,
  });
}

export async function enrichArticle(
  article: Article,
  deps: EnrichDeps,
  signal?: AbortSignal
): Promise<EnrichedDeal> {
  const { generator, config } = deps;
  const { content, url } = article;

  const prettyDate = getPrettyDate(article);
  const dealValue = extractDealValue(content);

  // The two model calls are independent of each other
  const [context, proposal] = await Promise.all([
    timed("Summary", url, () => selectContext(generator, article, prettyDate, config, signal)),
    timed("Metadata", url, () => proposeDealMetadata(generator, content, config, signal)),
  ]);

  const metadata = toDealMetadata(validateProposal(proposal, content));

  return Object.freeze({
    title: article.title,
    content,
    url,
    timestamp: article.timestamp,
    prettyDate,
    context,
    dealValue,
    ...metadata,
  });
}

/**
 * Enriches a batch with at most `config.concurrency` articles in flight.
 * Results keep input order. Once `signal` aborts, articles that have not
 * started are skipped and reported as failures. Started ones run to completion
 * under their per-call timeouts; the batch signal is not passed into them.
 */
export async function enrichBatch(
  articles: readonly Article[],
  deps: EnrichDeps,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const start = Date.now();
  const { signal, onProgress } = options;
  const limit = pLimit(Math.max(1, deps.config.concurrency));
  const failures: EnrichmentFailure[] = [];
  let done = 0;

  const slots = await Promise.all(
    articles.map((article, index) =>
      limit(async (): Promise<EnrichedDeal | null> => {
        if (signal?.aborted) {
          failures.push({ index, url: article.url, reason: "aborted" });
          return null;
        }

        logger.info(`[${index + 1}/${articles.length}] ${article.title.slice(0, 70)}`);
        let deal: EnrichedDeal;
        try {
          deal = await enrichArticle(article, deps);
        } catch (error) {
          const message = errorMessage(error);
          logger.error("Article enrichment failed", { url: article.url, error: message });
          failures.push({ index, url: article.url, reason: "error", errorMessage: message });
          deal = emptyEnrichment(article);
        }

        done++;
        onProgress?.(done, articles.length, deal);
        return deal;
      })
    )
  );

  failures.sort((a, b) => a.index - b.index);
  return {
    deals: slots.filter((d): d is EnrichedDeal => d !== null),
    failures,
    durationMs: Date.now() - start,
  };
}
