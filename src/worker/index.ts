import cron from "node-cron";
import { loadConfig, type AppConfig } from "../lib/config";
import { errorMessage, logger } from "../lib/logger";
import { createDeliverySink, createGenerator, runNewsletterJob } from "../lib/newsletter-job";

let currentRun: AbortController | null = null;

async function runJob(config: AppConfig) {
  if (currentRun) {
    logger.warn("Previous newsletter run still in progress, skipping");
    return;
  }

  const controller = new AbortController();
  currentRun = controller;
  logger.info("Starting newsletter run", { issue: config.issue.issueNumber });
  try {
    const result = await runNewsletterJob(
      config,
      { generator: createGenerator(config), delivery: createDeliverySink(config) },
      controller.signal
    );
    logger.info("Newsletter run complete", {
      status: result.status,
      deals: `${result.dealsEnriched}/${result.articlesProcessed}`,
      failures: result.failures.length,
      emailed: result.delivery ? `${result.delivery.success}/${result.delivery.total}` : "disabled",
      durationMs: result.durationMs,
    });
  } catch (error) {
    logger.error("Newsletter run failed", { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    currentRun = null;
  }
}

async function main() {
  const config = loadConfig();

  process.on("SIGINT", () => {
    if (currentRun && !currentRun.signal.aborted) {
      logger.warn("Abort requested, finishing articles already in progress");
      currentRun.abort();
      return;
    }
    process.exit(130);
  });

  await runJob(config);

  if (!config.job.cron) return;
  if (!cron.validate(config.job.cron)) {
    throw new Error(`Invalid NEWSLETTER_CRON expression: ${config.job.cron}`);
  }

  logger.info(`Scheduling newsletter with cron: ${config.job.cron}`);
  cron.schedule(config.job.cron, () => {
    // Reloaded so a scheduled run gets a fresh issue date
    let next: AppConfig;
    try {
      next = loadConfig();
    } catch (error) {
      logger.error("Invalid configuration, skipping scheduled run", { error: errorMessage(error) });
      return;
    }
    void runJob(next);
  });
  logger.info("Worker running. Press Ctrl+C to stop.");
}

main().catch((error) => {
  logger.error("Worker failed to start", { error: errorMessage(error) });
  process.exit(1);
});
