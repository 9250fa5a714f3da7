import { format } from "date-fns";
import { z } from "zod";
import type { IssueInfo, PipelineConfig } from "./types";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_ANTHROPIC_MODEL = "claude-haiku-4-5-20251001";
export const DEFAULT_OLLAMA_MODEL = "llama3.2";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze({
  model: DEFAULT_ANTHROPIC_MODEL,
  maxCharsForAi: 2000,
  summaryMaxChars: 400,
  llmTimeoutMs: 120_000,
  concurrency: 1,
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LlmProvider = "anthropic" | "ollama";

export type LlmConfig = {
  readonly provider: LlmProvider;
  readonly anthropicApiKey: string | null;
  readonly ollamaBaseUrl: string;
};

export type EmailConfig = {
  readonly enabled: boolean;
  readonly resendApiKey: string | null;
  readonly senderEmail: string;
  readonly senderName: string;
  readonly subject: string;
  readonly delayMs: number;
};

export type JobConfig = {
  readonly articlesPath: string;
  readonly templatePath: string;
  readonly htmlOutputPath: string;
  readonly contextOutputPath: string;
  readonly emailsPath: string;
  readonly testCount: number | null;
  readonly cron: string | null;
};

export type AppConfig = {
  readonly pipeline: PipelineConfig;
  readonly llm: LlmConfig;
  readonly email: EmailConfig;
  readonly job: JobConfig;
  readonly issue: Readonly<IssueInfo>;
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ---------------------------------------------------------------------------
// Environment schema
// ---------------------------------------------------------------------------

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["anthropic", "ollama"]).default("anthropic"),
  LLM_MODEL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  LLM_TIMEOUT_MS: positiveInt(DEFAULT_PIPELINE_CONFIG.llmTimeoutMs),
  MAX_CHARS_FOR_AI: positiveInt(DEFAULT_PIPELINE_CONFIG.maxCharsForAi),
  SUMMARY_MAX_CHARS: positiveInt(DEFAULT_PIPELINE_CONFIG.summaryMaxChars),
  ENRICH_CONCURRENCY: positiveInt(DEFAULT_PIPELINE_CONFIG.concurrency),
  ARTICLES_PATH: z.string().default("output.json"),
  TEMPLATE_PATH: z.string().default("templates/template_base.html"),
  HTML_OUTPUT_PATH: optionalString,
  CONTEXT_OUTPUT_PATH: z.string().default("contexts.txt"),
  EMAILS_PATH: z.string().default("emails.txt"),
  ISSUE_DATE: optionalString,
  ISSUE_NUMBER: z.string().default("0001"),
  TEST_COUNT: z.coerce.number().int().positive().optional(),
  SEND_EMAILS: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
  RESEND_API_KEY: optionalString,
  SENDER_EMAIL: z.string().email().default("newsletter@example.com"),
  SENDER_NAME: z.string().default("The M&A Letter"),
  EMAIL_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  NEWSLETTER_CRON: optionalString,
});

// Empty strings in the environment mean "unset"
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  now: Date = new Date()
): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join(".");
    throw new ConfigError(`Invalid ${key}: ${issue.message}`, key);
  }
  const e = parsed.data;

  if (e.LLM_PROVIDER === "anthropic" && !e.ANTHROPIC_API_KEY) {
    throw new ConfigError("ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic", "ANTHROPIC_API_KEY");
  }
  if (e.SEND_EMAILS && !e.RESEND_API_KEY) {
    throw new ConfigError("RESEND_API_KEY is required when SEND_EMAILS=true", "RESEND_API_KEY");
  }

  const model =
    e.LLM_MODEL ?? (e.LLM_PROVIDER === "ollama" ? DEFAULT_OLLAMA_MODEL : DEFAULT_ANTHROPIC_MODEL);
  const issueDate = e.ISSUE_DATE ?? format(now, "MMMM d, yyyy");

  return Object.freeze({
    pipeline: Object.freeze({
      model,
      maxCharsForAi: e.MAX_CHARS_FOR_AI,
      summaryMaxChars: e.SUMMARY_MAX_CHARS,
      llmTimeoutMs: e.LLM_TIMEOUT_MS,
      concurrency: e.ENRICH_CONCURRENCY,
    }),
    llm: Object.freeze({
      provider: e.LLM_PROVIDER,
      anthropicApiKey: e.ANTHROPIC_API_KEY ?? null,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
    }),
    email: Object.freeze({
      enabled: e.SEND_EMAILS,
      resendApiKey: e.RESEND_API_KEY ?? null,
      senderEmail: e.SENDER_EMAIL,
      senderName: e.SENDER_NAME,
      subject: `${e.SENDER_NAME} - Issue ${e.ISSUE_NUMBER} (${issueDate})`,
      delayMs: e.EMAIL_DELAY_MS,
    }),
    job: Object.freeze({
      articlesPath: e.ARTICLES_PATH,
      templatePath: e.TEMPLATE_PATH,
      htmlOutputPath: e.HTML_OUTPUT_PATH ?? `newsletter_issue_${e.ISSUE_NUMBER}.html`,
      contextOutputPath: e.CONTEXT_OUTPUT_PATH,
      emailsPath: e.EMAILS_PATH,
      testCount: e.TEST_COUNT ?? null,
      cron: e.NEWSLETTER_CRON ?? null,
    }),
    issue: Object.freeze({ issueDate, issueNumber: e.ISSUE_NUMBER }),
  });
}
