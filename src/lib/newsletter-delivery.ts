import { Resend } from "resend";
import { errorMessage, logger } from "./logger";
import type { DeliveryStats } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OutgoingEmail = {
  to: string;
  subject: string;
  html: string;
};

export type SendResult = { ok: true; id: string } | { ok: false; error: string };

export type DeliverySink = {
  send(email: OutgoingEmail): Promise<SendResult>;
};

export type RecipientResult = SendResult & { recipient: string };

export type DeliveryReport = DeliveryStats & {
  results: RecipientResult[];
};

// ---------------------------------------------------------------------------
// Resend
// ---------------------------------------------------------------------------

export function createResendSink(opts: {
  apiKey: string;
  senderEmail: string;
  senderName: string;
}): DeliverySink {
  const resend = new Resend(opts.apiKey);
  const from = `${opts.senderName} <${opts.senderEmail}>`;

  return {
    async send({ to, subject, html }) {
      try {
        const { data, error } = await resend.emails.send({ from, to: [to], subject, html });
        if (error) return { ok: false, error: error.message };
        return { ok: true, id: data?.id ?? "N/A" };
      } catch (error) {
        return { ok: false, error: errorMessage(error) };
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Fan-out to the recipient list
// ---------------------------------------------------------------------------

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sends one copy per recipient, one at a time with a pause in between to stay
 * under the provider's rate limit. A failed recipient never stops the rest.
 */
export async function sendToAll(
  sink: DeliverySink,
  html: string,
  recipients: readonly string[],
  subject: string,
  options: { delayMs?: number } = {}
): Promise<DeliveryReport> {
  const delayMs = options.delayMs ?? 500;
  const results: RecipientResult[] = [];

  logger.info("Sending newsletter", { recipients: recipients.length, subject });

  for (const [idx, recipient] of recipients.entries()) {
    let result: SendResult;
    try {
      result = await sink.send({ to: recipient, subject, html });
    } catch (error) {
      result = { ok: false, error: errorMessage(error) };
    }

    if (result.ok) {
      logger.info(`[${idx + 1}/${recipients.length}] Sent`, { recipient, id: result.id });
    } else {
      logger.warn(`[${idx + 1}/${recipients.length}] Failed`, { recipient, error: result.error });
    }
    results.push({ ...result, recipient });

    if (delayMs > 0 && idx < recipients.length - 1) await sleep(delayMs);
  }

  const success = results.filter((r) => r.ok).length;
  const report: DeliveryReport = {
    success,
    failed: results.length - success,
    total: recipients.length,
    results,
  };
  logger.info("Email sending summary", {
    success: report.success,
    failed: report.failed,
    total: report.total,
  });
  return report;
}
