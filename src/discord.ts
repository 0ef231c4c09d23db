import axios, { type AxiosInstance } from "axios";
import type { AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { moduleLogger } from "./logger.js";
import type { NotificationKind, Notifier } from "./types.js";
import { sleep } from "./utils.js";

const log = moduleLogger("discord");

export type DiscordConfig = Pick<
  AppConfig,
  | "DISCORD_WEBHOOK_URL"
  | "DISCORD_USER_ID_TO_PING"
  | "DISCORD_MAX_MESSAGE_LENGTH"
  | "DISCORD_PART_DELAY_MS"
  | "DISCORD_MAX_RETRIES"
>;

interface WebhookPayload {
  content: string;
  allowed_mentions?: { users: string[] };
}

/**
 * Packs lines into parts of at most `maxLength` characters (a newline is
 * counted after every line). A line is never split; one longer than the limit
 * becomes a part of its own.
 */
export function splitMessage(lines: readonly string[], maxLength: number): string[] {
  const parts: string[] = [];
  let current: string[] = [];
  let size = 0;

  for (const line of lines) {
    if (current.length > 0 && size + line.length + 1 > maxLength) {
      parts.push(current.join("\n"));
      current = [];
      size = 0;
    }
    current.push(line);
    size += line.length + 1;
  }
  if (current.length > 0) parts.push(current.join("\n"));

  return parts.filter((p) => p.trim().length > 0);
}

function retryAfterMs(err: unknown): number | undefined {
  if (!axios.isAxiosError(err) || err.response?.status !== 429) return undefined;
  const body: unknown = err.response.data;
  if (typeof body === "object" && body !== null && "retry_after" in body && typeof body.retry_after === "number") {
    return Math.ceil(body.retry_after * 1000);
  }
  return 1000;
}

/** Rate limits, server errors and requests that got no response are worth another attempt. */
function isRetryable(err: unknown): boolean {
  if (!axios.isAxiosError(err)) return false;
  const status = err.response?.status;
  return status === undefined || status === 429 || status >= 500;
}

export class DiscordNotifier implements Notifier {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: DiscordConfig,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ timeout: 15000 });
  }

  private async postPart(webhookUrl: string, payload: WebhookPayload): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.http.post(webhookUrl, payload);
        return;
      } catch (err) {
        if (attempt >= this.config.DISCORD_MAX_RETRIES || !isRetryable(err)) throw err;
        const wait = retryAfterMs(err) ?? 1000 * 2 ** attempt;
        log.warn({ attempt: attempt + 1, wait, err: errorMessage(err) }, "Discord part failed; retrying");
        await sleep(wait);
      }
    }
  }

  async notify(lines: readonly string[], kind: NotificationKind): Promise<boolean> {
    const webhookUrl = this.config.DISCORD_WEBHOOK_URL;
    if (!webhookUrl) {
      log.warn({ kind }, "DISCORD_WEBHOOK_URL not set. Skipping notification.");
      return false;
    }
    if (lines.length === 0) return false;

    const userId = kind === "update" ? this.config.DISCORD_USER_ID_TO_PING : undefined;
    const content = userId ? [`<@${userId}> ${lines[0]}`, ...lines.slice(1)] : lines;
    const parts = splitMessage(content, this.config.DISCORD_MAX_MESSAGE_LENGTH);

    for (const [i, part] of parts.entries()) {
      const payload: WebhookPayload = { content: part };
      if (userId) payload.allowed_mentions = { users: [userId] };
      try {
        await this.postPart(webhookUrl, payload);
      } catch (err) {
        const status = axios.isAxiosError(err) ? err.response?.status : undefined;
        log.error({ kind, part: i + 1, of: parts.length, status, err: errorMessage(err) }, "Error sending Discord part");
        return false;
      }
      log.info({ kind, part: i + 1, of: parts.length, length: part.length }, "Discord part sent");
      if (i < parts.length - 1) await sleep(this.config.DISCORD_PART_DELAY_MS);
    }
    return parts.length > 0;
  }
}
