import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { Logger } from "./logger.js";
import type { SnapshotStore } from "./store.js";
import type { Notification, NotificationChannel } from "./types.js";
import { describeError } from "./utils.js";

// Telegram rejects messages longer than this after entity parsing
export const TELEGRAM_MAX_LENGTH = 4096;

const updatesSchema = z.object({
  result: z.array(
    z
      .object({
        message: z
          .object({
            chat: z.object({ id: z.union([z.number(), z.string()]), type: z.string() }).passthrough(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough(),
  ),
});

function apiBase(botToken: string): string {
  return `https://api.telegram.org/bot${botToken}`;
}

export function escapeHtml(input: string): string {
  return input.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function buildTelegramText(notification: Notification): string {
  const suffix = "\n…";
  // Length is counted on the unescaped text, which is what Telegram counts
  const budget = TELEGRAM_MAX_LENGTH - notification.subject.length - 1;
  let body = notification.body;
  if (body.length > budget) {
    let cut = Math.max(0, budget - suffix.length);
    // Never end on the first half of a surrogate pair
    const last = body.charCodeAt(cut - 1);
    if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
    body = body.slice(0, cut) + suffix;
  }
  return `<b>${escapeHtml(notification.subject)}</b>\n${escapeHtml(body)}`;
}

export async function sendTelegramMessage(
  client: AxiosInstance,
  botToken: string,
  chatId: string,
  html: string,
): Promise<void> {
  await client.post(
    `${apiBase(botToken)}/sendMessage`,
    {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    },
    { timeout: 30000 },
  );
}

/**
 * Chat id from the configuration, then from the state directory, then from
 * the bot's most recent private chat. A detected id is stored for later runs.
 */
export async function ensureTelegramChatId(
  botToken: string,
  configuredChatId: string | undefined,
  store: SnapshotStore,
  logger: Logger,
  client: AxiosInstance = axios.create(),
): Promise<string | null> {
  if (configuredChatId) return configuredChatId;

  const stored = await store.getStoredTelegramChatId();
  if (stored) return stored;

  try {
    const { data } = await client.get<unknown>(`${apiBase(botToken)}/getUpdates`, { timeout: 15000 });
    const parsed = updatesSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn("Unexpected getUpdates response, cannot detect Telegram chat id");
      return null;
    }
    const lastPrivate = parsed.data.result
      .map((u) => u.message?.chat)
      .filter((c) => c !== undefined && c.type === "private")
      .pop();
    if (lastPrivate) {
      const chatId = String(lastPrivate.id);
      logger.info(`Detected Telegram chat id ${chatId}`);
      await store.saveTelegramChatId(chatId).catch((err: unknown) => {
        logger.warn(`Could not store Telegram chat id: ${describeError(err)}`);
      });
      return chatId;
    }
  } catch (err) {
    logger.warn(`Telegram chat id detection failed: ${describeError(err)}`);
    return null;
  }

  logger.warn("TELEGRAM_CHAT_ID not set and no private chat found. Send /start to the bot; the next run looks again.");
  return null;
}

export function createTelegramChannel(
  botToken: string,
  chatId: string,
  client: AxiosInstance = axios.create(),
): NotificationChannel {
  return {
    name: "telegram",
    async send(notification) {
      await sendTelegramMessage(client, botToken, chatId, buildTelegramText(notification));
    },
  };
}
