import type { AxiosInstance } from "axios";
import type { AppConfig } from "./config.js";
import { createEmailChannel, type EmailSettings, type MailTransport } from "./email.js";
import type { Logger } from "./logger.js";
import type { SnapshotStore } from "./store.js";
import { createTelegramChannel, ensureTelegramChatId } from "./telegram.js";
import type { DeliveryResult, Notification, NotificationChannel } from "./types.js";
import { describeError } from "./utils.js";

export function emailSettingsOf(config: AppConfig): EmailSettings | null {
  const { SMTP_USERNAME, SMTP_PASSWORD, RECIPIENT_EMAIL } = config;
  if (!SMTP_USERNAME || !SMTP_PASSWORD || !RECIPIENT_EMAIL) return null;
  return {
    host: config.SMTP_SERVER,
    port: config.SMTP_PORT,
    username: SMTP_USERNAME,
    password: SMTP_PASSWORD,
    from: config.EMAIL_FROM ?? SMTP_USERNAME,
    to: RECIPIENT_EMAIL,
  };
}

export interface ChannelDeps {
  store: SnapshotStore;
  logger: Logger;
  httpClient?: AxiosInstance;
  mailTransport?: MailTransport;
}

/** Channels with complete settings; the others are skipped with a warning. */
export async function buildChannels(config: AppConfig, deps: ChannelDeps): Promise<NotificationChannel[]> {
  const channels: NotificationChannel[] = [];

  if (config.TELEGRAM_BOT_TOKEN) {
    const chatId = await ensureTelegramChatId(
      config.TELEGRAM_BOT_TOKEN,
      config.TELEGRAM_CHAT_ID,
      deps.store,
      deps.logger,
      deps.httpClient,
    );
    if (chatId) channels.push(createTelegramChannel(config.TELEGRAM_BOT_TOKEN, chatId, deps.httpClient));
  } else {
    deps.logger.warn("Telegram not configured; skipping Telegram notifications.");
  }

  const email = emailSettingsOf(config);
  if (email) {
    channels.push(createEmailChannel(email, deps.mailTransport));
  } else {
    deps.logger.warn("Missing SMTP configuration; skipping email notifications.");
  }

  return channels;
}

/**
 * Tries every channel in turn. A failing channel is logged and recorded;
 * it never stops the remaining channels and never throws.
 */
export async function deliverNotification(
  channels: NotificationChannel[],
  notification: Notification,
  logger: Logger,
): Promise<DeliveryResult[]> {
  const results: DeliveryResult[] = [];
  for (const channel of channels) {
    try {
      await channel.send(notification);
      logger.debug(`Sent "${notification.subject}" via ${channel.name}`);
      results.push({ channel: channel.name, ok: true });
    } catch (err) {
      logger.error(`Failed to send ${channel.name} notification`, err);
      results.push({ channel: channel.name, ok: false, error: describeError(err) });
    }
  }
  return results;
}
