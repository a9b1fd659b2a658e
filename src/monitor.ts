import { ignorePatternOf, type AppConfig } from "./config.js";
import { diffSnapshots } from "./diff.js";
import { extractPage } from "./extractor.js";
import type { PageFetcher } from "./fetcher.js";
import type { Logger } from "./logger.js";
import { baselineMessage, errorMessage, newListingsMessage, pageChangedMessage } from "./messages.js";
import { deliverNotification } from "./notifier.js";
import type { SnapshotStore } from "./store.js";
import type { DeliveryResult, NotificationChannel, PageSnapshot, RunResult } from "./types.js";
import { sha256 } from "./utils.js";

/** A fixed channel list, or one resolved again on every run. */
export type ChannelSource = NotificationChannel[] | (() => Promise<NotificationChannel[]>);

export interface MonitorDeps {
  fetchPage: PageFetcher;
  store: SnapshotStore;
  channels: ChannelSource;
  logger: Logger;
  now?: () => Date;
}

async function resolveChannels(source: ChannelSource): Promise<NotificationChannel[]> {
  return typeof source === "function" ? source() : source;
}

// Nothing reached the user, so the stored snapshot stays and the next run notifies again
function allFailed(deliveries: DeliveryResult[]): boolean {
  return deliveries.length > 0 && deliveries.every((d) => !d.ok);
}

export async function runMonitorOnce(config: AppConfig, deps: MonitorDeps): Promise<RunResult> {
  const { store, logger } = deps;
  const channels = await resolveChannels(deps.channels);
  const now = deps.now ?? (() => new Date());
  const url = config.URL;

  logger.debug(`Fetching: ${url}`);
  const html = await deps.fetchPage(url);
  const page = extractPage(html, {
    baseUrl: url,
    contentSelector: config.CONTENT_SELECTOR,
    listingPathPrefix: config.LISTING_PATH_PREFIX,
    ignorePattern: ignorePatternOf(config),
  });
  const fetchedAt = now();
  const snap: PageSnapshot = {
    version: 1,
    url,
    fetchedAt: fetchedAt.toISOString(),
    contentHash: sha256(page.text),
    text: page.text,
    listings: page.listings,
  };
  logger.debug(`Extracted ${page.text.split("\n").length} lines and ${page.listings.length} listings`);

  const prev = await store.getPreviousSnapshot(url);
  if (!prev) {
    let deliveries: DeliveryResult[] = [];
    if (config.NOTIFY_ON_FIRST_RUN) {
      deliveries = await deliverNotification(channels, baselineMessage(url, snap.listings.length, fetchedAt), logger);
    }
    await store.saveSnapshot(snap);
    logger.info(`Baseline saved.${config.NOTIFY_ON_FIRST_RUN ? " Notified first run." : ""}`);
    return { outcome: "baseline", deliveries };
  }

  const diff = diffSnapshots(prev, snap, config.DIFF_MAX_LINES);
  if (!diff.changed) {
    logger.info("No change detected.");
    return { outcome: "unchanged", deliveries: [] };
  }

  if (diff.addedListings.length > 0) {
    logger.info(`New listings detected (${diff.addedListings.length}), notifying...`);
    const deliveries = await deliverNotification(channels, newListingsMessage(url, diff.addedListings, fetchedAt), logger);
    if (allFailed(deliveries)) {
      logger.warn("Every notification failed; keeping the previous snapshot to retry on the next run.");
    } else {
      await store.saveSnapshot(snap);
    }
    return { outcome: "new-listings", deliveries };
  }

  let deliveries: DeliveryResult[] = [];
  if (config.NOTIFY_ON_CONTENT_CHANGE) {
    logger.info("Change detected, notifying...");
    const message = pageChangedMessage(url, prev.contentHash, snap.contentHash, diff.textDiff, fetchedAt);
    deliveries = await deliverNotification(channels, message, logger);
  } else {
    logger.info("Change detected without new listings; content change notifications are off.");
  }
  if (allFailed(deliveries)) {
    logger.warn("Every notification failed; keeping the previous snapshot to retry on the next run.");
  } else {
    await store.saveSnapshot(snap);
  }
  return { outcome: "changed", deliveries };
}

/**
 * One guarded check. Returns the process exit code: 0 for any completed run,
 * 1 when a stage failed. The stored snapshot is only written by a completed
 * run, so a failure leaves it as it was.
 */
export async function runWatcher(config: AppConfig, deps: MonitorDeps): Promise<number> {
  const channels = await resolveChannels(deps.channels);
  try {
    await runMonitorOnce(config, { ...deps, channels });
    return 0;
  } catch (err) {
    deps.logger.error("Run failed", err);

    const errorChannels = channels.filter(
      (c) => (c.name === "telegram" && config.TELEGRAM_ON_ERROR) || (c.name === "email" && config.EMAIL_ON_ERROR),
    );
    if (errorChannels.length > 0) {
      const now = deps.now ?? (() => new Date());
      await deliverNotification(errorChannels, errorMessage(config.URL, err, now()), deps.logger);
    }
    return 1;
  }
}
