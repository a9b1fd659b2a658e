import { WatcherError } from "./errors.js";
import type { Listing, Notification } from "./types.js";
import { describeError, formatTimestamp } from "./utils.js";

export const MAX_LISTINGS_IN_MESSAGE = 10;

export function baselineMessage(url: string, listingCount: number, now: Date): Notification {
  return {
    subject: "Baseline saved (first run)",
    body: [
      `Time: ${formatTimestamp(now)}`,
      `URL: ${url}`,
      "",
      `Baseline content saved (${listingCount} listings). Notifications will be sent on changes.`,
    ].join("\n"),
  };
}

export function newListingsMessage(url: string, added: Listing[], now: Date): Notification {
  const lines = added.slice(0, MAX_LISTINGS_IN_MESSAGE).map((l) => (l.title === l.url ? `• ${l.url}` : `• ${l.title} — ${l.url}`));
  if (added.length > MAX_LISTINGS_IN_MESSAGE) {
    lines.push(`... and ${added.length - MAX_LISTINGS_IN_MESSAGE} more`);
  }
  return {
    subject: `New listings detected (${added.length})`,
    body: [`Time: ${formatTimestamp(now)}`, `URL: ${url}`, "", ...lines].join("\n"),
  };
}

export function pageChangedMessage(url: string, prevHash: string, currHash: string, textDiff: string, now: Date): Notification {
  return {
    subject: `Page changed @ ${formatTimestamp(now)}`,
    body: [
      `URL: ${url}`,
      "",
      `Change detected. Hash: ${prevHash.slice(0, 12)} -> ${currHash.slice(0, 12)}`,
      "",
      "Diff:",
      textDiff || "(no text difference, listing links changed)",
    ].join("\n"),
  };
}

export function errorMessage(url: string, err: unknown, now: Date): Notification {
  const kind = err instanceof WatcherError ? `${err.kind} error` : "error";
  return {
    subject: "Watcher error",
    body: [`Time: ${formatTimestamp(now)}`, `URL: ${url}`, "", `${kind}: ${describeError(err)}`].join("\n"),
  };
}
