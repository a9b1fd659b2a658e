export interface Listing {
  url: string; // absolute, no fragment or trailing slash
  title: string;
}

export interface ExtractedPage {
  text: string;
  listings: Listing[];
}

export interface PageSnapshot {
  version: 1;
  url: string;
  fetchedAt: string; // ISO
  contentHash: string; // sha256 of text
  text: string;
  listings: Listing[];
}

export interface SnapshotDiff {
  changed: boolean;
  addedListings: Listing[];
  removedListings: Listing[];
  textDiff: string;
}

export interface Notification {
  subject: string;
  body: string;
}

export type ChannelName = "telegram" | "email";

export interface NotificationChannel {
  name: ChannelName;
  send(notification: Notification): Promise<void>;
}

export interface DeliveryResult {
  channel: ChannelName;
  ok: boolean;
  error?: string;
}

export type RunOutcome = "baseline" | "unchanged" | "new-listings" | "changed";

export interface RunResult {
  outcome: RunOutcome;
  deliveries: DeliveryResult[];
}
