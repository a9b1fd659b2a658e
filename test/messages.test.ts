import { describe, it, expect } from "vitest";
import { FetchError } from "../src/errors.js";
import { baselineMessage, errorMessage, newListingsMessage, pageChangedMessage } from "../src/messages.js";

const PAGE_URL = "https://housing.example.com/en/apartments/";
const now = new Date("2024-05-01T12:00:00.000Z");

describe("messages", () => {
  it("should describe the baseline", () => {
    expect(baselineMessage(PAGE_URL, 3, now)).toEqual({
      subject: "Baseline saved (first run)",
      body: `Time: 2024-05-01 12:00:00 UTC\nURL: ${PAGE_URL}\n\nBaseline content saved (3 listings). Notifications will be sent on changes.`,
    });
  });

  it("should list at most ten new listings", () => {
    const added = Array.from({ length: 12 }, (_, i) => ({ url: `${PAGE_URL}flat-${i + 1}`, title: `Flat ${i + 1}` }));

    const message = newListingsMessage(PAGE_URL, added, now);
    const lines = message.body.split("\n");

    expect(message.subject).toBe("New listings detected (12)");
    expect(lines.slice(0, 3)).toEqual(["Time: 2024-05-01 12:00:00 UTC", `URL: ${PAGE_URL}`, ""]);
    expect(lines[3]).toBe(`• Flat 1 — ${PAGE_URL}flat-1`);
    expect(lines).toHaveLength(3 + 10 + 1);
    expect(lines[lines.length - 1]).toBe("... and 2 more");
  });

  it("should show only the url for untitled listings", () => {
    const message = newListingsMessage(PAGE_URL, [{ url: `${PAGE_URL}flat-1`, title: `${PAGE_URL}flat-1` }], now);

    expect(message.body.split("\n")[3]).toBe(`• ${PAGE_URL}flat-1`);
  });

  it("should include the diff in page change messages", () => {
    const message = pageChangedMessage(PAGE_URL, "a".repeat(64), "b".repeat(64), "--- previous\n+++ current", now);

    expect(message.subject).toBe("Page changed @ 2024-05-01 12:00:00 UTC");
    expect(message.body).toBe(
      `URL: ${PAGE_URL}\n\nChange detected. Hash: aaaaaaaaaaaa -> bbbbbbbbbbbb\n\nDiff:\n--- previous\n+++ current`,
    );
  });

  it("should name the error kind", () => {
    const message = errorMessage(PAGE_URL, new FetchError(`HTTP 503 from ${PAGE_URL}`, { status: 503 }), now);

    expect(message.subject).toBe("Watcher error");
    expect(message.body.split("\n").pop()).toBe(`fetch error: HTTP 503 from ${PAGE_URL}`);
  });
});
