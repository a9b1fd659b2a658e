import path from "node:path";
import { describe, it, expect } from "vitest";
import { DEFAULT_URL, ignorePatternOf, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("should apply defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.URL).toBe(DEFAULT_URL);
    expect(config.STATE_DIR).toBe(path.resolve(".state"));
    expect(config.CONTENT_SELECTOR).toBe("body");
    expect(config.LISTING_PATH_PREFIX).toBe("/en/apartments/");
    expect(config.FETCH_TIMEOUT_MS).toBe(30000);
    expect(config.DIFF_MAX_LINES).toBe(2000);
    expect(config.NOTIFY_ON_FIRST_RUN).toBe(false);
    expect(config.NOTIFY_ON_CONTENT_CHANGE).toBe(true);
    expect(config.EMAIL_ON_ERROR).toBe(false);
    expect(config.TELEGRAM_ON_ERROR).toBe(true);
    expect(config.SMTP_SERVER).toBe("smtp.gmail.com");
    expect(config.SMTP_PORT).toBe(587);
    expect(config.CRON_SCHEDULE).toBe("*/10 * * * *");
    expect(ignorePatternOf(config)).toBeUndefined();
  });

  it("should parse boolean flags and numbers", () => {
    const config = loadConfig({
      NOTIFY_ON_FIRST_RUN: "Yes",
      NOTIFY_ON_CONTENT_CHANGE: "0",
      EMAIL_ON_ERROR: "on",
      TELEGRAM_ON_ERROR: "off",
      SMTP_PORT: "465",
      FETCH_TIMEOUT_MS: "5000",
    });

    expect(config.NOTIFY_ON_FIRST_RUN).toBe(true);
    expect(config.NOTIFY_ON_CONTENT_CHANGE).toBe(false);
    expect(config.EMAIL_ON_ERROR).toBe(true);
    expect(config.TELEGRAM_ON_ERROR).toBe(false);
    expect(config.SMTP_PORT).toBe(465);
    expect(config.FETCH_TIMEOUT_MS).toBe(5000);
  });

  it("should treat blank values as unset", () => {
    const config = loadConfig({ TELEGRAM_BOT_TOKEN: "   ", SMTP_PORT: "", STATE_DIR: "/var/lib/watcher" });

    expect(config.TELEGRAM_BOT_TOKEN).toBeUndefined();
    expect(config.SMTP_PORT).toBe(587);
    expect(config.STATE_DIR).toBe("/var/lib/watcher");
  });

  it("should compile the ignore pattern", () => {
    const pattern = ignorePatternOf(loadConfig({ IGNORE_PATTERN: "^Updated \\d" }));

    expect(pattern?.test("Updated 12:30")).toBe(true);
    expect(pattern?.test("Kuusela 12")).toBe(false);
  });

  it("should reject an invalid url", () => {
    expect(() => loadConfig({ URL: "not a url" })).toThrow(/^Invalid configuration: URL: /);
  });

  it("should reject an invalid regular expression", () => {
    expect(() => loadConfig({ IGNORE_PATTERN: "(" })).toThrow("Invalid configuration: IGNORE_PATTERN: not a valid regular expression");
  });

  it("should reject an invalid CSS selector", () => {
    expect(() => loadConfig({ CONTENT_SELECTOR: "li:bogus" })).toThrow("Invalid configuration: CONTENT_SELECTOR: not a valid CSS selector");
  });

  it("should reject an invalid cron expression", () => {
    expect(() => loadConfig({ CRON_SCHEDULE: "every minute" })).toThrow("Invalid configuration: CRON_SCHEDULE: not a valid cron expression");
  });

  it("should not echo values in errors", () => {
    let message = "";
    try {
      loadConfig({ SMTP_PORT: "test-secret", SMTP_PASSWORD: "test-secret" });
    } catch (err) {
      message = String(err);
    }

    expect(message).toMatch(/^Error: Invalid configuration: SMTP_PORT: /);
    expect(message).not.toContain("test-secret");
  });
});
