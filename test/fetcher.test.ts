import { AxiosError } from "axios";
import { describe, it, expect } from "vitest";
import { FetchError } from "../src/errors.js";
import { createPageFetcher } from "../src/fetcher.js";
import { stubHttpClient } from "./helpers/fakes.js";

const PAGE_URL = "https://housing.example.com/en/apartments/";
const options = { timeoutMs: 50, userAgent: "test-agent/1.0" };

describe("createPageFetcher", () => {
  it("should return the body of a 2xx response", async () => {
    const { client, requests } = stubHttpClient(() => ({ status: 200, data: "<html><body>ok</body></html>" }));
    const fetchPage = createPageFetcher(options, client);

    expect(await fetchPage(PAGE_URL)).toBe("<html><body>ok</body></html>");
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(PAGE_URL);
    expect(requests[0].method).toBe("get");
    expect(requests[0].timeout).toBe(50);
    expect(requests[0].headers.get("User-Agent")).toBe("test-agent/1.0");
    expect(requests[0].headers.get("Cache-Control")).toBe("no-cache");
  });

  it("should keep a JSON-looking body as text", async () => {
    const { client } = stubHttpClient(() => ({ status: 200, data: '{"listings": []}' }));

    expect(await createPageFetcher(options, client)(PAGE_URL)).toBe('{"listings": []}');
  });

  it("should fail with the status on a non-2xx response", async () => {
    const { client } = stubHttpClient(() => ({ status: 503, data: "Service Unavailable" }));

    const err = await createPageFetcher(options, client)(PAGE_URL).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: "fetch", status: 503, message: `HTTP 503 from ${PAGE_URL}` });
  });

  it("should fail on a timeout", async () => {
    const { client } = stubHttpClient((config) => {
      throw new AxiosError("timeout of 50ms exceeded", AxiosError.ECONNABORTED, config);
    });

    await expect(createPageFetcher(options, client)(PAGE_URL)).rejects.toThrow(`Timed out after 50 ms fetching ${PAGE_URL}`);
  });

  it("should fail on a network error", async () => {
    const { client } = stubHttpClient(() => {
      throw new Error("socket hang up");
    });

    await expect(createPageFetcher(options, client)(PAGE_URL)).rejects.toThrow(`Request to ${PAGE_URL} failed: socket hang up`);
  });
});
