import * as cheerio from "cheerio";
import { ExtractError } from "./errors.js";
import type { ExtractedPage, Listing } from "./types.js";
import { describeError, normalizeListingUrl, normalizeWhitespace } from "./utils.js";

export interface ExtractOptions {
  baseUrl: string;
  contentSelector: string;
  listingPathPrefix: string;
  ignorePattern?: RegExp;
}

const NON_CONTENT = "script, style, noscript, template, svg, iframe";

function selectRegion($: cheerio.CheerioAPI, selector: string) {
  return $(selector).first();
}

function extractListings($: cheerio.CheerioAPI, options: ExtractOptions): Listing[] {
  const byUrl = new Map<string, Listing>();

  selectRegion($, options.contentSelector).find("a[href]").each((_, el) => {
    const href = ($(el).attr("href") || "").trim();
    if (!href) return;
    const url = normalizeListingUrl(href, options.baseUrl);
    if (!url || url.search) return;
    if (!url.pathname.startsWith(options.listingPathPrefix)) return;
    const tail = url.pathname.slice(options.listingPathPrefix.length).replace(/^\/+|\/+$/g, "");
    if (!tail) return;

    const key = url.toString();
    const title = normalizeWhitespace($(el).text());
    const existing = byUrl.get(key);
    if (!existing) {
      byUrl.set(key, { url: key, title: title || key });
    } else if (existing.title === key && title) {
      existing.title = title;
    }
  });

  return [...byUrl.values()].sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
}

/**
 * Reduces a page to the text of the selected region, one text node per line,
 * and the listing links found in it.
 */
export function extractPage(html: string, options: ExtractOptions): ExtractedPage {
  const $ = cheerio.load(html);
  $(NON_CONTENT).remove();

  let region: ReturnType<typeof selectRegion>;
  try {
    region = selectRegion($, options.contentSelector);
  } catch (err) {
    throw new ExtractError(`Selector "${options.contentSelector}" is invalid: ${describeError(err)}`);
  }
  if (region.length === 0) {
    throw new ExtractError(`Selector "${options.contentSelector}" matched nothing on ${options.baseUrl}`);
  }

  const listings = extractListings($, options);

  // Line breaks around every element so adjacent text nodes never merge
  region.find("*").prepend("\n").append("\n");
  const lines = region
    .text()
    .split("\n")
    .map(normalizeWhitespace)
    .filter((line) => line !== "")
    .filter((line) => !options.ignorePattern || !options.ignorePattern.test(line));

  if (lines.length === 0) {
    throw new ExtractError(`No text found in "${options.contentSelector}" on ${options.baseUrl}`);
  }

  return { text: lines.join("\n"), listings };
}
