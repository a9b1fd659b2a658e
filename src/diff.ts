import { structuredPatch } from "diff";
import type { Listing, PageSnapshot, SnapshotDiff } from "./types.js";

export const TRUNCATION_MARKER = "... (diff truncated) ...";

export function diffListings(prev: Listing[], curr: Listing[]): { added: Listing[]; removed: Listing[] } {
  const prevUrls = new Set(prev.map((l) => l.url));
  const currUrls = new Set(curr.map((l) => l.url));

  return {
    added: curr.filter((l) => !prevUrls.has(l.url)),
    removed: prev.filter((l) => !currUrls.has(l.url)),
  };
}

// jsdiff flags a missing final newline; both sides get one so it never does
function asPatchInput(text: string): string {
  return text === "" ? "" : `${text}\n`;
}

export function unifiedDiff(prevText: string, currText: string, maxLines = 2000): string {
  if (prevText === currText) return "";

  const patch = structuredPatch("previous", "current", asPatchInput(prevText), asPatchInput(currText), undefined, undefined, {
    context: 3,
  });

  const lines = ["--- previous", "+++ current"];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);
    lines.push(...hunk.lines);
  }

  if (lines.length > maxLines) {
    return [...lines.slice(0, maxLines), TRUNCATION_MARKER].join("\n");
  }
  return lines.join("\n");
}

export function diffSnapshots(prev: PageSnapshot, curr: PageSnapshot, maxLines = 2000): SnapshotDiff {
  const { added, removed } = diffListings(prev.listings, curr.listings);
  const textChanged = prev.contentHash !== curr.contentHash;

  return {
    changed: textChanged || added.length > 0 || removed.length > 0,
    addedListings: added,
    removedListings: removed,
    textDiff: textChanged ? unifiedDiff(prev.text, curr.text, maxLines) : "",
  };
}
