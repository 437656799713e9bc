import type { Citation } from "@shared/schema";
import { getArray, getNumber, getString } from "../utils/fieldAccess";

/**
 * Collect file_search results from a finalized response, in the order the
 * backend ranked them. Responses retrieved without included results carry
 * no `results` arrays and yield an empty list.
 */
export function extractCitations(response: unknown): Citation[] {
  const citations: Citation[] = [];

  for (const item of getArray(response, "output")) {
    if (getString(item, "type") !== "file_search_call") continue;

    for (const result of getArray(item, "results")) {
      const fileId = getString(result, "file_id");
      if (!fileId) continue;

      const citation: Citation = {
        sourceFileId: fileId,
        sourceFilename: getString(result, "filename") ?? "",
        excerpt: getString(result, "text") ?? "",
        rank: citations.length + 1,
      };
      const score = getNumber(result, "score");
      if (score !== undefined) citation.relevanceScore = score;
      citations.push(citation);
    }
  }

  return citations;
}

/**
 * Distinct source filenames, first-seen order. Sent with every turn as
 * the short list of sources under an answer.
 */
export function citedSources(citations: readonly Citation[]): string[] {
  const seen = new Set<string>();
  for (const citation of citations) {
    const name = citation.sourceFilename || citation.sourceFileId;
    seen.add(name);
  }
  return [...seen];
}
