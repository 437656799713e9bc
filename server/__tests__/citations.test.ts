import { describe, it, expect } from "vitest";
import { citedSources, extractCitations } from "../drafting/citations";

describe("extractCitations", () => {
  it("collects file_search results in ranked order", () => {
    const response = {
      output: [
        {
          type: "file_search_call",
          results: [
            { file_id: "file-a", filename: "local_rules.pdf", text: "Rule 3015-1", score: 0.91 },
            { file_id: "file-b", filename: "form_motion.pdf", text: "Sample motion" },
          ],
        },
        { type: "message", content: [] },
      ],
    };

    expect(extractCitations(response)).toEqual([
      { sourceFileId: "file-a", sourceFilename: "local_rules.pdf", excerpt: "Rule 3015-1", rank: 1, relevanceScore: 0.91 },
      { sourceFileId: "file-b", sourceFilename: "form_motion.pdf", excerpt: "Sample motion", rank: 2 },
    ]);
  });

  it("returns nothing when results were not included", () => {
    expect(extractCitations({ output: [{ type: "file_search_call", queries: ["lien"] }] })).toEqual([]);
    expect(extractCitations(undefined)).toEqual([]);
  });

  it("skips results without a file id", () => {
    const response = { output: [{ type: "file_search_call", results: [{ text: "orphan" }] }] };
    expect(extractCitations(response)).toEqual([]);
  });
});

describe("citedSources", () => {
  it("lists distinct sources in first-seen order", () => {
    expect(citedSources([
      { sourceFileId: "file-a", sourceFilename: "rules.pdf", excerpt: "" },
      { sourceFileId: "file-b", sourceFilename: "", excerpt: "" },
      { sourceFileId: "file-c", sourceFilename: "rules.pdf", excerpt: "" },
    ])).toEqual(["rules.pdf", "file-b"]);
  });
});
