/**
 * Context Assembler
 *
 * Builds the per-turn context block sent to the drafting call: one labeled
 * line per declared parameter, then one block per extraction that found
 * something. Pure; no I/O.
 */

import { CONTEXT_CONSTANTS } from "../config/constants";
import { DRAFTING_PROFILES, type ContextLabels } from "../config/profiles";
import { ExtractionOutcome, isNoRelevantInfo, type ExtractionResult } from "../extraction/documentExtractor";

const DEFAULT_LABELS = DRAFTING_PROFILES.bankruptcy_motion.labels;

function declared(value: string | null | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : CONTEXT_CONSTANTS.UNSPECIFIED;
}

function hasFacts(result: ExtractionResult): boolean {
  return result.outcome === ExtractionOutcome.Facts && !isNoRelevantInfo(result.text);
}

/**
 * Label each source by filename; repeated filenames get a " [n]" suffix so
 * every block stays distinguishable.
 */
function uniqueSourceLabels(results: readonly ExtractionResult[]): string[] {
  const seen = new Map<string, number>();
  return results.map((result) => {
    const count = (seen.get(result.sourceFilename) ?? 0) + 1;
    seen.set(result.sourceFilename, count);
    return count === 1 ? result.sourceFilename : `${result.sourceFilename} [${count}]`;
  });
}

export function formatExtractionBlock(sourceLabel: string, text: string): string {
  return `${CONTEXT_CONSTANTS.EXTRACTION_BLOCK_LABEL} File name (${sourceLabel}):\n${text}`;
}

export function assembleContext(
  category: string | null | undefined,
  jurisdiction: string | null | undefined,
  subClassification: string | null | undefined,
  extractionResults: readonly ExtractionResult[],
  labels: ContextLabels = DEFAULT_LABELS,
): string {
  const parts = [
    `${labels.category}: ${declared(category)}`,
    `${labels.jurisdiction}: ${declared(jurisdiction)}`,
    `${labels.subClassification}: ${declared(subClassification)}`,
  ];

  const withFacts = extractionResults.filter(hasFacts);
  if (withFacts.length > 0) {
    const sourceLabels = uniqueSourceLabels(withFacts);
    parts.push(withFacts.map((result, i) => formatExtractionBlock(sourceLabels[i], result.text)).join("\n"));
  }

  return parts.join("\n");
}
