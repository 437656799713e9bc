/**
 * Document Extractor
 *
 * Uploads a document to the document-understanding backend and asks it for
 * the facts explicitly present in it. The wire-level "nothing found"
 * sentinel is normalized here into ExtractionOutcome.NoRelevantInfo; nothing
 * past this boundary compares sentinel strings.
 */

import type { AttachedFile } from "@shared/schema";
import { EXTRACTION_SENTINELS } from "../config/constants";
import { getErrorMessage } from "../utils/errorHandler";
import { logInfo, logWarn } from "../utils/logger";
import { guessMimeType } from "../utils/mime";

export enum ExtractionOutcome {
  Facts = "facts",
  NoRelevantInfo = "no_relevant_info",
}

export type ExtractionResult = {
  sourceFilename: string;
  outcome: ExtractionOutcome;
  /** Labeled fact report, or the canonical sentinel when nothing was found */
  text: string;
};

export type UploadedDocumentRef = {
  uri: string;
  mimeType: string;
  name?: string;
};

export interface DocumentUnderstandingBackend {
  upload(bytes: Buffer, mimeType: string, filename: string): Promise<UploadedDocumentRef>;
  generate(prompt: string, document: UploadedDocumentRef): Promise<string>;
}

export interface ExtractionProgress {
  onProgress(message: string, fraction: number): void;
  onWarning(message: string): void;
}

const KNOWN_SENTINELS: ReadonlySet<string> = new Set([
  EXTRACTION_SENTINELS.CANONICAL,
  EXTRACTION_SENTINELS.LEGACY,
]);

/**
 * Strip markdown emphasis/code fences a model sometimes wraps a bare
 * sentinel in, so "**NO_RELEVANT_INFO**" is still recognized.
 */
function unwrapMarkdown(text: string): string {
  return text.replace(/^[`*_\s]+|[`*_\s.]+$/g, "");
}

export function isNoRelevantInfo(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed === "") return true;
  return KNOWN_SENTINELS.has(trimmed) || KNOWN_SENTINELS.has(unwrapMarkdown(trimmed));
}

export function normalizeExtraction(sourceFilename: string, rawText: string): ExtractionResult {
  if (isNoRelevantInfo(rawText)) {
    return {
      sourceFilename,
      outcome: ExtractionOutcome.NoRelevantInfo,
      text: EXTRACTION_SENTINELS.CANONICAL,
    };
  }
  return { sourceFilename, outcome: ExtractionOutcome.Facts, text: rawText.trim() };
}

export class DocumentExtractor {
  constructor(
    private readonly backend: DocumentUnderstandingBackend,
    private readonly defaultPrompt: string,
  ) {}

  /**
   * Upload `fileBytes` and return the backend's raw fact report. The upload
   * reference is used for this one generation call only.
   */
  async extract(fileBytes: Buffer, mimeType: string, extractionPrompt: string = this.defaultPrompt, filename = "upload"): Promise<string> {
    const document = await this.backend.upload(fileBytes, mimeType, filename);
    const text = await this.backend.generate(extractionPrompt, document);
    return text.trim();
  }

  async extractFile(file: AttachedFile): Promise<ExtractionResult> {
    const raw = await this.extract(file.bytes, guessMimeType(file.filename), this.defaultPrompt, file.filename);
    return normalizeExtraction(file.filename, raw);
  }

  /**
   * Extract every upload strictly in order. A backend failure skips that
   * file (reported as a warning) and never aborts the batch.
   */
  async extractUploads(files: readonly AttachedFile[], progress: ExtractionProgress): Promise<ExtractionResult[]> {
    const results: ExtractionResult[] = [];

    for (const [index, file] of files.entries()) {
      progress.onProgress(`Reading ${file.filename} …`, index / files.length);
      try {
        const result = await this.extractFile(file);
        results.push(result);
        logInfo(`[DocumentExtractor] Extracted ${file.filename}`, { outcome: result.outcome });
      } catch (err) {
        const message = `Could not extract ${file.filename}: ${getErrorMessage(err)}`;
        logWarn(`[DocumentExtractor] ${message}`);
        progress.onWarning(message);
      }
    }

    if (files.length > 0) {
      progress.onProgress("Extraction complete", 1);
    }
    return results;
  }
}
