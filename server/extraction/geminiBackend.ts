import { createPartFromUri, createUserContent } from "@google/genai";
import { getGemini } from "../llm/client";
import { MODEL_ASSIGNMENTS } from "../config/models";
import { ExternalServiceError } from "../utils/errorHandler";
import type { DocumentUnderstandingBackend, UploadedDocumentRef } from "./documentExtractor";

/**
 * Gemini-backed document understanding: Files API upload, then a single
 * generateContent call over the prompt and the uploaded file.
 */
export class GeminiExtractionBackend implements DocumentUnderstandingBackend {
  constructor(private readonly model: string = MODEL_ASSIGNMENTS.DOCUMENT_EXTRACTION) {}

  async upload(bytes: Buffer, mimeType: string, filename: string): Promise<UploadedDocumentRef> {
    const file = await getGemini().files.upload({
      file: new Blob([bytes], { type: mimeType }),
      config: { mimeType, displayName: filename },
    });
    if (!file.uri) {
      throw new ExternalServiceError("Gemini", `upload of ${filename} returned no file uri`);
    }
    return { uri: file.uri, mimeType: file.mimeType ?? mimeType, name: file.name };
  }

  async generate(prompt: string, document: UploadedDocumentRef): Promise<string> {
    const response = await getGemini().models.generateContent({
      model: this.model,
      contents: createUserContent([
        prompt,
        createPartFromUri(document.uri, document.mimeType),
      ]),
    });
    return response.text ?? "";
  }
}
