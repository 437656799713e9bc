/**
 * OpenAI Vector Store Backend
 *
 * Provisions knowledge stores, uploads reference PDFs into them and lists
 * what is indexed. Used by the registry and the admin routes.
 */

import type { OpenAI } from "openai";
import { toFile } from "openai";
import { getOpenAI } from "../llm/client";
import { ADMIN_CONSTANTS } from "../config/constants";
import type { AttachedFile } from "@shared/schema";

export type IndexedDocument = {
  fileId: string;
  filename: string;
  attributes: Record<string, string>;
};

export interface KnowledgeStoreBackend {
  createStore(name: string): Promise<string>;
  indexDocument(storeId: string, file: AttachedFile, attributes: Record<string, string>): Promise<string>;
  listDocuments(storeId: string): Promise<IndexedDocument[]>;
}

function stringifyAttributes(attributes: Record<string, unknown> | null | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes ?? {})) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      out[key] = String(value);
    }
  }
  return out;
}

export class OpenAIStoreBackend implements KnowledgeStoreBackend {
  constructor(private readonly clientFactory: () => OpenAI = getOpenAI) {}

  async createStore(name: string): Promise<string> {
    const store = await this.clientFactory().vectorStores.create({ name });
    return store.id;
  }

  async indexDocument(storeId: string, file: AttachedFile, attributes: Record<string, string>): Promise<string> {
    const client = this.clientFactory();
    const uploaded = await client.files.create({
      file: await toFile(file.bytes, file.filename),
      purpose: "assistants",
    });
    await client.vectorStores.files.create(storeId, {
      file_id: uploaded.id,
      attributes,
    });
    return uploaded.id;
  }

  async listDocuments(storeId: string): Promise<IndexedDocument[]> {
    const client = this.clientFactory();
    const page = await client.vectorStores.files.list(storeId, {
      limit: ADMIN_CONSTANTS.STORE_FILE_LIST_LIMIT,
    });

    const documents: IndexedDocument[] = [];
    for (const storeFile of page.data) {
      let filename: string = ADMIN_CONSTANTS.UNKNOWN_FILENAME;
      try {
        const fileObject = await client.files.retrieve(storeFile.id);
        filename = fileObject.filename;
      } catch (err) {
        console.warn(`[StoreBackend] Could not resolve filename for ${storeFile.id}:`, err);
      }
      documents.push({
        fileId: storeFile.id,
        filename,
        attributes: stringifyAttributes(storeFile.attributes),
      });
    }
    return documents;
  }
}
