/**
 * Knowledge Store Registry
 *
 * Maps category slugs (e.g. a motion type) to the ids of externally hosted
 * vector stores. The flat config file is loaded on first use and a failed
 * load is tried again on the next call; every mutation rewrites the whole
 * file before returning.
 */

import type { AttachedFile, DraftingConfig } from "@shared/schema";
import { getErrorMessage } from "../utils/errorHandler";
import { logInfo, logWarn } from "../utils/logger";
import {
  deleteDraftingConfig,
  emptyDraftingConfig,
  loadDraftingConfig,
  saveDraftingConfig,
} from "./configFile";
import type { IndexedDocument, KnowledgeStoreBackend } from "./openaiStoreBackend";

export type IndexingReport = {
  storeId: string;
  indexed: string[];
  failed: { filename: string; error: string }[];
};

export type StoreListing = {
  category: string;
  storeId: string;
  documents: IndexedDocument[];
};

export type StoreListingReport = {
  stores: StoreListing[];
  warnings: string[];
};

export class KnowledgeStoreRegistry {
  private config: DraftingConfig | undefined;

  constructor(
    private readonly configPath: string,
    private readonly backend: KnowledgeStoreBackend,
  ) {}

  /** @throws ConfigurationError when the file cannot be parsed */
  private current(): DraftingConfig {
    if (!this.config) {
      this.config = loadDraftingConfig(this.configPath);
    }
    return this.config;
  }

  get(category: string): string | undefined {
    const stores = this.current().vector_stores;
    return Object.hasOwn(stores, category) ? stores[category] : undefined;
  }

  list(): Record<string, string> {
    return { ...this.current().vector_stores };
  }

  /**
   * Return the store for `category`, provisioning and persisting a new one
   * when none exists yet.
   */
  async getOrCreate(category: string): Promise<string> {
    const existing = this.get(category);
    if (existing) return existing;

    const storeId = await this.backend.createStore(`${category}_store`);
    const config = this.current();
    const updated: DraftingConfig = {
      ...config,
      vector_stores: { ...config.vector_stores, [category]: storeId },
    };
    saveDraftingConfig(this.configPath, updated);
    this.config = updated;
    logInfo(`[KnowledgeRegistry] Created store for ${category}`, { category, storeId });
    return storeId;
  }

  async ensureAll(categories: readonly string[]): Promise<Record<string, string>> {
    for (const category of categories) {
      await this.getOrCreate(category);
    }
    return this.list();
  }

  /**
   * Upload and index documents into the category's store, one at a time.
   * A failed upload is reported and does not stop the remaining files.
   */
  async indexDocuments(
    category: string,
    files: readonly AttachedFile[],
    attributes: Record<string, string> = {},
  ): Promise<IndexingReport> {
    const storeId = await this.getOrCreate(category);
    const report: IndexingReport = { storeId, indexed: [], failed: [] };

    for (const file of files) {
      try {
        await this.backend.indexDocument(storeId, file, attributes);
        report.indexed.push(file.filename);
      } catch (err) {
        const error = getErrorMessage(err);
        logWarn(`[KnowledgeRegistry] Indexing failed for ${file.filename}`, { category, error });
        report.failed.push({ filename: file.filename, error });
      }
    }
    return report;
  }

  async listDocuments(): Promise<StoreListingReport> {
    const report: StoreListingReport = { stores: [], warnings: [] };
    for (const [category, storeId] of Object.entries(this.current().vector_stores)) {
      try {
        const documents = await this.backend.listDocuments(storeId);
        report.stores.push({ category, storeId, documents });
      } catch (err) {
        report.warnings.push(`Could not list files for ${category}: ${getErrorMessage(err)}`);
      }
    }
    return report;
  }

  /**
   * Full workspace reset: forget every store and remove the config file.
   * The hosted stores themselves are left in place.
   */
  reset(): void {
    deleteDraftingConfig(this.configPath);
    this.config = emptyDraftingConfig();
    logInfo(`[KnowledgeRegistry] Workspace reset`);
  }
}
