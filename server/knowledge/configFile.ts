/**
 * Drafting Config File
 *
 * Flat, pretty-printed JSON holding the knowledge-store registry. Writes are
 * whole-file overwrites and assume a single writer (one operator using the
 * admin surface); there is no file locking.
 */

import * as fs from "fs";
import * as path from "path";
import { draftingConfigSchema, type DraftingConfig } from "@shared/schema";
import { fromZodError } from "zod-validation-error";
import { ConfigurationError } from "../utils/errorHandler";

export function emptyDraftingConfig(): DraftingConfig {
  return { vector_stores: {} };
}

export function loadDraftingConfig(configPath: string): DraftingConfig {
  if (!fs.existsSync(configPath)) {
    return emptyDraftingConfig();
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON: ${reason}`);
  }

  const parsed = draftingConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Config file ${configPath} is invalid: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}

export function saveDraftingConfig(configPath: string, config: DraftingConfig): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");
}

export function deleteDraftingConfig(configPath: string): void {
  fs.rmSync(configPath, { force: true });
}
