/**
 * Environment Configuration
 *
 * Reads secrets and settings from the hosting environment once, validated
 * with zod. Secret values are never logged.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ConfigurationError } from "../utils/errorHandler";

export const DRAFTING_PROFILE_IDS = ["bankruptcy_motion", "tender_response"] as const;
export type DraftingProfileId = typeof DRAFTING_PROFILE_IDS[number];

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is not set"),
  GEMINI_API_KEY: z.string().min(1, "GEMINI_API_KEY is not set"),
  APP_PASSWORD: z.string().min(1, "APP_PASSWORD is not set"),
  DRAFTING_CONFIG_PATH: z.string().min(1).default("config2.json"),
  DRAFTING_PROFILE: z.enum(DRAFTING_PROFILE_IDS).default("bankruptcy_motion"),
  HTML_TO_PDF_URL: z.string().url().optional(),
  HTML_TO_PDF_API_KEY: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_DIR: z.string().min(1).optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

let envCache: AppEnv | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(fromZodError(parsed.error).message);
  }
  return parsed.data;
}

export function getEnv(): AppEnv {
  if (!envCache) {
    envCache = loadEnv();
  }
  return envCache;
}
