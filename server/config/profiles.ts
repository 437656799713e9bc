/**
 * Drafting Profiles
 *
 * A profile fixes what is being drafted: the category enumeration (keys
 * are the knowledge-store registry slugs), the labels of the three context
 * lines, and the prompts used for extraction and drafting.
 */

import type { DraftingProfileId } from "./env";
import {
  BANKRUPTCY_EXTRACTION_PROMPT,
  BANKRUPTCY_SYSTEM_INSTRUCTIONS,
  TENDER_EXTRACTION_PROMPT,
  TENDER_SYSTEM_INSTRUCTIONS,
} from "./prompts";

export type ContextLabels = {
  category: string;
  jurisdiction: string;
  subClassification: string;
};

export type DraftingProfile = {
  id: DraftingProfileId;
  title: string;
  categories: Readonly<Record<string, string>>;
  labels: ContextLabels;
  subClassificationOptions: readonly string[];
  extractionPrompt: string;
  systemInstructions: string;
};

export const DRAFTING_PROFILES: Record<DraftingProfileId, DraftingProfile> = {
  bankruptcy_motion: {
    id: "bankruptcy_motion",
    title: "Legal Motion Assistant",
    categories: {
      value_claim: "Motion to Value Secured Claim",
      avoid_lien: "Motion to Avoid Judicial Lien",
    },
    labels: {
      category: "Motion type",
      jurisdiction: "Jurisdiction",
      subClassification: "Chapter",
    },
    subClassificationOptions: ["7", "11", "13"],
    extractionPrompt: BANKRUPTCY_EXTRACTION_PROMPT,
    systemInstructions: BANKRUPTCY_SYSTEM_INSTRUCTIONS,
  },
  tender_response: {
    id: "tender_response",
    title: "Tender Response Assistant",
    categories: {
      services: "Services Tender",
      supplies: "Supplies Tender",
      works: "Works Tender",
    },
    labels: {
      category: "Tender type",
      jurisdiction: "Region",
      subClassification: "Lot",
    },
    subClassificationOptions: [],
    extractionPrompt: TENDER_EXTRACTION_PROMPT,
    systemInstructions: TENDER_SYSTEM_INSTRUCTIONS,
  },
};

export function getProfile(id: DraftingProfileId): DraftingProfile {
  return DRAFTING_PROFILES[id];
}

/** Own keys only, so inherited names like `constructor` are not categories. */
export function isCategory(profile: DraftingProfile, slug: string): boolean {
  return Object.hasOwn(profile.categories, slug);
}

/**
 * Category label for a slug; falls back to the slug itself for registry
 * entries that no longer have a label.
 */
export function categoryLabel(profile: DraftingProfile, slug: string): string {
  return isCategory(profile, slug) ? profile.categories[slug] : slug;
}
