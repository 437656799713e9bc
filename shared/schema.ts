import { z } from "zod";

// Conversation roles replayed into the drafting call
export const TURN_ROLES = ["user", "assistant"] as const;
export type TurnRole = typeof TURN_ROLES[number];

export const ARTIFACT_ORIGINS = ["sandbox_execution", "conversion_function"] as const;
export type ArtifactOrigin = typeof ARTIFACT_ORIGINS[number];

export type AttachedFile = {
  filename: string;
  bytes: Buffer;
};

export type Citation = {
  sourceFileId: string;
  sourceFilename: string;
  excerpt: string;
  relevanceScore?: number;
  rank?: number;
};

export type GeneratedArtifact = {
  filename: string;
  bytes: Buffer;
  origin: ArtifactOrigin;
};

/**
 * One entry of the session log. Turns are never mutated after they are
 * appended; insertion order is replay order.
 */
export type ConversationTurn = {
  readonly role: TurnRole;
  readonly content: string;
  readonly attachedFiles: readonly AttachedFile[];
  readonly citations: readonly Citation[];
};

/**
 * Persisted flat config. `vector_stores` maps category slugs to opaque
 * knowledge-store ids. Unknown keys are kept so a rewrite never drops them.
 */
export const draftingConfigSchema = z
  .object({
    vector_stores: z.record(z.string(), z.string()).default({}),
    assistant_id: z.string().optional(),
  })
  .passthrough();

export type DraftingConfig = z.infer<typeof draftingConfigSchema>;

// Wire shape of the HTML→PDF conversion collaborator
export const conversionResultSchema = z.object({
  success: z.boolean(),
  url: z.string().url().nullable().default(null),
  filename: z.string().default(""),
  error: z.string().nullable().default(null),
});

export type ConversionResult = z.infer<typeof conversionResultSchema>;

export const htmlToPdfArgsSchema = z
  .object({
    html_content: z.string().min(1).describe("Complete HTML document to render"),
    filename: z.string().min(1).describe("Output file name, e.g. Motion.pdf"),
  })
  .strict();

export type HtmlToPdfArgs = z.infer<typeof htmlToPdfArgsSchema>;

// HTTP request bodies
export const turnRequestSchema = z.object({
  prompt: z.string().trim().min(1, "Prompt is required"),
  category: z.string().trim().optional(),
  jurisdiction: z.string().trim().optional(),
  subClassification: z.string().trim().optional(),
});

export type TurnRequest = z.infer<typeof turnRequestSchema>;

export const indexDocumentsRequestSchema = z.object({
  jurisdiction: z.string().trim().min(1, "Jurisdiction is required"),
});
