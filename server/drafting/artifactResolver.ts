/**
 * Artifact Resolver
 *
 * Downloads the binary side effects of a drafting turn and normalizes them
 * to { filename, bytes, origin }:
 * - files written by the code interpreter, referenced either by
 *   container_file_citation annotations or by code_interpreter_call outputs;
 * - files produced by a declared function tool (HTML→PDF) at a URL.
 *
 * Every download is isolated: a failed one is reported and omitted.
 */

import * as path from "path";
import type { GeneratedArtifact } from "@shared/schema";
import { OPENAI_API, TIMEOUT_CONSTANTS } from "../config/constants";
import { getErrorMessage } from "../utils/errorHandler";
import { getArray, getString } from "../utils/fieldAccess";
import { logWarn } from "../utils/logger";
import { withInferredExtension } from "../utils/mime";
import type { RemoteFileRef } from "./functionTools";

export type ContainerFileRef = {
  /** Absent for legacy outputs stored in the Files API */
  containerId?: string;
  fileId: string;
  filename?: string;
  mimeType?: string;
};

export type ArtifactResolverOptions = {
  /** Bearer token for OpenAI downloads; read lazily so tests need no key */
  apiKey: () => string;
  fetchImpl?: typeof fetch;
  baseUrl?: string;
  timeoutMs?: number;
};

const SANDBOX_OUTPUT_TYPES = new Set(["file", "output_file"]);

/**
 * Every sandbox file a finalized response references, annotations first,
 * deduplicated on container + file id.
 */
export function collectContainerFiles(response: unknown): ContainerFileRef[] {
  const refs: ContainerFileRef[] = [];
  const seen = new Set<string>();

  const add = (ref: ContainerFileRef) => {
    const key = `${ref.containerId ?? ""}/${ref.fileId}`;
    if (seen.has(key)) return;
    seen.add(key);
    refs.push(ref);
  };

  const output = getArray(response, "output");

  for (const item of output) {
    if (getString(item, "type") !== "message") continue;
    for (const content of getArray(item, "content")) {
      for (const annotation of getArray(content, "annotations")) {
        if (getString(annotation, "type") !== "container_file_citation") continue;
        const containerId = getString(annotation, "container_id");
        const fileId = getString(annotation, "file_id");
        if (!containerId || !fileId) continue;
        add({ containerId, fileId, filename: getString(annotation, "filename") });
      }
    }
  }

  for (const item of output) {
    if (getString(item, "type") !== "code_interpreter_call") continue;
    const containerId = getString(item, "container_id");
    for (const out of getArray(item, "outputs")) {
      if (!SANDBOX_OUTPUT_TYPES.has(getString(out, "type") ?? "")) continue;
      const fileId = getString(out, "file_id") ?? getString(out, "id");
      if (!fileId) continue;
      add({
        containerId,
        fileId,
        filename: getString(out, "filename"),
        mimeType: getString(out, "mime_type"),
      });
    }
  }

  return refs;
}

export class ArtifactResolver {
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: ArtifactResolverOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl ?? OPENAI_API.BASE_URL;
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.ARTIFACT_DOWNLOAD_MS;
  }

  /**
   * Resolve both artifact sources independently. `response` may be
   * undefined when the turn never produced a finalized response.
   */
  async resolve(
    response: unknown,
    remoteFiles: readonly RemoteFileRef[],
    onWarning: (message: string) => void,
  ): Promise<GeneratedArtifact[]> {
    const sandbox = await this.resolveContainerFiles(collectContainerFiles(response), onWarning);
    const converted = await this.resolveRemoteFiles(remoteFiles, onWarning);
    return [...sandbox, ...converted];
  }

  async resolveContainerFiles(
    refs: readonly ContainerFileRef[],
    onWarning: (message: string) => void,
  ): Promise<GeneratedArtifact[]> {
    const artifacts: GeneratedArtifact[] = [];
    for (const ref of refs) {
      const url = ref.containerId
        ? `${this.baseUrl}/containers/${encodeURIComponent(ref.containerId)}/files/${encodeURIComponent(ref.fileId)}/content`
        : `${this.baseUrl}/files/${encodeURIComponent(ref.fileId)}/content`;
      try {
        const { bytes, contentType } = await this.download(url, {
          Authorization: `Bearer ${this.options.apiKey()}`,
        });
        const baseName = ref.filename ? path.basename(ref.filename) : `download_${ref.fileId}`;
        artifacts.push({
          filename: withInferredExtension(baseName, ref.mimeType ?? contentType),
          bytes,
          origin: "sandbox_execution",
        });
      } catch (err) {
        const message = `Could not download generated file ${ref.filename ?? ref.fileId}: ${getErrorMessage(err)}`;
        logWarn(`[ArtifactResolver] ${message}`);
        onWarning(message);
      }
    }
    return artifacts;
  }

  async resolveRemoteFiles(
    refs: readonly RemoteFileRef[],
    onWarning: (message: string) => void,
  ): Promise<GeneratedArtifact[]> {
    const artifacts: GeneratedArtifact[] = [];
    for (const ref of refs) {
      try {
        const { bytes, contentType } = await this.download(ref.url, ref.headers ?? {});
        artifacts.push({
          filename: withInferredExtension(ref.filename, ref.mimeType ?? contentType),
          bytes,
          origin: "conversion_function",
        });
      } catch (err) {
        const message = `Could not download ${ref.filename}: ${getErrorMessage(err)}`;
        logWarn(`[ArtifactResolver] ${message}`);
        onWarning(message);
      }
    }
    return artifacts;
  }

  private async download(url: string, headers: Record<string, string>): Promise<{ bytes: Buffer; contentType?: string }> {
    const response = await this.fetchImpl(url, {
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    const bytes = Buffer.from(await response.arrayBuffer());
    return { bytes, contentType: response.headers.get("content-type") ?? undefined };
  }
}
