import { DEFAULT_MIME_TYPE, MIME_TYPES } from "../config/constants";

export function fileExtension(filename: string): string | undefined {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const dot = base.lastIndexOf(".");
  if (dot <= 0 || dot === base.length - 1) return undefined;
  return base.slice(dot + 1).toLowerCase();
}

export function stripTrailingDots(filename: string): string {
  return filename.replace(/\.+$/, "");
}

export function guessMimeType(filename: string): string {
  const ext = fileExtension(filename);
  return (ext && MIME_TYPES[ext]) || DEFAULT_MIME_TYPE;
}

export function extensionForMime(mimeType: string): string | undefined {
  const normalized = mimeType.split(";")[0].trim().toLowerCase();
  return Object.entries(MIME_TYPES).find(([, mime]) => mime === normalized)?.[0];
}

/**
 * Append an extension inferred from `mimeType` when `filename` has none.
 * Without a known MIME type the name is returned unchanged.
 */
export function withInferredExtension(filename: string, mimeType: string | undefined): string {
  if (fileExtension(filename) || !mimeType) return filename;
  const ext = extensionForMime(mimeType);
  return ext ? `${stripTrailingDots(filename)}.${ext}` : filename;
}
