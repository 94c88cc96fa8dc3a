import type { SupportedExtension } from "./extractor";
import type { Metadata, SourceDocument } from "./types";

/** Document for an uploaded (or seeded) file; the file name is both id and label. */
export function fileDocument(
  filename: string,
  text: string,
  fileType: SupportedExtension,
  extra: Metadata = {},
): SourceDocument {
  return {
    id: filename,
    source: filename,
    text,
    metadata: { ...extra, type: "file", fileType, ingestedAt: new Date().toISOString() },
  };
}

export interface CmsContent {
  content: string;
  source: string;
  metadata: Metadata;
  /** Defaults to `cms:<source>`, so re-importing a source replaces its chunks. */
  id?: string;
}

export function cmsDocument(input: CmsContent): SourceDocument {
  return {
    id: input.id?.trim() || `cms:${input.source}`,
    source: input.source,
    text: input.content,
    metadata: { ...input.metadata, type: "cms", ingestedAt: new Date().toISOString() },
  };
}
