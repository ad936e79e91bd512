import type { RunConfig } from "../config/types.js";
import type { Candidate, RawDocument } from "../model/types.js";

export type ExtractionPathKind = "embedded-state" | "linked-data" | "structured-markup";

/** What an extraction path needs besides the document */
export interface ExtractionContext {
  baseUrl: string;
  queryRank: number;
  remixDetection: RunConfig["remixDetection"];
}

/**
 * One way of reading candidates out of a document. Paths are tried in
 * priority order; `applies` is the explicit shape test.
 */
export interface ExtractionPath {
  readonly kind: ExtractionPathKind;
  applies(doc: RawDocument): boolean;
  /** @throws ExtractionError when the document has the shape but not the content */
  extract(doc: RawDocument, context: ExtractionContext): Iterable<Candidate>;
}

export interface ExtractionFailure {
  documentUrl: string;
  path: ExtractionPathKind | "none";
  reason: string;
}

/** Track fields as found in a document, before normalization */
export interface RawTrackFields {
  id: string;
  slug?: string;
  name: string;
  mixName?: string;
  artists: string[];
  remixers: string[];
  releaseDate?: string;
  label?: string;
  bpm?: number;
  key?: string;
  url?: string;
}
