import type { Candidate } from "../model/types.js";
import { cleanTitle, normalizeText, splitArtists } from "../matching/text.js";
import { qualifyMixLabel, splitMixLabel } from "../matching/mix-parser.js";
import type { ExtractionContext, RawTrackFields } from "./types.js";

const TRACK_URL_ID = /\/track\/([^/?#]+)\/(\d+)/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Non-empty trimmed string, or undefined */
export function text(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.replace(/\s+/g, " ").trim();
    return trimmed || undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

export function num(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** First of several keys holding a usable string */
export function pick(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = text(record[key]);
    if (value) return value;
  }
  return undefined;
}

/**
 * Names from a list of strings or `{ name }`-like objects, or from a single
 * credit string.
 */
export function names(value: unknown, ...keys: string[]): string[] {
  const nameKeys = keys.length > 0 ? keys : ["name"];
  if (typeof value === "string") return splitArtists(value);
  if (isRecord(value)) {
    const single = pick(value, ...nameKeys);
    return single ? [single] : [];
  }
  if (!Array.isArray(value)) return [];
  const result: string[] = [];
  for (const item of value) {
    const name = isRecord(item) ? pick(item, ...nameKeys) : text(item);
    if (name && !result.includes(name)) result.push(name);
  }
  return result;
}

/** Slug and numeric id from a catalog track URL */
export function parseTrackUrl(url: string): { slug: string; id: string } | undefined {
  const match = TRACK_URL_ID.exec(url);
  return match ? { slug: match[1], id: match[2] } : undefined;
}

/**
 * Normalize raw fields into a Candidate. The mix label is taken from its own
 * field when the catalog has one, otherwise split off the name.
 */
export function buildCandidate(raw: RawTrackFields, context: ExtractionContext): Candidate {
  const keywords = context.remixDetection.mixKeywords;
  const split = raw.mixName ? { title: raw.name, label: raw.mixName } : splitMixLabel(raw.name, keywords);
  const label = split.label ? qualifyMixLabel(split.label, raw.remixers, keywords) : undefined;
  const remix = label ? normalizeText(label) : "";

  const sourceUrl =
    raw.url ?? `${context.baseUrl.replace(/\/$/, "")}/track/${raw.slug ?? "-"}/${raw.id}`;

  const candidate: Candidate = {
    catalogId: raw.id,
    title: cleanTitle(split.title),
    displayTitle: raw.mixName ? `${raw.name} (${raw.mixName})` : raw.name,
    artists: raw.artists.map(normalizeText).filter(Boolean),
    sourceUrl,
    queryRank: context.queryRank,
  };
  if (remix) candidate.remix = remix;
  if (raw.releaseDate) candidate.releaseDate = raw.releaseDate;
  if (raw.label) candidate.label = raw.label;
  if (raw.bpm !== undefined) candidate.bpm = raw.bpm;
  if (raw.key) candidate.key = raw.key;
  return candidate;
}
