import type { RunConfig } from "../config/types.js";
import type { SourceTrack } from "../model/types.js";
import { normalizeText } from "./text.js";

export type RemixDetection = RunConfig["remixDetection"];

/** A title with its mix label separated out */
export interface MixSplit {
  title: string;
  /** Label as written, e.g. "Keinemusik Remix" */
  label?: string;
}

function hasKeyword(text: string, keywords: readonly string[]): boolean {
  const padded = ` ${normalizeText(text)} `;
  return keywords.some((kw) => padded.includes(` ${normalizeText(kw)} `));
}

/**
 * Separate a trailing mix label from a title.
 *
 * Recognises the last bracketed group that contains a mix keyword, or a
 * " - " suffix that does:
 *   "Never Sleep Again (Keinemusik Remix)" -> { title: "Never Sleep Again", label: "Keinemusik Remix" }
 *   "Tighter - CamelPhat Remix"            -> { title: "Tighter", label: "CamelPhat Remix" }
 */
export function splitMixLabel(title: string, keywords: readonly string[]): MixSplit {
  const groups = [...title.matchAll(/\(([^)]*)\)|\[([^\]]*)\]/g)];
  for (let i = groups.length - 1; i >= 0; i--) {
    const group = groups[i];
    const content = (group[1] ?? group[2] ?? "").trim();
    if (content && hasKeyword(content, keywords)) {
      const index = group.index ?? 0;
      const rest = `${title.slice(0, index)} ${title.slice(index + group[0].length)}`;
      return { title: rest.replace(/\s+/g, " ").trim(), label: content };
    }
  }

  const dashed = /^(.*\S)\s+[-–—]\s+([^-–—]+)$/.exec(title);
  if (dashed && hasKeyword(dashed[2], keywords)) {
    return { title: dashed[1].trim(), label: dashed[2].trim() };
  }

  return { title: title.trim() };
}

/**
 * True for labels that mean "the original version" (original mix, extended mix, ...)
 */
export function isNeutralLabel(label: string, neutralLabels: readonly string[]): boolean {
  const normalized = normalizeText(label);
  return neutralLabels.some((n) => normalizeText(n) === normalized);
}

/**
 * The normalized label that counts for remix identity, or undefined when the
 * label is absent or neutral.
 */
export function effectiveRemixLabel(
  label: string | undefined,
  detection: RemixDetection
): string | undefined {
  if (!label) return undefined;
  const normalized = normalizeText(label);
  if (!normalized || isNeutralLabel(normalized, detection.neutralLabels)) {
    return undefined;
  }
  return normalized;
}

/**
 * Catalogs often store the mix as a bare keyword ("Remix") with remixers in a
 * separate field. Put the remixer names in front so labels compare by identity.
 *
 * ("Remix", ["Keinemusik"]) -> "Keinemusik Remix"
 */
export function qualifyMixLabel(
  label: string,
  remixers: readonly string[],
  keywords: readonly string[]
): string {
  if (remixers.length === 0) return label;
  const normalizedKeywords = new Set(keywords.map(normalizeText));
  const tokens = normalizeText(label).split(" ").filter(Boolean);
  const bare = tokens.length > 0 && tokens.every((t) => normalizedKeywords.has(t));
  return bare ? `${remixers.join(" & ")} ${label}` : label;
}

/**
 * Title and mix label for a source track. An explicit remix field wins over
 * a label parsed from the title; a parsed label is removed from the title
 * either way.
 */
export function resolveSourceMix(track: SourceTrack, detection: RemixDetection): MixSplit {
  const split = splitMixLabel(track.title, detection.mixKeywords);
  const explicit = track.remix?.trim();
  const label = explicit || split.label;
  return label ? { title: split.title, label } : { title: split.title };
}

/**
 * Whether a track asks for a specific (non-neutral) remix
 */
export function isRemixTrack(track: SourceTrack, detection: RemixDetection): boolean {
  return effectiveRemixLabel(resolveSourceMix(track, detection).label, detection) !== undefined;
}
