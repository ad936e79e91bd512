import type { RunConfig } from "../config/types.js";
import type { Query, SourceTrack } from "../model/types.js";
import { resolveSourceMix } from "../matching/mix-parser.js";

/**
 * Join non-empty parts with single spaces
 */
function joinParts(...parts: (string | undefined)[]): string {
  return parts
    .filter((p): p is string => Boolean(p && p.trim()))
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Remove bracketed qualifiers and punctuation, keeping letters (with
 * accents), digits and spaces.
 *
 * "Don't Stop (Live) [2019]" -> "Dont Stop"
 */
export function stripForSearch(text: string): string {
  return text
    .replace(/\([^)]*\)/g, " ")
    .replace(/\[[^\]]*\]/g, " ")
    .replace(/['’]/g, "")
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Last word of an artist name ("Bart Skils" -> "Skils")
 */
function surname(artist: string): string {
  const words = stripForSearch(artist).split(" ");
  return words[words.length - 1] ?? artist;
}

/**
 * Produce the ordered query sequence for a track, most specific first:
 *
 *   0  title + remix label + all artists
 *   1  title + remix label + primary artist
 *   2  title + primary artist (label dropped)
 *   3  title without punctuation or qualifiers + primary artist
 *   4  stripped title + primary artist surname
 *
 * Deterministic and offline. Ranks are not deduplicated; repeated text is
 * served from the cache. At most `limits.maxRanks` queries are returned.
 */
export function planQueries(track: SourceTrack, config: RunConfig): Query[] {
  const { title, label } = resolveSourceMix(track, config.remixDetection);
  const primary = track.artists[0] ?? "";
  const strippedTitle = stripForSearch(title) || title;

  const texts = [
    joinParts(title, label, ...track.artists),
    joinParts(title, label, primary),
    joinParts(title, primary),
    joinParts(strippedTitle, stripForSearch(primary)),
    joinParts(strippedTitle, surname(primary)),
  ];

  return texts
    .slice(0, config.limits.maxRanks)
    .map((text, rank): Query => ({ text, strategy: "direct", rank }));
}
