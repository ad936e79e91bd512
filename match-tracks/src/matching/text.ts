import * as fuzz from "fuzzball";

/**
 * Words ignored when checking title token coverage. Mix words are here too,
 * since the mix label is compared separately.
 */
const STOP_WORDS = new Set([
  "the", "a", "an", "and", "of", "to", "for", "in", "on", "with", "vs", "x",
  "feat", "ft", "featuring", "mix", "edit", "remix", "version", "club", "radio",
  "original", "extended", "vip", "dub", "rework", "refire", "re-fire",
]);

const ARTIST_SEPARATORS = /\s*[,&/]\s*|\s+(?:x|vs\.?|with|feat\.?|ft\.?|featuring)\s+/i;

/**
 * Strip diacritics ("Björk" -> "Bjork")
 */
function stripDiacritics(str: string): string {
  return str.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Normalize text for comparison: accents removed, lowercase, dashes and
 * punctuation turned into spaces, whitespace collapsed.
 *
 * "Café del Mar – Energy 52" -> "cafe del mar energy 52"
 */
export function normalizeText(s: string): string {
  if (!s) return "";
  return stripDiacritics(s)
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

/**
 * Remove featuring clauses and every bracketed qualifier, then normalize.
 *
 * "Never Sleep Again (Keinemusik Remix) [feat. Someone]" -> "never sleep again"
 */
export function cleanTitle(title: string): string {
  const stripped = title
    .replace(/\s*[([]\s*(?:feat|ft|featuring)\b[^)\]]*[)\]]/gi, " ")
    .replace(/\s+(?:feat|ft|featuring)\.?\s.*$/i, " ")
    .replace(/\([^)]*\)/g, " ")
    .replace(/\[[^\]]*\]/g, " ");
  return normalizeText(stripped);
}

/**
 * Split a credit string into individual artists, keeping order and dropping
 * case-insensitive duplicates.
 *
 * "Adam Beyer & Bart Skils feat. Ida Engberg" -> ["Adam Beyer", "Bart Skils", "Ida Engberg"]
 */
export function splitArtists(credit: string): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const part of credit.split(ARTIST_SEPARATORS)) {
    const name = part.trim();
    const key = normalizeText(name);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(name);
  }
  return result;
}

/**
 * Normalize an artist name; a leading "the" is not significant.
 */
export function normalizeArtist(name: string): string {
  return normalizeText(name).replace(/^the\s+/, "");
}

/**
 * Title tokens that must be found in a candidate title: three or more
 * characters and not a stop word.
 */
export function significantTokens(title: string): string[] {
  const tokens = cleanTitle(title).split(" ");
  return [...new Set(tokens.filter((t) => t.length >= 3 && !STOP_WORDS.has(t)))];
}

/**
 * Edit-distance similarity, 0-100.
 */
export function similarity(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 100;
  return fuzz.ratio(a, b);
}

/**
 * Best one-to-one alignment between two artist lists, 0-100.
 *
 * Pairs are taken greedily by descending similarity (ties by position), and
 * the total is averaged over the source list, so reordering costs nothing and
 * extra candidate artists (featured credits) do not dilute the score.
 */
export function artistSimilarity(
  source: readonly string[],
  candidate: readonly string[]
): number {
  const a = source.map(normalizeArtist).filter(Boolean);
  const b = candidate.map(normalizeArtist).filter(Boolean);
  if (a.length === 0 || b.length === 0) return 0;

  const pairs: { i: number; j: number; score: number }[] = [];
  a.forEach((x, i) => {
    b.forEach((y, j) => pairs.push({ i, j, score: similarity(x, y) }));
  });
  pairs.sort((p, q) => q.score - p.score || p.i - q.i || p.j - q.j);

  const usedA = new Set<number>();
  const usedB = new Set<number>();
  let total = 0;
  for (const pair of pairs) {
    if (usedA.has(pair.i) || usedB.has(pair.j)) continue;
    usedA.add(pair.i);
    usedB.add(pair.j);
    total += pair.score;
  }
  return Math.round((total / a.length) * 100) / 100;
}
