import * as cheerio from "cheerio";
import type { Candidate, RawDocument } from "../model/types.js";
import { ExtractionError, errorMessage } from "../errors.js";
import { buildCandidate, isRecord, names, num, parseTrackUrl, pick, text } from "./fields.js";
import type { ExtractionContext, ExtractionPath, RawTrackFields } from "./types.js";

const LIST_KEYS = ["results", "tracks", "items", "data"];

/** Follow a fixed key path through nested objects */
function at(root: unknown, ...keys: string[]): unknown {
  let node = root;
  for (const key of keys) {
    if (!isRecord(node)) return undefined;
    node = node[key];
  }
  return node;
}

function isTrackEntry(value: unknown): value is Record<string, unknown> {
  return (
    isRecord(value) &&
    (typeof value.id === "number" || typeof value.id === "string") &&
    pick(value, "name", "track_name", "title") !== undefined
  );
}

/** Track entries inside one query's data: a result list or a single track */
function entriesOf(data: unknown): Record<string, unknown>[] {
  if (isTrackEntry(data)) return [data];
  if (Array.isArray(data)) return data.filter(isTrackEntry);
  for (const key of LIST_KEYS) {
    const value = at(data, key);
    if (Array.isArray(value)) return value.filter(isTrackEntry);
  }
  return [];
}

/** undefined when the layout is absent, [] when present but empty */
type Finder = (root: unknown) => Record<string, unknown>[] | undefined;

function fromQueries(...keys: string[]): Finder {
  return (root) => {
    const queries = at(root, ...keys, "queries");
    if (!Array.isArray(queries)) return undefined;
    return queries.flatMap((q) => entriesOf(at(q, "state", "data")));
  };
}

/**
 * Known places for track data, newest layout first. The first one holding
 * entries wins.
 */
const HYDRATION_PATHS: Finder[] = [
  fromQueries("props", "pageProps", "dehydratedState"),
  (root) => {
    const track = at(root, "props", "pageProps", "track");
    return isTrackEntry(track) ? [track] : undefined;
  },
  fromQueries("pageProps", "dehydratedState"),
  fromQueries("dehydratedState"),
  (root) => {
    if (Array.isArray(root)) return root.filter(isTrackEntry);
    return LIST_KEYS.some((key) => Array.isArray(at(root, key))) ? entriesOf(root) : undefined;
  },
];

/**
 * Map one hydrated track object to raw fields
 */
export function readTrackEntry(entry: Record<string, unknown>): RawTrackFields {
  const name = pick(entry, "name", "track_name", "title") ?? "";
  const keyValue = entry.key;
  const key = isRecord(keyValue) ? pick(keyValue, "name", "key_name") : text(keyValue);
  const label = entry.label;
  const release = entry.release;
  const url = text(entry.url);

  return {
    id: text(entry.id) ?? "",
    slug: pick(entry, "slug") ?? (url ? parseTrackUrl(url)?.slug : undefined),
    name,
    mixName: pick(entry, "mix_name", "mix"),
    artists: names(entry.artists, "name", "artist_name"),
    remixers: names(entry.remixers, "name", "artist_name"),
    releaseDate:
      pick(entry, "publish_date", "new_release_date", "release_date") ??
      (isRecord(release) ? pick(release, "release_date", "date") : undefined),
    label: isRecord(label) ? pick(label, "name", "label_name") : text(label) ?? pick(entry, "label_name"),
    bpm: num(entry.bpm),
    key: key ?? pick(entry, "key_name"),
    url,
  };
}

/**
 * The hydration JSON of a document: the body itself for JSON responses, or
 * the `__NEXT_DATA__` script of an HTML page.
 */
function hydrationJson(doc: RawDocument): unknown {
  const raw =
    doc.contentType === "json" ? doc.body : cheerio.load(doc.body)("script#__NEXT_DATA__").text();
  if (!raw.trim()) {
    throw new ExtractionError("Hydration script is empty", doc.url, "embedded-state");
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ExtractionError(
      `Hydration JSON does not parse: ${errorMessage(error)}`,
      doc.url,
      "embedded-state"
    );
  }
}

/**
 * Reads the hydrated client state embedded in server responses. Pages that
 * render results client-side carry their data only here.
 */
export const embeddedStatePath: ExtractionPath = {
  kind: "embedded-state",

  applies(doc: RawDocument): boolean {
    return doc.contentType === "json" || doc.body.includes("__NEXT_DATA__");
  },

  *extract(doc: RawDocument, context: ExtractionContext): Generator<Candidate> {
    const root = hydrationJson(doc);
    let recognised = false;
    for (const find of HYDRATION_PATHS) {
      const entries = find(root);
      if (entries === undefined) continue;
      recognised = true;
      if (entries.length === 0) continue;
      for (const entry of entries) {
        const fields = readTrackEntry(entry);
        if (fields.id && fields.name) yield buildCandidate(fields, context);
      }
      return;
    }
    if (!recognised) {
      throw new ExtractionError("No known hydration path holds track data", doc.url, "embedded-state");
    }
  },
};
