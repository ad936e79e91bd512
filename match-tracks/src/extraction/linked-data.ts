import * as cheerio from "cheerio";
import type { Candidate, RawDocument } from "../model/types.js";
import { ExtractionError, errorMessage } from "../errors.js";
import { buildCandidate, isRecord, names, parseTrackUrl, pick, text } from "./fields.js";
import type { ExtractionContext, ExtractionPath } from "./types.js";

const RECORDING_TYPES = new Set(["MusicRecording", "MusicComposition"]);

/** Objects in a JSON-LD block, flattening arrays and @graph */
function nodes(value: unknown): Record<string, unknown>[] {
  if (Array.isArray(value)) return value.flatMap(nodes);
  if (!isRecord(value)) return [];
  return [value, ...nodes(value["@graph"])];
}

/**
 * Reads schema.org MusicRecording blocks, which single track pages carry.
 */
export const linkedDataPath: ExtractionPath = {
  kind: "linked-data",

  applies(doc: RawDocument): boolean {
    return doc.contentType === "html" && doc.body.includes("application/ld+json");
  },

  *extract(doc: RawDocument, context: ExtractionContext): Generator<Candidate> {
    const $ = cheerio.load(doc.body);
    const blocks = $('script[type="application/ld+json"]')
      .map((_, el) => $(el).text())
      .get();

    for (const block of blocks) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(block);
      } catch (error) {
        throw new ExtractionError(
          `Linked data does not parse: ${errorMessage(error)}`,
          doc.url,
          "linked-data"
        );
      }

      for (const node of nodes(parsed)) {
        const type = text(node["@type"]);
        if (!type || !RECORDING_TYPES.has(type)) continue;
        const url = text(node.url) ?? doc.url;
        const ids = parseTrackUrl(url) ?? parseTrackUrl(doc.url);
        const name = pick(node, "name");
        if (!ids || !name) continue;

        const album = node.inAlbum;
        yield buildCandidate(
          {
            id: ids.id,
            slug: ids.slug,
            name,
            artists: names(node.byArtist),
            remixers: [...names(node.contributor), ...names(node.creator)],
            releaseDate: pick(node, "datePublished"),
            label: isRecord(album) ? pick(album, "publisher") : undefined,
            url: parseTrackUrl(url) ? url : doc.url,
          },
          context
        );
      }
    }
  },
};
