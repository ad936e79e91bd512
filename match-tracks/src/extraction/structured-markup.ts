import * as cheerio from "cheerio";
import type { Candidate, RawDocument } from "../model/types.js";
import { buildCandidate, num, parseTrackUrl, text } from "./fields.js";
import type { ExtractionContext, ExtractionPath } from "./types.js";

/**
 * Reads server-rendered listing rows (`li.bucket-item` with `buk-track-*`
 * fields).
 */
export const structuredMarkupPath: ExtractionPath = {
  kind: "structured-markup",

  applies(doc: RawDocument): boolean {
    return doc.contentType === "html" && doc.body.includes("buk-track");
  },

  *extract(doc: RawDocument, context: ExtractionContext): Generator<Candidate> {
    const $ = cheerio.load(doc.body);
    const base = context.baseUrl.replace(/\/$/, "");

    for (const row of $(".bucket-item").toArray()) {
      const item = $(row);
      const href = item.find('a[href*="/track/"]').first().attr("href") ?? "";
      const ids = parseTrackUrl(href);
      const name = text(item.find(".buk-track-primary-title").first().text());
      if (!ids || !name) continue;

      const listText = (selector: string): string[] =>
        item
          .find(selector)
          .toArray()
          .map((el) => text($(el).text()))
          .filter((v): v is string => v !== undefined);

      yield buildCandidate(
        {
          id: ids.id,
          slug: ids.slug,
          name,
          mixName: text(item.find(".buk-track-remixed").first().text()),
          artists: listText(".buk-track-artists a"),
          remixers: listText(".buk-track-remixers a"),
          releaseDate: text(item.find(".buk-track-released").first().text()),
          label: text(item.find(".buk-track-labels a").first().text()),
          bpm: num(item.find(".buk-track-bpm").first().text()),
          key: text(item.find(".buk-track-key").first().text()),
          url: href.startsWith("http") ? href : `${base}${href}`,
        },
        context
      );
    }
  },
};
