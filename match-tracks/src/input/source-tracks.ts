import * as fs from "node:fs/promises";
import type { SourceTrack } from "../model/types.js";
import { errorMessage } from "../errors.js";
import { splitArtists } from "../matching/text.js";
import { logger } from "../utils/logger.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Artists from either an `artists` list or a single `artist` credit string
 * ("A & B feat. C").
 */
function readArtists(row: Record<string, unknown>): string[] {
  if (Array.isArray(row.artists)) {
    const names = row.artists.filter((a): a is string => typeof a === "string");
    return names.flatMap(splitArtists);
  }
  if (typeof row.artist === "string") {
    return splitArtists(row.artist);
  }
  return [];
}

function readYear(value: unknown): number | undefined {
  const year = typeof value === "string" ? Number.parseInt(value, 10) : value;
  return typeof year === "number" && Number.isInteger(year) && year > 0 ? year : undefined;
}

/**
 * Convert parsed rows into tracks. Rows without a title or an artist are
 * skipped with a warning; ids default to the 1-based row number.
 */
export function parseSourceTracks(rows: unknown): SourceTrack[] {
  if (!Array.isArray(rows)) {
    throw new Error("Track list must be a JSON array");
  }

  const tracks: SourceTrack[] = [];
  rows.forEach((row: unknown, index) => {
    const rowNumber = index + 1;
    if (!isRecord(row)) {
      logger.warn(`Skipping row ${rowNumber}: not an object`);
      return;
    }
    const title = optionalString(row.title);
    const artists = readArtists(row);
    if (!title || artists.length === 0) {
      logger.warn(`Skipping row ${rowNumber}: ${title ? "no artist" : "no title"}`);
      return;
    }

    const remix = optionalString(row.remix);
    const year = readYear(row.year);
    tracks.push({
      id: optionalString(row.id) ?? String(rowNumber),
      title,
      artists,
      ...(remix ? { remix } : {}),
      ...(year !== undefined ? { year } : {}),
    });
  });
  return tracks;
}

/**
 * Read a JSON track list:
 *   [{ "id"?, "title", "artists" | "artist", "remix"?, "year"? }, ...]
 */
export async function loadSourceTracks(filePath: string): Promise<SourceTrack[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new Error(`Cannot read track list ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const tracks = parseSourceTracks(parsed);
  logger.info(`Loaded ${tracks.length} tracks from ${filePath}`);
  return tracks;
}
