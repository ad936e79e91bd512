import { describe, it, expect, beforeAll, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadSourceTracks, parseSourceTracks } from "./source-tracks.js";
import { logger } from "../utils/logger.js";

beforeAll(() => {
  logger.setQuiet(true);
});

describe("parseSourceTracks", () => {
  it("reads artists lists and credit strings", () => {
    expect(
      parseSourceTracks([
        { id: "a1", title: "Never Sleep Again", artists: ["Example Artist"], remix: "Keinemusik Remix" },
        { title: "Hold On", artist: "First Person & Second Person feat. Third Person", year: "2021" },
      ])
    ).toEqual([
      { id: "a1", title: "Never Sleep Again", artists: ["Example Artist"], remix: "Keinemusik Remix" },
      { id: "2", title: "Hold On", artists: ["First Person", "Second Person", "Third Person"], year: 2021 },
    ]);
  });

  it("skips rows without a title or an artist", () => {
    const tracks = parseSourceTracks([
      { title: "", artist: "Example Artist" },
      { title: "No Credit" },
      "not a row",
      { title: "Kept", artists: ["Example Artist"] },
    ]);
    expect(tracks).toEqual([{ id: "4", title: "Kept", artists: ["Example Artist"] }]);
  });

  it("rejects a non-array document", () => {
    expect(() => parseSourceTracks({ tracks: [] })).toThrow("Track list must be a JSON array");
  });
});

describe("loadSourceTracks", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("loads a file", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "match-tracks-input-"));
    const file = path.join(dir, "tracks.json");
    await fs.writeFile(file, JSON.stringify([{ title: "Hold On", artist: "Example Artist" }]));

    expect(await loadSourceTracks(file)).toEqual([
      { id: "1", title: "Hold On", artists: ["Example Artist"] },
    ]);
  });

  it("reports invalid JSON", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "match-tracks-input-"));
    const file = path.join(dir, "tracks.json");
    await fs.writeFile(file, "[{");

    await expect(loadSourceTracks(file)).rejects.toThrow(`${file} is not valid JSON`);
  });
});
