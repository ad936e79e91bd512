#!/usr/bin/env node
import { buildApplication, buildCommand, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import { matchTracks } from "./match-tracks.js";
import type { CliFlags } from "./config/types.js";

function parseConcurrency(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

const matchCommand = buildCommand({
  docs: {
    brief: "Find catalog listings for the tracks of a playlist, with an auditable decision per track",
  },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "JSON file with the tracks to match",
          parse: String,
          placeholder: "tracks.json",
        },
      ],
    },
    flags: {
      config: {
        kind: "parsed",
        brief: "Path to config JSON file",
        parse: String,
        optional: true,
      },
      output: {
        kind: "parsed",
        brief: "Write the audit streams to this JSON file",
        parse: String,
        optional: true,
      },
      concurrency: {
        kind: "parsed",
        brief: "Tracks processed in parallel",
        parse: parseConcurrency,
        optional: true,
      },
      cache: {
        kind: "boolean",
        brief: "Use the response cache (--no-cache to disable)",
        default: true,
      },
      debug: {
        kind: "boolean",
        brief: "Enable debug logging",
        default: false,
      },
    },
    aliases: {
      c: "config",
      o: "output",
      d: "debug",
    },
  },
  async func(this: CommandContext, flags: CliFlags, tracksPath: string): Promise<void> {
    const controller = new AbortController();
    const onInterrupt = (): void => {
      console.error("\nInterrupted, finishing in-flight work...");
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
      await matchTracks(tracksPath, { ...flags, signal: controller.signal });
    } catch (e) {
      console.error(`\nFATAL: ${e instanceof Error ? e.message : String(e)}`);
      process.exitCode = 1;
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  },
});

const app = buildApplication(matchCommand, {
  name: "match-tracks",
  versionInfo: {
    currentVersion: "0.1.0",
  },
  scanner: {
    caseStyle: "allow-kebab-for-camel",
  },
});

run(app, process.argv.slice(2), { process });
