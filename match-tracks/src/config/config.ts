import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type { MatchConfig, MatchConfigOverride, RunConfig } from "./types.js";
import { defaultConfig } from "./defaults.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import { STRATEGY_ORDER } from "../model/types.js";

const KEYED_PROVIDERS = new Set(["brave", "serper"]);
const KNOWN_PROVIDERS = new Set(["brave", "serper", "duckduckgo"]);

/**
 * Load config from the first available source:
 * 1. Explicit path (--config flag)
 * 2. ~/.config/match-tracks/config.json
 * 3. ./match-tracks.json
 *
 * Falls back to defaults if no config file exists. Command-line overrides
 * are merged over the file, then the result is validated and frozen.
 *
 * @throws ConfigurationError if a file is unreadable JSON or values are invalid
 */
export async function loadConfig(
  explicitPath?: string,
  cliOverride: MatchConfigOverride = {}
): Promise<RunConfig> {
  if (explicitPath) {
    const override = await readOverride(path.resolve(explicitPath));
    if (!override) {
      throw new ConfigurationError([`Configuration file not found: ${explicitPath}`]);
    }
    return resolveConfig(override, cliOverride);
  }

  const candidates = [
    path.join(os.homedir(), ".config", "match-tracks", "config.json"),
    path.resolve("match-tracks.json"),
  ];

  for (const candidate of candidates) {
    const override = await readOverride(candidate);
    if (override) {
      logger.info(`Found config at ${candidate}`);
      return resolveConfig(override, cliOverride);
    }
  }

  logger.info("No config file found, using defaults");
  return resolveConfig(cliOverride);
}

/**
 * Read a config file. Returns undefined when it does not exist.
 */
async function readOverride(filePath: string): Promise<MatchConfigOverride | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw new ConfigurationError([`Cannot read ${filePath}: ${errorMessage(error)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError([`${filePath} is not valid JSON: ${errorMessage(error)}`]);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError([`${filePath} must contain a JSON object`]);
  }
  return parsed as MatchConfigOverride;
}

/**
 * Merge overrides over the defaults in order, then validate and freeze.
 */
export function resolveConfig(...overrides: MatchConfigOverride[]): RunConfig {
  const merged = overrides.reduce<MatchConfig>((config, o) => mergeConfig(config, o), defaultConfig);
  validateConfig(merged);
  return freezeConfig(merged);
}

/**
 * Merge a partial config over defaults, section by section.
 */
export function mergeConfig(
  defaults: MatchConfig,
  override: MatchConfigOverride
): MatchConfig {
  const strategies = override.strategies;
  const rateLimits = override.rateLimits;

  return {
    catalog: { ...defaults.catalog, ...override.catalog },
    thresholds: { ...defaults.thresholds, ...override.thresholds },
    weights: { ...defaults.weights, ...override.weights },
    guards: { ...defaults.guards, ...override.guards },
    escalation: { ...defaults.escalation, ...override.escalation },
    remixDetection: { ...defaults.remixDetection, ...override.remixDetection },
    strategies: {
      direct: { ...defaults.strategies.direct, ...strategies?.direct },
      engine: { ...defaults.strategies.engine, ...strategies?.engine },
      browser: { ...defaults.strategies.browser, ...strategies?.browser },
    },
    rateLimits: {
      direct: { ...defaults.rateLimits.direct, ...rateLimits?.direct },
      engine: { ...defaults.rateLimits.engine, ...rateLimits?.engine },
      browser: { ...defaults.rateLimits.browser, ...rateLimits?.browser },
    },
    retry: { ...defaults.retry, ...override.retry },
    concurrency: override.concurrency ?? defaults.concurrency,
    cache: { ...defaults.cache, ...override.cache },
    limits: { ...defaults.limits, ...override.limits },
  };
}

/**
 * Validates the configuration
 * @throws ConfigurationError listing every problem found
 */
export function validateConfig(config: MatchConfig): void {
  const problems: string[] = [];

  const inRange = (name: string, value: unknown, min: number, max: number): void => {
    if (typeof value !== "number" || !Number.isFinite(value) || value < min || value > max) {
      problems.push(`${name} must be a number between ${min} and ${max}`);
    }
  };
  const positiveInt = (name: string, value: unknown): void => {
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
      problems.push(`${name} must be a positive integer`);
    }
  };
  const nonNegative = (name: string, value: unknown): void => {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      problems.push(`${name} must be zero or a positive number`);
    }
  };

  try {
    new URL(config.catalog.baseUrl);
  } catch {
    problems.push(`catalog.baseUrl is not a valid URL: ${config.catalog.baseUrl}`);
  }
  positiveInt("catalog.timeoutMs", config.catalog.timeoutMs);

  const { minAcceptScore, reviewFloor, highConfidenceScore } = config.thresholds;
  inRange("thresholds.minAcceptScore", minAcceptScore, 0, 100);
  inRange("thresholds.reviewFloor", reviewFloor, 0, 100);
  inRange("thresholds.highConfidenceScore", highConfidenceScore, 0, 100);
  if (reviewFloor > minAcceptScore) {
    problems.push("thresholds.reviewFloor must not exceed thresholds.minAcceptScore");
  }
  if (minAcceptScore > highConfidenceScore) {
    problems.push("thresholds.minAcceptScore must not exceed thresholds.highConfidenceScore");
  }

  const weights = config.weights;
  inRange("weights.title", weights.title, 0.5, 1);
  inRange("weights.artist", weights.artist, 0, 0.5);
  if (weights.title + weights.artist > 1) {
    problems.push("weights.title + weights.artist must not exceed 1");
  }
  inRange("weights.remixBonus", weights.remixBonus, 0, 15);
  inRange("weights.remixPenalty", weights.remixPenalty, 0, 15);
  inRange("weights.yearBonus", weights.yearBonus, 0, 5);

  inRange("guards.titleSimFloor", config.guards.titleSimFloor, 0, 100);
  inRange("guards.minTitleTokenCoverage", config.guards.minTitleTokenCoverage, 0, 1);
  inRange("guards.remixLabelMatchThreshold", config.guards.remixLabelMatchThreshold, 0, 100);

  positiveInt("escalation.minCandidates", config.escalation.minCandidates);

  if (!Array.isArray(config.remixDetection.mixKeywords) || config.remixDetection.mixKeywords.length === 0) {
    problems.push("remixDetection.mixKeywords must list at least one keyword");
  }
  if (!Array.isArray(config.remixDetection.neutralLabels)) {
    problems.push("remixDetection.neutralLabels must be a list");
  }

  const engine = config.strategies.engine;
  if (!Array.isArray(engine.engines)) {
    problems.push("strategies.engine.engines must be a list");
  } else {
    engine.engines.forEach((entry, i) => {
      if (!KNOWN_PROVIDERS.has(entry.provider)) {
        problems.push(`strategies.engine.engines[${i}].provider "${entry.provider}" is not supported`);
      } else if (KEYED_PROVIDERS.has(entry.provider) && !entry.apiKey) {
        problems.push(`strategies.engine.engines[${i}] (${entry.provider}) requires an apiKey`);
      }
      if (entry.maxResults !== undefined) {
        positiveInt(`strategies.engine.engines[${i}].maxResults`, entry.maxResults);
      }
    });
  }
  positiveInt("strategies.engine.maxPagesPerQuery", engine.maxPagesPerQuery);
  nonNegative("strategies.engine.failureCooldownMs", engine.failureCooldownMs);
  positiveInt("strategies.browser.maxContexts", config.strategies.browser.maxContexts);
  positiveInt("strategies.browser.timeoutMs", config.strategies.browser.timeoutMs);

  for (const tag of STRATEGY_ORDER) {
    const limit = config.rateLimits[tag];
    positiveInt(`rateLimits.${tag}.concurrency`, limit.concurrency);
    positiveInt(`rateLimits.${tag}.intervalCap`, limit.intervalCap);
    nonNegative(`rateLimits.${tag}.intervalMs`, limit.intervalMs);
  }

  nonNegative("retry.backoffMs", config.retry.backoffMs);
  positiveInt("concurrency", config.concurrency);
  nonNegative("cache.ttlSeconds", config.cache.ttlSeconds);
  positiveInt("limits.maxRanks", config.limits.maxRanks);
  nonNegative("limits.perTrackTimeBudgetMs", config.limits.perTrackTimeBudgetMs);

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
}

/**
 * Deep-copy and freeze a config so no component can change it mid-run.
 */
export function freezeConfig(config: MatchConfig): RunConfig {
  const copy: MatchConfig = structuredClone(config);
  freezeDeep(copy);
  return copy;
}

function freezeDeep(value: object): void {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null) {
      freezeDeep(child);
    }
  }
  Object.freeze(value);
}
