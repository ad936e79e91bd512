import PQueue from "p-queue";
import type { RunConfig } from "../config/types.js";
import type { StrategyTag } from "../model/types.js";
import { STRATEGY_ORDER } from "../model/types.js";

/**
 * Process-wide throttle with one queue per retrieval strategy, shared by
 * every worker.
 */
export class RateLimiter {
  private queues = new Map<StrategyTag, PQueue>();

  constructor(limits: RunConfig["rateLimits"]) {
    for (const tag of STRATEGY_ORDER) {
      const limit = limits[tag];
      this.queues.set(
        tag,
        new PQueue({
          concurrency: limit.concurrency,
          intervalCap: limit.intervalCap,
          interval: limit.intervalMs,
          carryoverConcurrencyCount: true,
        })
      );
    }
  }

  /**
   * Run a task when the strategy's queue allows it. A task still waiting
   * when the signal aborts never starts.
   */
  async schedule<T>(tag: StrategyTag, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const queue = this.queues.get(tag);
    if (!queue) return task();
    return queue.add(task, { signal, throwOnTimeout: true });
  }
}
