import { chromium, type Browser } from "playwright-core";
import PQueue from "p-queue";
import type { RunConfig } from "../config/types.js";
import type { Query, RawDocument } from "../model/types.js";
import { RetrievalError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { RateLimiter } from "./rate-limiter.js";
import { ThrottledStrategy } from "./strategy.js";
import { CANCELLED } from "./http.js";
import { searchUrl } from "./direct.js";

/** Starts a browser; replaced in tests */
export type BrowserLauncher = (executablePath: string) => Promise<Browser>;

const launchChromium: BrowserLauncher = (executablePath) =>
  chromium.launch({ executablePath, headless: true });

/**
 * Renders the catalog search page in a headless browser so client-side
 * results are present in the HTML.
 *
 * Optional: without an executable, or after a failed launch, the strategy
 * reports itself unavailable and the pipeline carries on without it.
 * Contexts are capped separately from the request rate limit.
 */
export class BrowserAutomationStrategy extends ThrottledStrategy {
  readonly tag = "browser";
  readonly description = "headless browser rendering";

  private browser?: Promise<Browser>;
  private launchFailed = false;
  private contexts: PQueue;

  constructor(
    private readonly settings: RunConfig["strategies"]["browser"],
    private readonly catalog: RunConfig["catalog"],
    limiter: RateLimiter,
    private readonly launch: BrowserLauncher = launchChromium
  ) {
    super(limiter);
    this.contexts = new PQueue({ concurrency: settings.maxContexts });
  }

  isAvailable(): boolean {
    return this.settings.enabled && Boolean(this.settings.executablePath) && !this.launchFailed;
  }

  private async getBrowser(): Promise<Browser> {
    const executablePath = this.settings.executablePath;
    if (!executablePath) {
      throw new RetrievalError("No browser executable configured", this.tag, false);
    }
    if (!this.browser) {
      logger.debug(`Launching browser ${executablePath}`);
      this.browser = this.launch(executablePath);
    }
    try {
      return await this.browser;
    } catch (error) {
      this.launchFailed = true;
      logger.warn(`Browser launch failed, disabling browser strategy: ${errorMessage(error)}`);
      throw new RetrievalError(`Browser launch failed: ${errorMessage(error)}`, this.tag, false);
    }
  }

  protected async retrieve(query: Query, signal?: AbortSignal): Promise<RawDocument[]> {
    const browser = await this.getBrowser();
    const url = searchUrl(this.catalog, query.text);

    return this.contexts.add(
      async () => {
        const context = await browser.newContext({ userAgent: this.catalog.userAgent });
        const onAbort = (): void => {
          context.close().catch((error: unknown) => {
            logger.debug(`Closing aborted browser context: ${errorMessage(error)}`);
          });
        };
        signal?.addEventListener("abort", onAbort, { once: true });
        try {
          const page = await context.newPage();
          await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.settings.timeoutMs });
          try {
            await page.waitForLoadState("networkidle", { timeout: this.settings.timeoutMs });
          } catch (error) {
            logger.debug(`Page did not settle, using current content: ${errorMessage(error)}`);
          }
          const body = await page.content();
          return [{ url, contentType: "html" as const, body }];
        } catch (error) {
          if (signal?.aborted) throw new RetrievalError(CANCELLED, this.tag, false);
          throw new RetrievalError(`Browser render failed: ${errorMessage(error)}`, this.tag, true);
        } finally {
          signal?.removeEventListener("abort", onAbort);
          await context.close().catch((error: unknown) => {
            logger.debug(`Closing browser context: ${errorMessage(error)}`);
          });
        }
      },
      { signal, throwOnTimeout: true }
    );
  }

  async close(): Promise<void> {
    if (!this.browser || this.launchFailed) return;
    try {
      const browser = await this.browser;
      await browser.close();
    } catch (error) {
      logger.warn(`Closing browser: ${errorMessage(error)}`);
    }
  }
}
