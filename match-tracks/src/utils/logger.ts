import chalk from "chalk";

class Logger {
  private debugEnabled = false;
  private quiet = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  /** Suppress everything below error (used by tests) */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled && !this.quiet) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }

  /**
   * Log a curl command for an outbound request (debug only)
   */
  logCurl(method: string, url: string, headers?: Record<string, string>): void {
    if (!this.debugEnabled) return;

    let curl = `curl -X ${method} '${url}'`;
    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        curl += ` \\\n  -H '${key}: ${value}'`;
      }
    }

    this.debug(`Request:\n${curl}`);
  }
}

/** Global logger instance */
export const logger = new Logger();
