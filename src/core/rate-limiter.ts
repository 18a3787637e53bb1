import { logDebug } from "./logging.js";

/**
 * Serializes outbound calls through a promise chain, keeping at least
 * `delayMs` between the start of consecutive calls.
 */
export class RateLimiter {
  private chain: Promise<void> = Promise.resolve();
  private lastRequestTime = 0;
  private readonly delayMs: number;
  private readonly label: string;

  constructor(delayMs: number, label = "requests") {
    this.delayMs = delayMs;
    this.label = label;
  }

  waitIfNeeded(): Promise<void> {
    this.chain = this.chain.then(async () => {
      const elapsed = Date.now() - this.lastRequestTime;
      if (elapsed < this.delayMs) {
        const waitTime = this.delayMs - elapsed;
        logDebug(`Rate limiting ${this.label}: waiting ${waitTime}ms`);
        await new Promise<void>((r) => setTimeout(r, waitTime));
      }
      this.lastRequestTime = Date.now();
    });
    return this.chain;
  }
}
