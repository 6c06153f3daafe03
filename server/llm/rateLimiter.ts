/**
 * Sliding-window rate limiter for LLM API calls.
 * Requests queue up and run one at a time once the window has room.
 */

type QueuedJob = () => Promise<void>;

export class RateLimiter {
  private queue: QueuedJob[] = [];
  private requestTimes: number[] = [];
  private processing = false;

  constructor(
    private maxRequests: number,
    private windowMs = 60000
  ) {}

  get pending(): number {
    return this.queue.length;
  }

  execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      });
      void this.processQueue();
    });
  }

  private async processQueue() {
    if (this.processing) return;
    this.processing = true;

    while (this.queue.length > 0) {
      // Drop timestamps that have left the window
      const now = Date.now();
      this.requestTimes = this.requestTimes.filter(time => now - time < this.windowMs);

      if (this.requestTimes.length < this.maxRequests) {
        const job = this.queue.shift();
        if (!job) break;

        this.requestTimes.push(now);
        await job();
      } else {
        const oldestRequest = this.requestTimes[0];
        const waitTime = Math.max(100, this.windowMs - (now - oldestRequest));
        await new Promise(resolve => setTimeout(resolve, waitTime));
      }
    }

    this.processing = false;
  }
}
