// Rate limiting for login attempts (in-memory, per IP)
const RATE_LIMIT_WINDOW = 15 * 60 * 1000; // 15 minutes
const MAX_LOGIN_ATTEMPTS = 10; // Max 10 attempts per window

export class LoginRateLimiter {
  private attempts = new Map<string, { count: number; lastAttempt: number }>();
  private cleanupTimer: NodeJS.Timeout;

  constructor(
    private maxAttempts = MAX_LOGIN_ATTEMPTS,
    private windowMs = RATE_LIMIT_WINDOW,
    private now: () => number = Date.now
  ) {
    // Clean up old entries every 5 minutes
    this.cleanupTimer = setInterval(() => this.cleanup(), 5 * 60 * 1000);
    this.cleanupTimer.unref();
  }

  check(ip: string): boolean {
    const now = this.now();
    const attempts = this.attempts.get(ip);

    if (!attempts || now - attempts.lastAttempt > this.windowMs) {
      this.attempts.set(ip, { count: 1, lastAttempt: now });
      return true;
    }

    if (attempts.count >= this.maxAttempts) {
      return false;
    }

    attempts.count++;
    attempts.lastAttempt = now;
    return true;
  }

  reset(ip: string): void {
    this.attempts.delete(ip);
  }

  cleanup(): void {
    const now = this.now();
    for (const [ip, data] of Array.from(this.attempts.entries())) {
      if (now - data.lastAttempt > this.windowMs) {
        this.attempts.delete(ip);
      }
    }
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }
}
