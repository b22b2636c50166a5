/**
 * Rate-limiting gate for commentary triggers.
 */

/**
 * Grants at most one action per window.
 *
 * `tryAcquire` is a single check-and-set: there is no await between reading
 * the last grant and recording the new one, so re-entrant calls within the
 * same tick cannot both be granted.
 */
export class Debouncer {
  private readonly windowMs: number;
  private lastGrantedAt: number | null = null;

  constructor(windowMs: number) {
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new Error(`Debounce window must be a positive number of ms, got ${windowMs}`);
    }
    this.windowMs = windowMs;
  }

  /**
   * Returns true and records `now` as the last grant if the window has elapsed
   * since the previous grant (or nothing was ever granted).
   */
  tryAcquire(now: number = Date.now()): boolean {
    if (this.lastGrantedAt !== null && now - this.lastGrantedAt < this.windowMs) {
      return false;
    }
    this.lastGrantedAt = now;
    return true;
  }

  /**
   * Forgets the last grant.
   */
  reset(): void {
    this.lastGrantedAt = null;
  }

  getLastGrantedAt(): number | null {
    return this.lastGrantedAt;
  }
}
