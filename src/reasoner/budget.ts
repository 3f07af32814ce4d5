/**
 * Per-run cap on reasoner calls, shared by every file and every PR of a run.
 * Acquisition is synchronous, so concurrent hunk promises cannot overdraw it.
 */
export class CallBudget {
  private used = 0;

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new Error(`call budget must be a non-negative integer, got ${limit}`);
    }
  }

  /** Consume one slot. False once the limit is reached. */
  tryAcquire(): boolean {
    if (this.used >= this.limit) return false;
    this.used++;
    return true;
  }

  get consumed(): number {
    return this.used;
  }

  get remaining(): number {
    return this.limit - this.used;
  }
}
