// This module suppresses repeated identical triggers on the same message within a short window.

export interface DebounceFilterOptions {
  windowMs: number;
  sweepThreshold?: number;
}

interface DebounceEntry {
  signature: string;
  timestampMs: number;
}

const DEFAULT_SWEEP_THRESHOLD = 1000;

// This best-effort, single-process filter sits in front of the ledger; it never replaces the ledger check.
export class DebounceFilter {
  private readonly windowMs: number;
  private readonly sweepThreshold: number;
  private readonly entries = new Map<string, DebounceEntry>();

  public constructor(options: DebounceFilterOptions) {
    this.windowMs = options.windowMs;
    this.sweepThreshold = options.sweepThreshold ?? DEFAULT_SWEEP_THRESHOLD;
  }

  public get size(): number {
    return this.entries.size;
  }

  // This method returns true for a duplicate; otherwise it records the trigger and returns false.
  public shouldSuppress(conversationId: string, messageId: string, signature: string, nowMs: number): boolean {
    const key = `${conversationId}\u0000${messageId}`;
    const last = this.entries.get(key);

    if (last && last.signature === signature && nowMs - last.timestampMs < this.windowMs) {
      return true;
    }

    if (!last && this.entries.size >= this.sweepThreshold) {
      this.sweep(nowMs);
    }

    this.entries.set(key, { signature, timestampMs: nowMs });
    return false;
  }

  // This method drops entries whose window has elapsed.
  public sweep(nowMs: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (nowMs - entry.timestampMs >= this.windowMs) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
