/**
 * Time-to-live map of "last time this actor did X".
 * Not tied to any entity lifecycle; the reconciler prunes expired entries.
 */
export class CooldownMap {
  private entries = new Map<string, number>();

  constructor(readonly windowMs: number) {}

  static pairKey(a: string, b: string): string {
    return `${a}:${b}`;
  }

  remainingMs(key: string, now: number): number {
    const last = this.entries.get(key);
    if (last === undefined) return 0;
    return Math.max(0, last + this.windowMs - now);
  }

  touch(key: string, now: number): void {
    this.entries.set(key, now);
  }

  /** Drop entries older than the window. Returns how many were removed. */
  prune(now: number): number {
    let removed = 0;
    for (const [key, last] of this.entries) {
      if (now - last >= this.windowMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Drop every entry whose key names this device (alone or in a pair). */
  removeInvolving(deviceId: string): void {
    for (const key of this.entries.keys()) {
      if (key === deviceId || key.split(":").includes(deviceId)) {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
