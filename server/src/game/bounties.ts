import type { Bounty } from "../utils/types.js";

export const DEFAULT_BOUNTY_POINTS = 50;

/**
 * Bonus points payable to whichever predator captures a given target.
 */
export class BountyBoard {
  private bounties = new Map<string, Bounty>();

  set(targetId: string, points: number, reason: string, now: number): Bounty {
    const bounty: Bounty = { targetId, points, reason, setAt: now };
    this.bounties.set(targetId, bounty);
    return bounty;
  }

  /** Remove and return the bounty on a target, if any. */
  take(targetId: string): Bounty | null {
    const bounty = this.bounties.get(targetId);
    if (!bounty) return null;
    this.bounties.delete(targetId);
    return bounty;
  }

  remove(targetId: string): boolean {
    return this.bounties.delete(targetId);
  }

  list(): Bounty[] {
    return [...this.bounties.values()].sort((a, b) => b.points - a.points);
  }

  clear(): void {
    this.bounties.clear();
  }
}
